import { Address, Hash } from '../../common/types/common.types';
import { Transaction } from '../../transaction/entities/transaction.entity';
import { calculateBlockHash } from '../utils/block-hash.util';

/**
 * Block Entity
 *
 * 블록체인:
 * - 블록들이 previousHash로 연결된 체인
 * - Genesis Block부터 시작 (previousHash = 0x0)
 * - 불변성: 한번 생성되면 수정 불가
 *
 * 해시:
 * - 생성자에서 한 번 계산해서 저장 (hash를 넘기면 그대로 보존, 변조 여부는 Chain이 판단)
 * - 다시 계산해서 덮어쓰지 않음 (검증 시 calculateHash()로 비교만)
 */
export class Block {
  /**
   * 블록 번호
   *
   * - Genesis Block: 0
   * - 순차적으로 1씩 증가
   */
  readonly index: number;

  /**
   * 블록 생성 시간 (Unix timestamp, milliseconds)
   */
  readonly timestamp: number;

  /**
   * 트랜잭션 리스트
   *
   * - Leader가 Mempool 앞에서 가져온 배치 (순서 그대로)
   * - 빈 블록 가능 (Genesis)
   */
  readonly transactions: readonly Transaction[];

  /**
   * 이전 블록 해시
   *
   * 검증:
   * - block[n].previousHash === block[n-1].hash
   */
  readonly previousHash: Hash;

  /**
   * 블록 제안자 (Leader) 주소
   */
  readonly proposer: Address;

  /**
   * 블록 해시
   */
  readonly hash: Hash;

  constructor(
    index: number,
    timestamp: number,
    transactions: readonly Transaction[],
    previousHash: Hash,
    proposer: Address,
    hash?: Hash,
  ) {
    this.index = index;
    this.timestamp = timestamp;
    this.transactions = Object.freeze([...transactions]);
    this.previousHash = previousHash;
    this.proposer = proposer;
    this.hash = hash ?? this.calculateHash();
    Object.freeze(this);
  }

  /**
   * 현재 필드로 해시 재계산 (저장하지 않음)
   */
  calculateHash(): Hash {
    return calculateBlockHash({
      index: this.index,
      timestamp: this.timestamp,
      transactions: this.transactions,
      previousHash: this.previousHash,
      proposer: this.proposer,
    });
  }

  /**
   * 트랜잭션 개수
   */
  getTransactionCount(): number {
    return this.transactions.length;
  }

  /**
   * Genesis Block 여부
   */
  isGenesis(): boolean {
    return this.index === 0;
  }

  /**
   * JSON 직렬화
   */
  toJSON() {
    return {
      index: this.index,
      hash: this.hash,
      previousHash: this.previousHash,
      timestamp: this.timestamp,
      proposer: this.proposer,
      transactionCount: this.transactions.length,
      transactions: this.transactions.map((tx) => tx.toJSON()),
    };
  }

  toString(): string {
    return `Block(#${this.index} | Val: ${this.proposer.slice(-6)} | Txs: ${this.transactions.length} | Hash: ${this.hash.slice(-6)})`;
  }
}
