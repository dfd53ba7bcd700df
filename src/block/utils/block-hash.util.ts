import { keccak256Canonical } from '../../common/crypto/crypto.service';
import { Address, Hash } from '../../common/types/common.types';
import { Transaction } from '../../transaction/entities/transaction.entity';

/**
 * 블록 해시 입력 필드
 */
export interface BlockHashInput {
  index: number;
  timestamp: number;
  transactions: readonly Transaction[];
  previousHash: Hash;
  proposer: Address;
}

/**
 * 블록 해시 계산
 *
 * 이더리움:
 * - Keccak-256(RLP(header))
 *
 * 우리:
 * - Keccak-256(canonical JSON)
 * - 입력: { index, timestamp, transactions, previousHash, proposer }
 * - 키는 모든 깊이에서 사전순 정렬 (메타데이터 포함)
 * - 트랜잭션은 저장된 순서 그대로
 *
 * 같은 필드 값 → 항상 같은 해시
 * 필드 하나라도 바뀌면 → 다른 해시
 *
 * @returns "0x" + 64 hex
 */
export function calculateBlockHash(input: BlockHashInput): Hash {
  return keccak256Canonical({
    index: input.index,
    timestamp: input.timestamp,
    transactions: input.transactions.map((tx) => tx.toCanonicalRecord()),
    previousHash: input.previousHash,
    proposer: input.proposer,
  });
}
