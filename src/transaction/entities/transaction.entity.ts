import { InvalidTransactionError } from '../../common/errors/simulator.errors';
import { Address } from '../../common/types/common.types';

/**
 * 트랜잭션 메타데이터 (문자열 → 문자열)
 *
 * 해시 계산 시 키 순서로 정렬되므로 삽입 순서는 의미 없음
 */
export type TransactionMetadata = Readonly<Record<string, string>>;

/**
 * 해시 입력용 트랜잭션 레코드
 */
export type CanonicalTransactionRecord = {
  readonly sender: Address;
  readonly receiver: Address;
  readonly amount: number;
  readonly data: TransactionMetadata;
  readonly timestamp: number;
};

/**
 * Transaction Entity
 *
 * 단순 송금 트랜잭션:
 * - 서명 없음 (실제 시스템이라면 서명으로 인증)
 * - 잔액 추적 없음 (계정 상태를 모델링하지 않음)
 * - 생성 후 읽기 전용
 *
 * 트랜잭션 생명주기:
 * 1. 생성 (외부 피드 또는 로컬 생성)
 * 2. Mempool 대기
 * 3. 블록 포함 → Mempool에서 제거
 */
export class Transaction {
  /**
   * 발신자 주소
   */
  readonly sender: Address;

  /**
   * 수신자 주소
   */
  readonly receiver: Address;

  /**
   * 송금 금액 (0 이상 소수)
   */
  readonly amount: number;

  /**
   * 부가 정보 (예: { api_title: '...' })
   */
  readonly metadata: TransactionMetadata;

  /**
   * 생성 시간 (Unix timestamp, milliseconds)
   */
  readonly timestamp: number;

  constructor(
    sender: Address,
    receiver: Address,
    amount: number,
    metadata: Record<string, string> = {},
    timestamp: number = Date.now(),
  ) {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidTransactionError(
        `Transaction amount must be a non-negative number, got ${amount}`,
      );
    }

    this.sender = sender;
    this.receiver = receiver;
    this.amount = amount;
    this.metadata = Object.freeze({ ...metadata });
    this.timestamp = timestamp;
    Object.freeze(this);
  }

  /**
   * 해시 계산용 레코드
   *
   * 필드명은 블록 해시 입력 형식에 고정되어 있으므로 바꾸면 안 됨
   */
  toCanonicalRecord(): CanonicalTransactionRecord {
    return {
      sender: this.sender,
      receiver: this.receiver,
      amount: this.amount,
      data: this.metadata,
      timestamp: this.timestamp,
    };
  }

  /**
   * JSON 직렬화
   */
  toJSON() {
    return {
      sender: this.sender,
      receiver: this.receiver,
      amount: this.amount,
      metadata: { ...this.metadata },
      timestamp: this.timestamp,
    };
  }

  toString(): string {
    return `TX(${this.sender.slice(-6)} -> ${this.receiver.slice(-6)}: ${this.amount})`;
  }
}
