import { Address } from '../../common/types/common.types';

/**
 * 외부에서 들어오는 트랜잭션 형태의 레코드
 *
 * Transaction으로 변환될 때 금액 검증과 타임스탬프 부여가 일어남
 */
export interface TransactionRecord {
  sender: Address;
  receiver: Address;
  amount: number;
  metadata?: Record<string, string>;
}

/**
 * 트랜잭션 소스 (외부 협력자)
 *
 * - count개 레코드를 반환하거나 실패(reject)
 * - 구현은 코어와 무관 (원격 API, 로컬 생성기 등)
 */
export interface TransactionSource {
  readonly name: string;

  fetch(count: number): Promise<TransactionRecord[]>;
}
