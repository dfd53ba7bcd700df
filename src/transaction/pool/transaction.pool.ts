import { Logger } from '@nestjs/common';
import { Transaction } from '../entities/transaction.entity';

/**
 * Transaction Pool (Mempool)
 *
 * 아직 블록에 포함되지 않은 트랜잭션 저장소
 *
 * 우리 구현:
 * - FIFO (도착 순서 유지)
 * - Leader는 앞에서부터 배치를 가져감 (가장 오래된 것 먼저)
 * - 블록이 확정되면 같은 배치를 앞에서 제거
 * - 합의 실패 시 그대로 남음 (다음 라운드에서 재사용)
 *
 * 변경은 ConsensusRound(단일 writer)만 수행
 */
export class TransactionPool {
  private readonly logger = new Logger(TransactionPool.name);

  private readonly pending: Transaction[] = [];

  /**
   * 트랜잭션 추가 (맨 뒤)
   */
  add(tx: Transaction): void {
    this.pending.push(tx);
  }

  /**
   * 여러 트랜잭션 추가 (순서 유지)
   */
  addMany(txs: readonly Transaction[]): void {
    this.pending.push(...txs);
  }

  /**
   * 앞에서부터 최대 count개 조회 (제거하지 않음)
   *
   * @param count - 가져올 개수
   * @returns 오래된 순서의 트랜잭션 배열 (복사본)
   */
  peek(count: number): Transaction[] {
    return this.pending.slice(0, Math.max(0, count));
  }

  /**
   * 앞에서부터 count개 제거
   *
   * 블록 확정 후 호출
   *
   * @param count - 제거할 개수
   * @returns 제거된 트랜잭션 배열
   */
  removeFirst(count: number): Transaction[] {
    const removed = this.pending.splice(0, Math.max(0, count));
    this.logger.debug(
      `Removed ${removed.length} transactions from pool (${this.pending.length} left)`,
    );
    return removed;
  }

  /**
   * 대기 중인 트랜잭션 개수
   */
  size(): number {
    return this.pending.length;
  }

  /**
   * 모든 트랜잭션 조회 (복사본)
   */
  getAll(): Transaction[] {
    return [...this.pending];
  }

  /**
   * Pool 통계
   */
  getStats() {
    const totalAmount = this.pending.reduce((sum, tx) => sum + tx.amount, 0);

    return {
      pendingCount: this.pending.length,
      totalAmount,
      transactions: this.pending.map((tx) => tx.toJSON()),
    };
  }
}
