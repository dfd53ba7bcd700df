import { Logger } from '@nestjs/common';
import { describeError } from '../../common/errors/simulator.errors';
import { Clock, systemClock } from '../../common/types/common.types';
import { Transaction } from '../entities/transaction.entity';
import { TransactionPool } from '../pool/transaction.pool';
import { TransactionRecord, TransactionSource } from './transaction-source.interface';

export type FeedOrigin = 'remote' | 'synthetic';

export interface FeedResult {
  added: number;
  origin: FeedOrigin;
}

/**
 * Transaction Feed
 *
 * Mempool 보충 담당:
 * 1. primary 소스(원격)에서 가져오기 시도
 * 2. 실패하면 에러 로그 후 fallback(로컬 생성)으로 대체
 * 3. 레코드 → Transaction 변환 후 Pool 뒤에 추가
 *
 * 외부 소스 실패는 여기서 끝남 (라운드로 전파되지 않음)
 * 단, 금액이 잘못된 레코드는 InvalidTransactionError로 그대로 전파
 */
export class TransactionFeed {
  private readonly logger = new Logger(TransactionFeed.name);

  constructor(
    private readonly primary: TransactionSource | null,
    private readonly fallback: TransactionSource,
    private readonly clock: Clock = systemClock,
  ) {}

  async fill(pool: TransactionPool, count: number): Promise<FeedResult> {
    const { records, origin } = await this.fetchRecords(count);

    const transactions = records.map(
      (record) =>
        new Transaction(
          record.sender,
          record.receiver,
          record.amount,
          record.metadata ?? {},
          this.clock(),
        ),
    );

    pool.addMany(transactions);

    this.logger.log(
      `Added ${transactions.length} ${origin} transactions to the mempool`,
    );

    return { added: transactions.length, origin };
  }

  private async fetchRecords(
    count: number,
  ): Promise<{ records: TransactionRecord[]; origin: FeedOrigin }> {
    if (this.primary) {
      try {
        const records = await this.primary.fetch(count);
        return { records, origin: 'remote' };
      } catch (error: unknown) {
        this.logger.error(
          `Failed to fetch transactions from ${this.primary.name}: ${describeError(error)}. Generating locally.`,
        );
      }
    }

    const records = await this.fallback.fetch(count);
    return { records, origin: 'synthetic' };
  }
}
