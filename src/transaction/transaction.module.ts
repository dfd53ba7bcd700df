import { Module } from '@nestjs/common';
import { ConsensusModule } from '../consensus/consensus.module';
import { TransactionController } from './transaction.controller';

/**
 * Transaction Module
 *
 * Mempool 조회/제출 API
 *
 * Mempool 자체는 시뮬레이터(ConsensusService)가 소유
 */
@Module({
  imports: [ConsensusModule],
  controllers: [TransactionController],
})
export class TransactionModule {}
