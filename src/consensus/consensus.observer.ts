import { Logger } from '@nestjs/common';
import { Block } from '../block/entities/block.entity';
import { FeedResult } from '../transaction/source/transaction-feed';
import { Validator } from '../validator/entities/validator.entity';
import { RoundResult } from './consensus.types';

/**
 * ConsensusObserver
 *
 * 라운드 진행 이벤트 수신자
 * - 생성 시 주입 (전역 로깅 상태 없음)
 * - 기본 구현: LoggingConsensusObserver
 * - 테스트: 기록용 구현으로 교체 가능
 */
export interface ConsensusObserver {
  roundStarted(round: number, blockIndex: number, poolSize: number): void;
  poolRefilled(result: FeedResult, poolSize: number): void;
  leaderSelected(leader: Validator, blockIndex: number): void;
  blockProposed(block: Block, leader: Validator): void;
  voteCast(validator: Validator, block: Block, approved: boolean): void;
  roundCommitted(result: RoundResult): void;
  roundRejected(result: RoundResult): void;
  consistencyViolation(block: Block): void;
}

/**
 * Nest Logger 기반 기본 Observer
 */
export class LoggingConsensusObserver implements ConsensusObserver {
  constructor(
    private readonly logger: Logger = new Logger('ConsensusRound'),
  ) {}

  roundStarted(round: number, blockIndex: number, poolSize: number): void {
    this.logger.log(
      `--- Starting Consensus Round ${round} for Block #${blockIndex} (mempool: ${poolSize}) ---`,
    );
  }

  poolRefilled(result: FeedResult, poolSize: number): void {
    this.logger.log(
      `Mempool refilled with ${result.added} ${result.origin} transactions (now ${poolSize})`,
    );
  }

  leaderSelected(leader: Validator, blockIndex: number): void {
    this.logger.log(
      `Leader for block #${blockIndex} selected: ${leader.shortAddress()} (Stake: ${leader.stake.toFixed(2)})`,
    );
  }

  blockProposed(block: Block, leader: Validator): void {
    this.logger.debug(
      `${leader.shortAddress()} proposed ${block} with ${block.getTransactionCount()} transactions`,
    );
  }

  voteCast(validator: Validator, block: Block, approved: boolean): void {
    this.logger.debug(
      `${validator.shortAddress()} voted ${approved ? 'YES' : 'NO'} on block #${block.index}`,
    );
  }

  roundCommitted(result: RoundResult): void {
    const tally = result.tally;
    this.logger.log(
      `CONSENSUS REACHED. ${result.block ?? `Block #${result.blockIndex}`} added to the chain` +
        (tally
          ? ` (approving stake ${tally.approvingStake.toFixed(2)}/${tally.totalStake.toFixed(2)})`
          : ''),
    );
  }

  roundRejected(result: RoundResult): void {
    if (result.reason === 'EMPTY_POOL') {
      this.logger.warn('Mempool is empty. Skipping round.');
      return;
    }

    const tally = result.tally;
    this.logger.warn(
      `CONSENSUS FAILED for block #${result.blockIndex}. Block discarded.` +
        (tally
          ? ` (approving stake ${tally.approvingStake.toFixed(2)}/${tally.totalStake.toFixed(2)})`
          : ''),
    );
  }

  consistencyViolation(block: Block): void {
    this.logger.error(
      `CRITICAL: Block #${block.index} failed final validation despite consensus.`,
    );
  }
}
