import { Chain } from '../block/chain';
import { Block } from '../block/entities/block.entity';
import {
  BLOCK_BATCH_SIZE,
  CONSENSUS_THRESHOLD,
  POOL_LOW_WATERMARK,
  REFILL_MAX_COUNT,
  REFILL_MIN_COUNT,
  StakeThreshold,
} from '../common/constants/blockchain.constants';
import {
  ChainConsistencyViolationError,
  InvalidSimulationConfigError,
} from '../common/errors/simulator.errors';
import { RandomSource } from '../common/random/random-source';
import { TransactionPool } from '../transaction/pool/transaction.pool';
import { TransactionFeed } from '../transaction/source/transaction-feed';
import { Validator } from '../validator/entities/validator.entity';
import { selectByStake } from '../validator/selection/stake-weighted.selector';
import { ConsensusObserver } from './consensus.observer';
import { meetsThreshold } from './consensus.threshold';
import { RoundResult, RoundState, VoteTally } from './consensus.types';

export interface ConsensusRoundOptions {
  chain: Chain;
  validators: readonly Validator[];
  pool: TransactionPool;
  feed: TransactionFeed;
  random: RandomSource;
  observer: ConsensusObserver;
  threshold?: StakeThreshold;
  batchSize?: number;
  lowWatermark?: number;
  refillRange?: readonly [number, number];
}

/**
 * ConsensusRound
 *
 * 단순화된 POS 합의 라운드 오케스트레이터
 *
 * 라운드 흐름:
 * 1. POOLING: Mempool이 5개 미만이면 피드에서 보충, 그래도 비면 종료
 * 2. LEADER_SELECTED: 스테이크 가중 무작위로 Leader 1명 선택
 * 3. PROPOSED: Leader가 Mempool 앞 최대 5개로 블록 제안
 * 4. VOTED: 찬성 스테이크 집계 (Leader는 자동 찬성)
 * 5. COMMITTED: 찬성 >= 2/3 → 체인에 추가 + 같은 배치를 Mempool에서 제거
 * 6. REJECTED: 2/3 미달 → 블록 폐기, Mempool/체인 그대로
 *
 * 체인과 Mempool은 여기서만 변경됨 (단일 writer)
 * 라운드는 겹치지 않음 (호출자가 await 후 다음 라운드 실행)
 */
export class ConsensusRound {
  private readonly chain: Chain;
  private readonly validators: readonly Validator[];
  private readonly pool: TransactionPool;
  private readonly feed: TransactionFeed;
  private readonly random: RandomSource;
  private readonly observer: ConsensusObserver;
  private readonly threshold: StakeThreshold;
  private readonly batchSize: number;
  private readonly lowWatermark: number;
  private readonly refillRange: readonly [number, number];

  private roundCount = 0;

  constructor(options: ConsensusRoundOptions) {
    if (options.validators.length === 0) {
      throw new InvalidSimulationConfigError(
        'At least one validator is required',
      );
    }

    this.chain = options.chain;
    this.validators = options.validators;
    this.pool = options.pool;
    this.feed = options.feed;
    this.random = options.random;
    this.observer = options.observer;
    this.threshold = options.threshold ?? CONSENSUS_THRESHOLD;
    this.batchSize = options.batchSize ?? BLOCK_BATCH_SIZE;
    this.lowWatermark = options.lowWatermark ?? POOL_LOW_WATERMARK;
    this.refillRange = options.refillRange ?? [
      REFILL_MIN_COUNT,
      REFILL_MAX_COUNT,
    ];
  }

  /**
   * 지금까지 실행된 라운드 수
   */
  getRoundCount(): number {
    return this.roundCount;
  }

  /**
   * 라운드 1회 실행
   *
   * 예상 가능한 실패(빈 Mempool, 합의 실패)는 REJECTED 결과로 반환
   * 체인 일관성 위반만 throw
   */
  async runRound(): Promise<RoundResult> {
    const round = ++this.roundCount;
    const transitions: RoundState[] = [RoundState.POOLING];
    const blockIndex = this.chain.tip().index + 1;

    this.observer.roundStarted(round, blockIndex, this.pool.size());

    // 1. Mempool 보충
    if (this.pool.size() < this.lowWatermark) {
      const [min, max] = this.refillRange;
      const feedResult = await this.feed.fill(
        this.pool,
        this.random.integer(min, max),
      );
      this.observer.poolRefilled(feedResult, this.pool.size());
    }

    if (this.pool.size() === 0) {
      transitions.push(RoundState.REJECTED);
      const result: RoundResult = {
        round,
        state: RoundState.REJECTED,
        reason: 'EMPTY_POOL',
        blockIndex,
        transitions,
      };
      this.observer.roundRejected(result);
      return result;
    }

    // 2. Leader 선택
    const leader = this.selectLeader();
    transitions.push(RoundState.LEADER_SELECTED);
    this.observer.leaderSelected(leader, blockIndex);

    // 3. 블록 제안 (Mempool 앞에서부터, 오래된 순)
    const batch = this.pool.peek(this.batchSize);
    const block = leader.propose(batch);
    transitions.push(RoundState.PROPOSED);
    this.observer.blockProposed(block, leader);

    // 4. 투표
    const tally = this.tallyVotes(leader, block);
    transitions.push(RoundState.VOTED);

    // 5. 2/3 이상 → 확정
    if (meetsThreshold(tally.approvingStake, tally.totalStake, this.threshold)) {
      this.commit(block);
      this.pool.removeFirst(batch.length);
      transitions.push(RoundState.COMMITTED);

      const result: RoundResult = {
        round,
        state: RoundState.COMMITTED,
        blockIndex,
        leader: leader.address,
        block,
        tally,
        transitions,
      };
      this.observer.roundCommitted(result);
      return result;
    }

    // 6. 2/3 미달 → 폐기
    transitions.push(RoundState.REJECTED);
    const result: RoundResult = {
      round,
      state: RoundState.REJECTED,
      reason: 'CONSENSUS_NOT_REACHED',
      blockIndex,
      leader: leader.address,
      block,
      tally,
      transitions,
    };
    this.observer.roundRejected(result);
    return result;
  }

  /**
   * Leader 선택 (스테이크 가중, 라운드당 1명)
   */
  selectLeader(): Validator {
    return selectByStake(this.validators, this.random);
  }

  /**
   * 찬성 스테이크 집계
   *
   * - 전체 스테이크는 라운드마다 한 번 합산 (중간 합계에서 다시 계산하지 않음)
   * - Leader는 validate() 호출 없이 자동 찬성
   * - 나머지는 validate() 결과가 true일 때만 스테이크 전체가 찬성에 포함
   */
  tallyVotes(leader: Validator, block: Block): VoteTally {
    const totalStake = this.validators.reduce((sum, v) => sum + v.stake, 0);

    let approvingStake = 0;
    const approvals: string[] = [];
    const rejections: string[] = [];

    for (const validator of this.validators) {
      const approved = validator === leader || validator.validate(block);
      this.observer.voteCast(validator, block, approved);

      if (approved) {
        approvingStake += validator.stake;
        approvals.push(validator.address);
      } else {
        rejections.push(validator.address);
      }
    }

    return {
      approvingStake,
      totalStake,
      ratio: approvingStake / totalStake,
      approvals,
      rejections,
    };
  }

  /**
   * 체인에 추가
   *
   * 합의 전 검증과 append 검증은 같은 Chain.isValid()를 사용하므로
   * 여기서 실패하면 불변식 위반 → 보고 후 throw
   */
  private commit(block: Block): void {
    if (!this.chain.append(block)) {
      this.observer.consistencyViolation(block);
      throw new ChainConsistencyViolationError(block.index, block.hash);
    }
  }
}
