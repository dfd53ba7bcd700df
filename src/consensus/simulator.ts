import { Chain } from '../block/chain';
import { Block } from '../block/entities/block.entity';
import {
  ROUND_HISTORY_LIMIT,
  STAKE_VARIANCE_MAX,
  STAKE_VARIANCE_MIN,
} from '../common/constants/blockchain.constants';
import { CryptoService } from '../common/crypto/crypto.service';
import { InvalidSimulationConfigError } from '../common/errors/simulator.errors';
import { MathRandomSource, RandomSource } from '../common/random/random-source';
import { Clock, Hash, systemClock } from '../common/types/common.types';
import { Transaction } from '../transaction/entities/transaction.entity';
import { TransactionPool } from '../transaction/pool/transaction.pool';
import { SyntheticTransactionSource } from '../transaction/source/synthetic-transaction.source';
import { TransactionFeed } from '../transaction/source/transaction-feed';
import { TransactionSource } from '../transaction/source/transaction-source.interface';
import { Validator } from '../validator/entities/validator.entity';
import { ConsensusRound } from './consensus-round';
import { ConsensusObserver, LoggingConsensusObserver } from './consensus.observer';
import { RoundResult, RoundState } from './consensus.types';

export interface SimulatorOptions {
  /**
   * Validator별 스테이크 (길이 = validatorCount)
   *
   * 없으면 baseStake × uniform(0.8, 1.5)
   */
  stakes?: readonly number[];

  /**
   * 난수 소스 (시드 고정 시 재현 가능)
   */
  random?: RandomSource;

  clock?: Clock;

  observer?: ConsensusObserver;

  /**
   * 원격 트랜잭션 소스 (없으면 로컬 생성만 사용)
   */
  source?: TransactionSource | null;

  cryptoService?: CryptoService;
}

/**
 * POS Simulator
 *
 * 시뮬레이션 컨텍스트 하나 = 체인 + Validator 집합 + Mempool + 난수 소스
 * - 전역 상태 없음 (인스턴스마다 독립)
 * - 외부에는 체인의 읽기 전용 스냅샷만 노출
 */
export class PosSimulator {
  private readonly history: RoundResult[] = [];

  /**
   * 누적 라운드 결과 (history 크기 제한과 무관)
   */
  private committedRounds = 0;
  private rejectedRounds = 0;

  constructor(
    private readonly chain: Chain,
    private readonly validators: readonly Validator[],
    private readonly pool: TransactionPool,
    private readonly consensus: ConsensusRound,
  ) {}

  /**
   * 라운드 1회 실행
   */
  async runRound(): Promise<RoundResult> {
    const result = await this.consensus.runRound();

    if (result.state === RoundState.COMMITTED) {
      this.committedRounds++;
    } else {
      this.rejectedRounds++;
    }

    this.history.push(result);
    if (this.history.length > ROUND_HISTORY_LIMIT) {
      this.history.shift();
    }

    return result;
  }

  /**
   * 체인 읽기 전용 스냅샷
   */
  getChainSnapshot(): readonly Block[] {
    return this.chain.getBlocks();
  }

  getTip(): Block {
    return this.chain.tip();
  }

  getBlock(index: number): Block | null {
    return this.chain.getBlock(index);
  }

  getBlockByHash(hash: Hash): Block | null {
    return this.chain.getBlockByHash(hash);
  }

  verifyChain() {
    return this.chain.verify();
  }

  getChainSummary(): string[] {
    return this.chain.getSummary();
  }

  getValidators(): readonly Validator[] {
    return this.validators;
  }

  getPendingTransactions(): Transaction[] {
    return this.pool.getAll();
  }

  getPoolStats() {
    return this.pool.getStats();
  }

  /**
   * Mempool에 트랜잭션 직접 추가 (다음 라운드에서 사용)
   */
  submitTransaction(tx: Transaction): number {
    this.pool.add(tx);
    return this.pool.size();
  }

  /**
   * 최근 라운드 결과 (오래된 순)
   */
  getRoundHistory(): readonly RoundResult[] {
    return [...this.history];
  }

  /**
   * 시뮬레이션 통계
   */
  getStats() {
    const totalStake = this.validators.reduce((sum, v) => sum + v.stake, 0);

    return {
      rounds: this.consensus.getRoundCount(),
      committedRounds: this.committedRounds,
      rejectedRounds: this.rejectedRounds,
      chainLength: this.chain.length,
      tipIndex: this.chain.tip().index,
      tipHash: this.chain.tip().hash,
      validatorCount: this.validators.length,
      totalStake,
      pendingTransactions: this.pool.size(),
    };
  }
}

/**
 * 시뮬레이터 생성
 *
 * - 새 체인 (Genesis Block 1개)
 * - validatorCount개 Validator (무작위 체크섬 주소)
 * - 빈 Mempool
 *
 * @param validatorCount - Validator 수 (1 이상)
 * @param baseStake - 기준 스테이크 (0 초과)
 */
export function newSimulator(
  validatorCount: number,
  baseStake: number,
  options: SimulatorOptions = {},
): PosSimulator {
  if (!Number.isInteger(validatorCount) || validatorCount < 1) {
    throw new InvalidSimulationConfigError(
      `validatorCount must be a positive integer, got ${validatorCount}`,
    );
  }
  if (!Number.isFinite(baseStake) || baseStake <= 0) {
    throw new InvalidSimulationConfigError(
      `baseStake must be a positive number, got ${baseStake}`,
    );
  }
  if (options.stakes && options.stakes.length !== validatorCount) {
    throw new InvalidSimulationConfigError(
      `Expected ${validatorCount} stakes, got ${options.stakes.length}`,
    );
  }

  const random = options.random ?? new MathRandomSource();
  const clock = options.clock ?? systemClock;
  const cryptoService = options.cryptoService ?? new CryptoService();
  const observer = options.observer ?? new LoggingConsensusObserver();

  const chain = new Chain(clock);

  const validators: Validator[] = [];
  for (let i = 0; i < validatorCount; i++) {
    const address = cryptoService.generateAddress(random);
    const stake =
      options.stakes?.[i] ??
      baseStake * random.uniform(STAKE_VARIANCE_MIN, STAKE_VARIANCE_MAX);
    validators.push(new Validator(address, stake, chain, clock));
  }

  const pool = new TransactionPool();
  const feed = new TransactionFeed(
    options.source ?? null,
    new SyntheticTransactionSource(random, cryptoService),
    clock,
  );

  const consensus = new ConsensusRound({
    chain,
    validators,
    pool,
    feed,
    random,
    observer,
  });

  return new PosSimulator(chain, validators, pool, consensus);
}
