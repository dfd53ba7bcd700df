import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Block } from '../block/entities/block.entity';
import {
  SIMULATION_CONFIG,
  SimulationConfig,
} from '../common/config/simulation.config';
import { CryptoService } from '../common/crypto/crypto.service';
import {
  InvalidSimulationConfigError,
  InvalidTransactionError,
} from '../common/errors/simulator.errors';
import { createRandomSource } from '../common/random/random-source';
import { isValidHash } from '../common/types/common.types';
import { Transaction } from '../transaction/entities/transaction.entity';
import { HttpTransactionSource } from '../transaction/source/http-transaction.source';
import { SubmitTransactionDto } from '../transaction/dto/submit-transaction.dto';
import { RoundResult } from './consensus.types';
import { newSimulator, PosSimulator } from './simulator';

/**
 * Consensus Service
 *
 * 현재 시뮬레이션 인스턴스(PosSimulator)의 소유자
 *
 * 역할:
 * - 설정(SIMULATION_CONFIG)으로 시뮬레이터 생성
 * - 라운드 실행 (순차 보장: 이전 라운드가 끝나야 다음 라운드 시작)
 * - 시뮬레이터 재생성 (Validator 수/기준 스테이크 변경)
 * - 체인/Validator/Mempool 조회
 */
@Injectable()
export class ConsensusService {
  private readonly logger = new Logger(ConsensusService.name);

  private simulator: PosSimulator;

  /**
   * 라운드/재생성/제출 작업 직렬화용 체인
   */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    @Inject(SIMULATION_CONFIG) private readonly config: SimulationConfig,
    private readonly cryptoService: CryptoService,
  ) {
    this.simulator = this.createSimulator(
      config.validatorCount,
      config.baseStake,
    );
  }

  /**
   * 라운드 1회 실행
   *
   * 진행 중인 라운드가 있으면 끝날 때까지 기다린 뒤 실행
   */
  runRound(): Promise<RoundResult> {
    return this.enqueue(() => this.simulator.runRound());
  }

  /**
   * 시뮬레이터 재생성 (체인/Mempool 초기화)
   */
  reset(validatorCount: number, baseStake: number): Promise<void> {
    return this.enqueue(async () => {
      try {
        this.simulator = this.createSimulator(validatorCount, baseStake);
      } catch (error: unknown) {
        if (error instanceof InvalidSimulationConfigError) {
          throw new BadRequestException(error.message);
        }
        throw error;
      }
      this.logger.log(
        `Simulator reset: ${validatorCount} validators, base stake ${baseStake}`,
      );
    });
  }

  /**
   * 트랜잭션 제출 (Mempool 뒤에 추가)
   *
   * 입력 검증은 즉시, Mempool 추가는 큐 순서대로
   * → 먼저 요청된 reset 이후의 새 시뮬레이터에 들어감
   *
   * @returns 추가 후 Mempool 크기
   */
  async submitTransaction(dto: SubmitTransactionDto): Promise<{
    transaction: Transaction;
    poolSize: number;
  }> {
    let transaction: Transaction;
    try {
      transaction = new Transaction(
        dto.sender,
        dto.receiver,
        dto.amount,
        dto.metadata ?? {},
      );
    } catch (error: unknown) {
      if (error instanceof InvalidTransactionError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const poolSize = await this.enqueue(async () =>
      this.simulator.submitTransaction(transaction),
    );
    return { transaction, poolSize };
  }

  getChainSnapshot(): readonly Block[] {
    return this.simulator.getChainSnapshot();
  }

  getLatestBlock(): Block {
    return this.simulator.getTip();
  }

  /**
   * @throws {NotFoundException} 블록 없음
   */
  getBlock(index: number): Block {
    const block = this.simulator.getBlock(index);
    if (!block) {
      throw new NotFoundException(`Block #${index} not found`);
    }
    return block;
  }

  /**
   * @throws {BadRequestException} 해시 형식 아님
   * @throws {NotFoundException} 블록 없음
   */
  getBlockByHash(hash: string): Block {
    if (!isValidHash(hash)) {
      throw new BadRequestException(`Invalid block hash: ${hash}`);
    }

    const block = this.simulator.getBlockByHash(hash.toLowerCase());
    if (!block) {
      throw new NotFoundException(`Block ${hash} not found`);
    }
    return block;
  }

  verifyChain() {
    return this.simulator.verifyChain();
  }

  getChainSummary(): string[] {
    return this.simulator.getChainSummary();
  }

  getValidators() {
    return this.simulator.getValidators();
  }

  getValidatorStats() {
    const validators = this.simulator.getValidators();
    const totalStake = validators.reduce((sum, v) => sum + v.stake, 0);
    const stakes = validators.map((v) => v.stake);

    return {
      total: validators.length,
      totalStake,
      minStake: Math.min(...stakes),
      maxStake: Math.max(...stakes),
      averageStake: totalStake / validators.length,
    };
  }

  getPoolStats() {
    return this.simulator.getPoolStats();
  }

  getRoundHistory(): readonly RoundResult[] {
    return this.simulator.getRoundHistory();
  }

  getStats() {
    return this.simulator.getStats();
  }

  private createSimulator(
    validatorCount: number,
    baseStake: number,
  ): PosSimulator {
    const random = createRandomSource(this.config.seed);
    const source = this.config.feedUrl
      ? new HttpTransactionSource(
          { url: this.config.feedUrl, timeoutMs: this.config.feedTimeoutMs },
          random,
          this.cryptoService,
        )
      : null;

    return newSimulator(validatorCount, baseStake, {
      random,
      source,
      cryptoService: this.cryptoService,
    });
  }

  /**
   * 작업을 순서대로 실행
   *
   * 큐는 실패와 무관하게 다음 작업으로 진행하고, 에러는 호출자의 Promise로 전달됨
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
