import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { formatChainSummary } from '../../block/utils/chain-summary.util';
import {
  SIMULATION_CONFIG,
  SimulationConfig,
} from '../../common/config/simulation.config';
import { describeError } from '../../common/errors/simulator.errors';
import { ConsensusService } from '../consensus.service';

/**
 * Simulation Runner
 *
 * 라운드 드라이버:
 * - roundCount번 라운드 실행
 * - 라운드 사이 roundDelayMs 대기 (setTimeout)
 * - 모두 끝나면 체인 요약 출력
 *
 * 라운드는 겹치지 않음:
 * - 이전 라운드가 끝난 뒤 다음 라운드 예약
 *
 * NestJS Lifecycle:
 * - onApplicationBootstrap: AUTO_RUN=true면 자동 시작
 * - onApplicationShutdown: 예약된 라운드 취소
 */
@Injectable()
export class SimulationRunner
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(SimulationRunner.name);
  private isRunning = false;
  private currentTimeout: NodeJS.Timeout | null = null;
  private completedRounds = 0;
  private targetRounds = 0;
  private lastError: string | null = null;

  /**
   * start()마다 증가, 이전 실행의 늦은 콜백 무시용
   */
  private runId = 0;

  constructor(
    @Inject(SIMULATION_CONFIG) private readonly config: SimulationConfig,
    private readonly consensusService: ConsensusService,
  ) {}

  onApplicationBootstrap() {
    if (this.config.autoRun) {
      this.start();
    }
  }

  onApplicationShutdown() {
    this.clearTimer();
    this.isRunning = false;
  }

  /**
   * 라운드 실행 시작
   *
   * @param roundCount - 실행할 라운드 수 (기본: 설정값)
   */
  start(roundCount: number = this.config.roundCount): void {
    if (this.isRunning) {
      this.logger.warn('Simulation runner is already running');
      return;
    }

    this.isRunning = true;
    this.runId++;
    this.completedRounds = 0;
    this.targetRounds = roundCount;
    this.lastError = null;

    this.logger.log(
      `Simulation runner started: ${roundCount} rounds, ${this.config.roundDelayMs}ms apart`,
    );

    this.scheduleNextRound();
  }

  /**
   * 라운드 실행 중지
   *
   * 진행 중인 라운드는 끝까지 실행되고, 다음 라운드만 취소됨
   */
  stop(): void {
    if (!this.isRunning) {
      this.logger.warn('Simulation runner is not running');
      return;
    }

    this.clearTimer();
    this.isRunning = false;
    this.logger.log(
      `Simulation runner stopped after ${this.completedRounds}/${this.targetRounds} rounds`,
    );
  }

  /**
   * Runner 상태
   */
  getStatus() {
    return {
      isRunning: this.isRunning,
      completedRounds: this.completedRounds,
      targetRounds: this.targetRounds,
      roundDelayMs: this.config.roundDelayMs,
      lastError: this.lastError,
    };
  }

  private scheduleNextRound(runId: number = this.runId): void {
    if (!this.isRunning || runId !== this.runId) {
      return;
    }

    if (this.completedRounds >= this.targetRounds) {
      this.finish();
      return;
    }

    this.currentTimeout = setTimeout(() => {
      this.currentTimeout = null;
      void this.executeRound(runId).then(() => this.scheduleNextRound(runId));
    }, this.config.roundDelayMs);
  }

  /**
   * 라운드 1회 실행
   *
   * 체인 일관성 위반 같은 치명적 에러는 Runner를 멈춤
   */
  private async executeRound(runId: number): Promise<void> {
    try {
      await this.consensusService.runRound();
      if (runId === this.runId) {
        this.completedRounds++;
      }
    } catch (error: unknown) {
      if (runId !== this.runId) {
        this.logger.warn(
          `Round from a previous run failed: ${describeError(error)}`,
        );
        return;
      }
      this.lastError = describeError(error);
      this.logger.error(
        `Round failed, stopping simulation: ${this.lastError}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.clearTimer();
      this.isRunning = false;
    }
  }

  private finish(): void {
    this.isRunning = false;
    this.logger.log('Simulation finished.');
    this.logger.log(
      '\n' + formatChainSummary(this.consensusService.getChainSnapshot()),
    );
  }

  private clearTimer(): void {
    if (this.currentTimeout) {
      clearTimeout(this.currentTimeout);
      this.currentTimeout = null;
    }
  }
}
