import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { InvalidSimulationConfigError } from '../errors/simulator.errors';
import { SimulationEnvDto } from './dto/simulation-env.dto';

/**
 * SIMULATION_CONFIG 주입 토큰
 */
export const SIMULATION_CONFIG = Symbol('SIMULATION_CONFIG');

/**
 * 시뮬레이션 실행 설정
 *
 * 환경변수:
 * - PORT
 * - VALIDATOR_COUNT, BASE_STAKE
 * - ROUND_COUNT, ROUND_DELAY_MS
 * - SIMULATION_SEED (없으면 Math.random)
 * - FEED_URL (빈 문자열이면 원격 피드 사용 안 함), FEED_TIMEOUT_MS
 * - AUTO_RUN ("true"면 부트스트랩 시 라운드 자동 실행)
 */
export interface SimulationConfig {
  port: number;
  validatorCount: number;
  baseStake: number;
  roundCount: number;
  roundDelayMs: number;
  seed?: number;
  feedUrl: string | null;
  feedTimeoutMs: number;
  autoRun: boolean;
}

/**
 * 환경변수 → SimulationConfig
 *
 * SimulationEnvDto로 변환 후 class-validator로 검증
 * 실패 → InvalidSimulationConfigError (모든 위반 사항을 메시지에 포함)
 */
export function loadSimulationConfig(
  env: NodeJS.ProcessEnv = process.env,
): SimulationConfig {
  const dto = plainToInstance(SimulationEnvDto, env, {
    excludeExtraneousValues: true,
    exposeUnsetFields: false,
  });

  const errors = validateSync(dto);
  if (errors.length > 0) {
    const violations = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new InvalidSimulationConfigError(
      `Invalid simulation config: ${violations.join('; ')}`,
    );
  }

  const config: SimulationConfig = {
    port: dto.PORT,
    validatorCount: dto.VALIDATOR_COUNT,
    baseStake: dto.BASE_STAKE,
    roundCount: dto.ROUND_COUNT,
    roundDelayMs: dto.ROUND_DELAY_MS,
    feedUrl: dto.FEED_URL === '' ? null : dto.FEED_URL,
    feedTimeoutMs: dto.FEED_TIMEOUT_MS,
    autoRun: dto.AUTO_RUN,
  };

  if (dto.SIMULATION_SEED !== undefined) {
    config.seed = dto.SIMULATION_SEED;
  }

  return config;
}
