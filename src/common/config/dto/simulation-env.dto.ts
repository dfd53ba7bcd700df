import { Expose, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
} from 'class-validator';
import {
  DEFAULT_BASE_STAKE,
  DEFAULT_FEED_TIMEOUT,
  DEFAULT_FEED_URL,
  DEFAULT_PORT,
  DEFAULT_ROUND_COUNT,
  DEFAULT_ROUND_DELAY,
  DEFAULT_VALIDATOR_COUNT,
} from '../../constants/blockchain.constants';

/**
 * 숫자 환경변수 변환
 *
 * 빈 문자열 → undefined (기본값 유지)
 * 숫자가 아니면 NaN → 검증 단계에서 거부
 */
function toNumber({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * 불리언 환경변수 변환 (true/false, 1/0, 대소문자 무시)
 *
 * 그 외 문자열은 그대로 두어 @IsBoolean에서 거부
 */
function toBoolean({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return value;
}

function toTrimmed({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

/**
 * 시뮬레이션 환경변수 DTO
 *
 * 선언되지 않은 환경변수는 무시 (excludeExtraneousValues)
 * 비어 있거나 없는 값은 필드 기본값 사용
 * FEED_URL만 예외: 빈 문자열은 "원격 피드 끔"
 */
export class SimulationEnvDto {
  @Expose()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  PORT: number = DEFAULT_PORT;

  @Expose()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  VALIDATOR_COUNT: number = DEFAULT_VALIDATOR_COUNT;

  @Expose()
  @Transform(toNumber)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  BASE_STAKE: number = DEFAULT_BASE_STAKE;

  @Expose()
  @Transform(toNumber)
  @IsInt()
  @Min(0)
  ROUND_COUNT: number = DEFAULT_ROUND_COUNT;

  @Expose()
  @Transform(toNumber)
  @IsInt()
  @Min(0)
  ROUND_DELAY_MS: number = DEFAULT_ROUND_DELAY;

  @Expose()
  @Transform(toNumber)
  @IsOptional()
  @IsInt()
  @Min(0)
  SIMULATION_SEED?: number;

  @Expose()
  @Transform(toTrimmed)
  @IsString()
  FEED_URL: string = DEFAULT_FEED_URL;

  @Expose()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  FEED_TIMEOUT_MS: number = DEFAULT_FEED_TIMEOUT;

  @Expose()
  @Transform(toBoolean)
  @IsBoolean()
  AUTO_RUN: boolean = false;
}
