import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNumber, IsPositive, Max, Min } from 'class-validator';

/**
 * 시뮬레이터 재생성 요청 DTO
 *
 * 검증 규칙:
 * - validatorCount: 1 ~ 1000 정수
 * - baseStake: 양수
 */
export class ResetSimulatorDto {
  @ApiProperty({ description: 'Validator 수', example: 10 })
  @IsInt()
  @Min(1)
  @Max(1000)
  validatorCount!: number;

  @ApiProperty({ description: '기준 스테이크', example: 1000 })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  baseStake!: number;
}

/**
 * Runner 시작 요청 DTO
 */
export class StartRunnerDto {
  @ApiProperty({ description: '실행할 라운드 수', example: 5 })
  @IsInt()
  @Min(1)
  @Max(10000)
  rounds!: number;
}
