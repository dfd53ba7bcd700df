import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConsensusService } from '../consensus/consensus.service';

/**
 * Validator Controller
 *
 * Validator 조회 API
 *
 * 현재:
 * - 시뮬레이터 생성 시 만들어진 Validator (읽기 전용)
 * - 스테이크 고정 (스테이킹/인출 API 없음)
 */
@ApiTags('validator')
@Controller('validator')
export class ValidatorController {
  constructor(private readonly consensusService: ConsensusService) {}

  /**
   * 모든 Validator 조회
   *
   * GET /validator/list
   */
  @Get('list')
  @ApiOperation({
    summary: '모든 Validator 조회',
    description: 'Validator 주소와 스테이크 목록을 조회합니다.',
  })
  @ApiResponse({
    status: 200,
    description: 'Validator 목록',
  })
  getValidators() {
    const validators = this.consensusService.getValidators();
    return {
      total: validators.length,
      validators: validators.map((v) => v.toJSON()),
    };
  }

  /**
   * Validator 통계
   *
   * GET /validator/stats
   */
  @Get('stats')
  @ApiOperation({
    summary: 'Validator 통계',
    description: 'Validator 수, 전체/최소/최대/평균 스테이크를 조회합니다.',
  })
  @ApiResponse({
    status: 200,
    description: 'Validator 통계',
  })
  getStats() {
    return this.consensusService.getValidatorStats();
  }
}
