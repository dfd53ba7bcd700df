import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConsensusService } from './consensus.service';
import { ResetSimulatorDto, StartRunnerDto } from './dto/reset-simulator.dto';
import { RoundResultDto } from './dto/round-result.dto';
import { SimulationRunner } from './runner/simulation.runner';

/**
 * Consensus Controller
 *
 * 합의 라운드 실행/조회 API
 *
 * - POST /consensus/round: 라운드 1회 실행
 * - GET /consensus/stats, /consensus/history
 * - POST /consensus/reset: 시뮬레이터 재생성
 * - POST /consensus/runner/start|stop, GET /consensus/runner/status
 */
@ApiTags('consensus')
@Controller('consensus')
export class ConsensusController {
  constructor(
    private readonly consensusService: ConsensusService,
    private readonly simulationRunner: SimulationRunner,
  ) {}

  /**
   * 라운드 1회 실행
   *
   * POST /consensus/round
   */
  @Post('round')
  @HttpCode(200)
  @ApiOperation({
    summary: '합의 라운드 실행',
    description:
      'Leader 선택 → 블록 제안 → 스테이크 가중 투표 → 2/3 이상이면 체인에 추가합니다.',
  })
  @ApiResponse({ status: 200, description: '라운드 결과', type: RoundResultDto })
  async runRound(): Promise<RoundResultDto> {
    const result = await this.consensusService.runRound();
    return RoundResultDto.from(result);
  }

  /**
   * Consensus 통계
   *
   * GET /consensus/stats
   */
  @Get('stats')
  @ApiOperation({
    summary: 'Consensus 통계',
    description: '라운드 수, 확정/거부 수, 체인 길이, 전체 스테이크 등을 조회합니다.',
  })
  @ApiResponse({ status: 200, description: 'Consensus 통계' })
  getStats() {
    return this.consensusService.getStats();
  }

  /**
   * 최근 라운드 결과
   *
   * GET /consensus/history
   */
  @Get('history')
  @ApiOperation({
    summary: '최근 라운드 결과',
    description: '최근 라운드 결과를 오래된 순으로 조회합니다.',
  })
  @ApiResponse({ status: 200, type: [RoundResultDto] })
  getHistory(): RoundResultDto[] {
    return this.consensusService
      .getRoundHistory()
      .map((result) => RoundResultDto.from(result));
  }

  /**
   * 시뮬레이터 재생성
   *
   * POST /consensus/reset
   */
  @Post('reset')
  @HttpCode(200)
  @ApiOperation({
    summary: '시뮬레이터 재생성',
    description: '새 Genesis Block, 새 Validator 집합, 빈 Mempool로 다시 시작합니다.',
  })
  @ApiResponse({ status: 200, description: '재생성 성공' })
  @ApiResponse({ status: 400, description: '잘못된 요청' })
  async reset(@Body() dto: ResetSimulatorDto) {
    await this.consensusService.reset(dto.validatorCount, dto.baseStake);
    return {
      success: true,
      stats: this.consensusService.getStats(),
    };
  }

  /**
   * Runner 시작
   *
   * POST /consensus/runner/start
   */
  @Post('runner/start')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Runner 시작',
    description: '설정된 간격으로 지정한 수만큼 라운드를 자동 실행합니다.',
  })
  startRunner(@Body() dto: StartRunnerDto) {
    this.simulationRunner.start(dto.rounds);
    return {
      success: true,
      status: this.simulationRunner.getStatus(),
    };
  }

  /**
   * Runner 중지
   *
   * POST /consensus/runner/stop
   */
  @Post('runner/stop')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Runner 중지',
    description: '예약된 다음 라운드를 취소합니다.',
  })
  stopRunner() {
    this.simulationRunner.stop();
    return {
      success: true,
      status: this.simulationRunner.getStatus(),
    };
  }

  /**
   * Runner 상태
   *
   * GET /consensus/runner/status
   */
  @Get('runner/status')
  @ApiOperation({ summary: 'Runner 상태' })
  getRunnerStatus() {
    return this.simulationRunner.getStatus();
  }
}
