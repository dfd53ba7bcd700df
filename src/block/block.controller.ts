import {
  Controller,
  Get,
  NotFoundException,
  Param,
} from '@nestjs/common';
import {
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ConsensusService } from '../consensus/consensus.service';
import { BlockDto, ChainVerificationDto } from './dto/block.dto';

/**
 * Block Controller
 *
 * 블록 조회 API (읽기 전용)
 *
 * - GET /block/latest
 * - GET /block/list
 * - GET /block/summary
 * - GET /block/verify
 * - GET /block/hash/:hash
 * - GET /block/:index
 *
 * 참고:
 * - 블록 생성 API 없음 (합의 라운드로만 추가)
 */
@ApiTags('block')
@Controller('block')
export class BlockController {
  constructor(private readonly consensusService: ConsensusService) {}

  /**
   * 최신 블록 조회
   *
   * GET /block/latest
   */
  @Get('latest')
  @ApiOperation({
    summary: '최신 블록 조회',
    description: '가장 최근에 추가된 블록(Tip)을 조회합니다.',
  })
  @ApiResponse({ status: 200, description: '최신 블록 정보', type: BlockDto })
  getLatestBlock(): BlockDto {
    return this.consensusService.getLatestBlock().toJSON();
  }

  /**
   * 전체 체인 조회
   *
   * GET /block/list
   */
  @Get('list')
  @ApiOperation({
    summary: '전체 체인 조회',
    description: 'Genesis Block부터 Tip까지 모든 블록을 조회합니다.',
  })
  @ApiResponse({ status: 200, description: '블록 목록', type: [BlockDto] })
  getBlocks() {
    const blocks = this.consensusService.getChainSnapshot();
    return {
      total: blocks.length,
      blocks: blocks.map((block) => block.toJSON()),
    };
  }

  /**
   * 체인 요약
   *
   * GET /block/summary
   */
  @Get('summary')
  @ApiOperation({
    summary: '체인 요약',
    description: '블록당 한 줄짜리 요약을 조회합니다.',
  })
  @ApiResponse({
    status: 200,
    description: '체인 요약',
    schema: {
      example: {
        lines: ['Block(#0 | Val: ENESIS | Txs: 0 | Hash: 3f9c1a)'],
      },
    },
  })
  getSummary() {
    return { lines: this.consensusService.getChainSummary() };
  }

  /**
   * 체인 전체 재검증
   *
   * GET /block/verify
   */
  @Get('verify')
  @ApiOperation({
    summary: '체인 재검증',
    description: '모든 블록의 번호, 해시 연결, 해시 무결성을 다시 확인합니다.',
  })
  @ApiResponse({
    status: 200,
    description: '검증 결과',
    type: ChainVerificationDto,
  })
  verify(): ChainVerificationDto {
    return this.consensusService.verifyChain();
  }

  /**
   * 블록 해시로 조회
   *
   * GET /block/hash/:hash
   */
  @Get('hash/:hash')
  @ApiOperation({
    summary: '블록 해시로 조회',
    description: '특정 블록 해시의 블록을 조회합니다.',
  })
  @ApiParam({
    name: 'hash',
    description: '블록 해시',
    example:
      '0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef',
  })
  @ApiResponse({ status: 200, description: '블록 정보', type: BlockDto })
  @ApiResponse({ status: 400, description: '해시 형식 오류' })
  @ApiResponse({ status: 404, description: '블록을 찾을 수 없음' })
  getBlockByHash(@Param('hash') hash: string): BlockDto {
    return this.consensusService.getBlockByHash(hash).toJSON();
  }

  /**
   * 블록 번호로 조회
   *
   * GET /block/:index
   */
  @Get(':index')
  @ApiOperation({
    summary: '블록 번호로 조회',
    description: '특정 번호의 블록을 조회합니다.',
  })
  @ApiParam({ name: 'index', description: '블록 번호', example: '0' })
  @ApiResponse({ status: 200, description: '블록 정보', type: BlockDto })
  @ApiResponse({ status: 404, description: '블록을 찾을 수 없음' })
  getBlock(@Param('index') index: string): BlockDto {
    const blockIndex = Number(index);

    if (!Number.isInteger(blockIndex) || blockIndex < 0) {
      throw new NotFoundException('Invalid block number');
    }

    return this.consensusService.getBlock(blockIndex).toJSON();
  }
}
