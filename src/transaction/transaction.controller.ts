import { Body, Controller, Get, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConsensusService } from '../consensus/consensus.service';
import { SubmitTransactionDto } from './dto/submit-transaction.dto';

/**
 * Transaction Controller
 *
 * Mempool API
 *
 * - GET /transaction/pool
 * - POST /transaction
 */
@ApiTags('transaction')
@Controller('transaction')
export class TransactionController {
  constructor(private readonly consensusService: ConsensusService) {}

  /**
   * Mempool 조회
   *
   * GET /transaction/pool
   */
  @Get('pool')
  @ApiOperation({
    summary: 'Mempool 조회',
    description: '블록에 포함되기를 기다리는 트랜잭션 목록을 조회합니다.',
  })
  @ApiResponse({
    status: 200,
    description: 'Mempool 통계와 트랜잭션 목록',
  })
  getPool() {
    return this.consensusService.getPoolStats();
  }

  /**
   * 트랜잭션 제출
   *
   * POST /transaction
   */
  @Post()
  @ApiOperation({
    summary: '트랜잭션 제출',
    description: '트랜잭션을 Mempool 뒤에 추가합니다. 다음 라운드부터 블록에 포함될 수 있습니다.',
  })
  @ApiResponse({
    status: 201,
    description: '제출 성공',
    schema: {
      example: {
        transaction: {
          sender: '0x1234567890123456789012345678901234567890',
          receiver: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd',
          amount: 2.5,
          metadata: {},
          timestamp: 1700000000000,
        },
        poolSize: 3,
      },
    },
  })
  @ApiResponse({ status: 400, description: '잘못된 요청' })
  async submitTransaction(@Body() dto: SubmitTransactionDto) {
    const { transaction, poolSize } =
      await this.consensusService.submitTransaction(dto);

    return {
      transaction: transaction.toJSON(),
      poolSize,
    };
  }
}
