import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TransactionDto } from '../../transaction/dto/submit-transaction.dto';

/**
 * 블록 응답 DTO
 */
export class BlockDto {
  @ApiProperty({ description: '블록 번호', example: 1 })
  index!: number;

  @ApiProperty({
    description: '블록 해시',
    example: '0x' + 'a'.repeat(64),
  })
  hash!: string;

  @ApiProperty({
    description: '이전 블록 해시',
    example: '0x' + '0'.repeat(64),
  })
  previousHash!: string;

  @ApiProperty({
    description: '생성 시간 (Unix timestamp, milliseconds)',
    example: 1700000000000,
  })
  timestamp!: number;

  @ApiProperty({
    description: '블록 제안자 주소',
    example: '0x1234567890123456789012345678901234567890',
  })
  proposer!: string;

  @ApiProperty({ description: '트랜잭션 개수', example: 5 })
  transactionCount!: number;

  @ApiProperty({ type: [TransactionDto] })
  transactions!: TransactionDto[];
}

/**
 * 체인 검증 결과 DTO
 */
export class ChainVerificationDto {
  @ApiProperty({ example: true })
  valid!: boolean;

  @ApiProperty({ description: '체인 길이 (Genesis 포함)', example: 6 })
  length!: number;

  @ApiPropertyOptional({ description: '처음 실패한 블록 번호' })
  failedAt?: number;

  @ApiPropertyOptional({
    enum: [
      'INVALID_GENESIS',
      'INVALID_INDEX',
      'INVALID_PREVIOUS_HASH',
      'INVALID_HASH',
    ],
  })
  reason?: string;
}
