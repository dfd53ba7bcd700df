import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsNumber,
  IsOptional,
  Min,
  ValidateBy,
  ValidationOptions,
} from 'class-validator';
import { isValidAddress } from '../../common/types/common.types';

/**
 * 주소 형식 검증 (0x + 40 hex, 체크섬 무시)
 */
function IsAddress(validationOptions?: ValidationOptions) {
  return ValidateBy(
    {
      name: 'isAddress',
      validator: {
        validate: (value: unknown): boolean =>
          typeof value === 'string' && isValidAddress(value),
        defaultMessage: () =>
          '$property must be an address (0x + 40 hex characters)',
      },
    },
    validationOptions,
  );
}

/**
 * 값이 모두 문자열인 평범한 객체인지 검증
 */
function IsStringRecord(validationOptions?: ValidationOptions) {
  return ValidateBy(
    {
      name: 'isStringRecord',
      validator: {
        validate: (value: unknown): boolean =>
          typeof value === 'object' &&
          value !== null &&
          !Array.isArray(value) &&
          Object.values(value).every((v) => typeof v === 'string'),
        defaultMessage: () =>
          '$property must be an object whose values are all strings',
      },
    },
    validationOptions,
  );
}

/**
 * 트랜잭션 제출 요청 DTO
 *
 * 검증 규칙:
 * - sender/receiver: 0x로 시작하는 40자리 hex
 * - amount: 0 이상 숫자
 * - metadata: 문자열 → 문자열 (선택)
 */
export class SubmitTransactionDto {
  @ApiProperty({
    description: '발신자 주소 (0x + 40자리 hex)',
    example: '0x1234567890123456789012345678901234567890',
  })
  @IsAddress()
  sender!: string;

  @ApiProperty({
    description: '수신자 주소 (0x + 40자리 hex)',
    example: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd',
  })
  @IsAddress()
  receiver!: string;

  @ApiProperty({
    description: '송금 금액 (0 이상)',
    example: 2.5,
  })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  amount!: number;

  @ApiPropertyOptional({
    description: '부가 정보 (문자열 → 문자열)',
    example: { memo: 'coffee' },
  })
  @IsOptional()
  @IsStringRecord()
  metadata?: Record<string, string>;
}

/**
 * 트랜잭션 응답 DTO
 */
export class TransactionDto {
  @ApiProperty({ example: '0x1234567890123456789012345678901234567890' })
  sender!: string;

  @ApiProperty({ example: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd' })
  receiver!: string;

  @ApiProperty({ example: 2.5 })
  amount!: number;

  @ApiProperty({ example: { api_title: 'sunt aut facere' } })
  metadata!: Record<string, string>;

  @ApiProperty({
    description: '생성 시간 (Unix timestamp, milliseconds)',
    example: 1700000000000,
  })
  timestamp!: number;
}
