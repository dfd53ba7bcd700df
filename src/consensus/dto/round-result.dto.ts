import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BlockDto } from '../../block/dto/block.dto';
import { RoundResult, RoundState } from '../consensus.types';

/**
 * 투표 집계 DTO
 */
export class VoteTallyDto {
  @ApiProperty({ example: 7023.41 })
  approvingStake!: number;

  @ApiProperty({ example: 10456.12 })
  totalStake!: number;

  @ApiProperty({ example: 0.6717 })
  ratio!: number;

  @ApiProperty({ type: [String] })
  approvals!: string[];

  @ApiProperty({ type: [String] })
  rejections!: string[];
}

/**
 * 라운드 결과 응답 DTO
 */
export class RoundResultDto {
  @ApiProperty({ description: '라운드 번호 (1부터)', example: 1 })
  round!: number;

  @ApiProperty({ enum: [RoundState.COMMITTED, RoundState.REJECTED] })
  state!: RoundState;

  @ApiPropertyOptional({ enum: ['EMPTY_POOL', 'CONSENSUS_NOT_REACHED'] })
  reason?: string;

  @ApiProperty({ description: '대상 블록 번호', example: 1 })
  blockIndex!: number;

  @ApiPropertyOptional({ description: 'Leader 주소' })
  leader?: string;

  @ApiPropertyOptional({ type: BlockDto })
  block?: BlockDto;

  @ApiPropertyOptional({ type: VoteTallyDto })
  tally?: VoteTallyDto;

  @ApiProperty({ enum: RoundState, isArray: true })
  transitions!: RoundState[];

  static from(result: RoundResult): RoundResultDto {
    const dto = new RoundResultDto();
    dto.round = result.round;
    dto.state = result.state;
    dto.reason = result.reason;
    dto.blockIndex = result.blockIndex;
    dto.leader = result.leader;
    dto.block = result.block?.toJSON();
    dto.tally = result.tally;
    dto.transitions = [...result.transitions];
    return dto;
  }
}
