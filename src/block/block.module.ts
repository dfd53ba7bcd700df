import { Module } from '@nestjs/common';
import { ConsensusModule } from '../consensus/consensus.module';
import { BlockController } from './block.controller';

/**
 * Block Module
 *
 * 블록/체인 조회 API
 *
 * 체인 자체는 시뮬레이터(ConsensusService)가 소유
 */
@Module({
  imports: [ConsensusModule],
  controllers: [BlockController],
})
export class BlockModule {}
