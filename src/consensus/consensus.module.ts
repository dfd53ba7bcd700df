import { Module } from '@nestjs/common';
import { ConsensusController } from './consensus.controller';
import { ConsensusService } from './consensus.service';
import { SimulationRunner } from './runner/simulation.runner';

/**
 * Consensus Module
 *
 * POS 합의 시뮬레이션
 *
 * 구성:
 * - ConsensusService: 시뮬레이터 소유, 라운드 실행
 * - SimulationRunner: 라운드 자동 실행 (간격 유지)
 * - ConsensusController: 라운드 실행/통계 API
 */
@Module({
  controllers: [ConsensusController],
  providers: [ConsensusService, SimulationRunner],
  exports: [ConsensusService],
})
export class ConsensusModule {}
