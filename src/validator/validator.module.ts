import { Module } from '@nestjs/common';
import { ConsensusModule } from '../consensus/consensus.module';
import { ValidatorController } from './validator.controller';

/**
 * Validator Module
 *
 * Validator 조회 API
 *
 * 구성:
 * - ValidatorController: Validator 목록/통계
 *
 * Validator 엔티티와 Leader 선택은 시뮬레이터가 사용
 */
@Module({
  imports: [ConsensusModule],
  controllers: [ValidatorController],
})
export class ValidatorModule {}
