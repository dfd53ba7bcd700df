import { Module } from '@nestjs/common';
import { BlockModule } from './block/block.module';
import { CommonModule } from './common/common.module';
import { ConsensusModule } from './consensus/consensus.module';
import { TransactionModule } from './transaction/transaction.module';
import { ValidatorModule } from './validator/validator.module';

/**
 * AppModule
 *
 * 애플리케이션의 루트 모듈
 *
 * Global Modules:
 * - CommonModule: 전역 유틸리티 (CryptoService, SIMULATION_CONFIG)
 *
 * Feature Modules:
 * - ConsensusModule: 시뮬레이터 소유, 합의 라운드 실행
 * - BlockModule: 블록/체인 조회
 * - ValidatorModule: Validator 조회
 * - TransactionModule: Mempool 조회/제출
 */
@Module({
  imports: [
    // Global Modules
    CommonModule, // @Global() - CryptoService, SIMULATION_CONFIG 전역 제공

    // Feature Modules
    ConsensusModule,
    BlockModule,
    ValidatorModule,
    TransactionModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
