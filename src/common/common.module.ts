import { Global, Module } from '@nestjs/common';
import { loadSimulationConfig, SIMULATION_CONFIG } from './config/simulation.config';
import { CryptoService } from './crypto/crypto.service';

/**
 * CommonModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 자동으로 사용 가능
 *
 * 포함된 Provider:
 * - CryptoService: 해싱, 주소 생성
 * - SIMULATION_CONFIG: 환경변수에서 읽은 시뮬레이션 설정
 */
@Global()
@Module({
  providers: [
    CryptoService,
    {
      provide: SIMULATION_CONFIG,
      useFactory: () => loadSimulationConfig(),
    },
  ],
  exports: [CryptoService, SIMULATION_CONFIG],
})
export class CommonModule {}
