import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { formatChainSummary } from '../block/utils/chain-summary.util';
import { loadSimulationConfig } from '../common/config/simulation.config';
import { CryptoService } from '../common/crypto/crypto.service';
import { describeError } from '../common/errors/simulator.errors';
import { createRandomSource } from '../common/random/random-source';
import { LoggingConsensusObserver } from '../consensus/consensus.observer';
import { newSimulator } from '../consensus/simulator';
import { HttpTransactionSource } from '../transaction/source/http-transaction.source';

/**
 * 시뮬레이션 실행 스크립트 (HTTP 서버 없이)
 *
 * 1. 환경변수에서 설정 로드
 * 2. 시뮬레이터 생성
 * 3. ROUND_DELAY_MS 간격으로 ROUND_COUNT번 라운드 실행 (라운드마다 체인 요약 출력)
 * 4. 최종 체인 요약 출력
 *
 * 실행:
 *   npm run build && npm run simulate
 *   VALIDATOR_COUNT=4 ROUND_COUNT=3 SIMULATION_SEED=42 npm run simulate
 */

const logger = new Logger('Simulation');

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main(): Promise<void> {
  const config = loadSimulationConfig();
  const cryptoService = new CryptoService();
  const random = createRandomSource(config.seed);

  const source = config.feedUrl
    ? new HttpTransactionSource(
        { url: config.feedUrl, timeoutMs: config.feedTimeoutMs },
        random,
        cryptoService,
      )
    : null;

  const simulator = newSimulator(config.validatorCount, config.baseStake, {
    random,
    source,
    cryptoService,
    observer: new LoggingConsensusObserver(),
  });

  for (const validator of simulator.getValidators()) {
    logger.log(
      `Validator ${validator.shortAddress()} initialized with stake: ${validator.stake.toFixed(2)}`,
    );
  }

  for (let i = 0; i < config.roundCount; i++) {
    await sleep(config.roundDelayMs);
    await simulator.runRound();
    console.log(`\n${formatChainSummary(simulator.getChainSnapshot())}\n`);
  }

  logger.log('Simulation finished.');
  console.log(formatChainSummary(simulator.getChainSnapshot()));
}

main().catch((error: unknown) => {
  logger.error(
    `Simulation aborted: ${describeError(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exitCode = 1;
});
