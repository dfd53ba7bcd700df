import {
  AMOUNT_DECIMALS,
  SYNTHETIC_AMOUNT_MAX,
  SYNTHETIC_AMOUNT_MIN,
} from '../../common/constants/blockchain.constants';
import { CryptoService } from '../../common/crypto/crypto.service';
import { RandomSource } from '../../common/random/random-source';
import { TransactionRecord, TransactionSource } from './transaction-source.interface';

/**
 * 무작위 송금 금액
 *
 * - [0.1, 10.0] 균등 분포
 * - 소수점 4자리 반올림
 */
export function randomAmount(random: RandomSource): number {
  const value = random.uniform(SYNTHETIC_AMOUNT_MIN, SYNTHETIC_AMOUNT_MAX);
  const factor = 10 ** AMOUNT_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Synthetic Transaction Source
 *
 * 로컬 트랜잭션 생성기 (네트워크 없음, 실패하지 않음)
 * - 발신자/수신자: 무작위 체크섬 주소
 * - 금액: randomAmount()
 * - 메타데이터 없음
 *
 * 원격 피드가 실패했을 때 대체 소스로 사용
 */
export class SyntheticTransactionSource implements TransactionSource {
  readonly name = 'synthetic';

  constructor(
    private readonly random: RandomSource,
    private readonly cryptoService: CryptoService,
  ) {}

  async fetch(count: number): Promise<TransactionRecord[]> {
    const records: TransactionRecord[] = [];

    for (let i = 0; i < count; i++) {
      records.push({
        sender: this.cryptoService.generateAddress(this.random),
        receiver: this.cryptoService.generateAddress(this.random),
        amount: randomAmount(this.random),
      });
    }

    return records;
  }
}
