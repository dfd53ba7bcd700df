/**
 * RandomSource
 *
 * 시뮬레이터가 사용하는 모든 난수는 여기서 나옴
 * - Leader 선택
 * - 스테이크 변동
 * - 합성 트랜잭션 금액/주소
 *
 * 시드를 주면 같은 시드 = 같은 시뮬레이션 (테스트 재현성)
 */
export interface RandomSource {
  /**
   * [0, 1) 균등 분포
   */
  next(): number;

  /**
   * [min, max) 균등 분포
   */
  uniform(min: number, max: number): number;

  /**
   * [min, max] 정수 (양끝 포함)
   */
  integer(min: number, max: number): number;

  /**
   * 무작위 바이트
   */
  bytes(length: number): Uint8Array;
}

abstract class BaseRandomSource implements RandomSource {
  abstract next(): number;

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  integer(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`Invalid integer range: [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  bytes(length: number): Uint8Array {
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      result[i] = Math.floor(this.next() * 256);
    }
    return result;
  }
}

/**
 * LCG (Linear Congruential Generator, Park-Miller minimal standard)
 *
 * - state = state * 48271 mod (2^31 - 1)
 * - state는 [1, 2^31 - 2] 범위를 유지해야 함 (0이면 계속 0)
 */
const LCG_MULTIPLIER = 48271;
const LCG_MODULUS = 2147483647;

export class SeededRandomSource extends BaseRandomSource {
  private state: number;

  constructor(seed: number) {
    super();
    if (!Number.isInteger(seed)) {
      throw new RangeError(`Seed must be an integer: ${seed}`);
    }
    const normalized = ((seed % LCG_MODULUS) + LCG_MODULUS) % LCG_MODULUS;
    this.state = normalized === 0 ? 1 : normalized;
  }

  next(): number {
    // 48271 * (2^31 - 2) < 2^53 이므로 number로 정확히 계산됨
    this.state = (this.state * LCG_MULTIPLIER) % LCG_MODULUS;
    return (this.state - 1) / (LCG_MODULUS - 1);
  }
}

export class MathRandomSource extends BaseRandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * 시드가 있으면 결정적, 없으면 Math.random
 */
export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined
    ? new MathRandomSource()
    : new SeededRandomSource(seed);
}
