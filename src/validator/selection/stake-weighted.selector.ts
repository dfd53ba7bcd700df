import { RandomSource } from '../../common/random/random-source';

export interface Staked {
  readonly stake: number;
}

/**
 * 스테이크 가중 무작위 선택 (Leader 선택)
 *
 * 이더리움:
 * - RANDAO 기반 의사 난수 + 유효 잔액 가중치
 *
 * 우리:
 * 1. 누적 스테이크 테이블 생성 [s1, s1+s2, ...]
 * 2. u = random.next() * totalStake  (u ∈ [0, total))
 * 3. cumulative[i] > u 인 첫 번째 i를 이진 탐색
 *
 * 선택 확률 = stake / totalStake
 *
 * @param candidates - 후보 (비어 있으면 에러)
 * @param random - 난수 소스 (한 번만 뽑음)
 */
export function selectByStake<T extends Staked>(
  candidates: readonly T[],
  random: RandomSource,
): T {
  if (candidates.length === 0) {
    throw new Error('No validators to select from');
  }

  const cumulative: number[] = [];
  let total = 0;
  for (const candidate of candidates) {
    total += candidate.stake;
    cumulative.push(total);
  }

  const target = random.next() * total;
  return candidates[findFirstGreater(cumulative, target)];
}

/**
 * cumulative[i] > target 인 가장 작은 i
 *
 * target < total 이므로 항상 존재하지만, 부동소수점 경계에서는 마지막 인덱스로 고정
 */
function findFirstGreater(cumulative: readonly number[], target: number): number {
  let low = 0;
  let high = cumulative.length - 1;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (cumulative[mid] > target) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return low;
}
