import { StakeThreshold } from '../common/constants/blockchain.constants';

/**
 * Supermajority 확인
 *
 * approving / total >= numerator / denominator
 * → approving * denominator >= total * numerator (나눗셈 없이 비교)
 *
 * 경계값은 확정 (>=)
 * - total 300, 2/3 → approving 200 확정, 199.999 거부
 */
export function meetsThreshold(
  approvingStake: number,
  totalStake: number,
  threshold: StakeThreshold,
): boolean {
  if (totalStake <= 0) {
    return false;
  }
  return (
    approvingStake * threshold.denominator >= totalStake * threshold.numerator
  );
}
