import { CONSENSUS_THRESHOLD } from '../../src/common/constants/blockchain.constants';
import { meetsThreshold } from '../../src/consensus/consensus.threshold';

/**
 * 2/3 Supermajority 판정 테스트
 */
describe('meetsThreshold', () => {
  it('정확히 2/3이면 확정해야 함', () => {
    expect(meetsThreshold(200, 300, CONSENSUS_THRESHOLD)).toBe(true);
  });

  it('2/3에 조금이라도 못 미치면 거부해야 함', () => {
    expect(meetsThreshold(199.999, 300, CONSENSUS_THRESHOLD)).toBe(false);
  });

  it('전원 찬성이면 확정해야 함', () => {
    expect(meetsThreshold(300, 300, CONSENSUS_THRESHOLD)).toBe(true);
  });

  it('나눗셈 없이 소수 스테이크도 판정해야 함', () => {
    expect(meetsThreshold(0.6667, 1, CONSENSUS_THRESHOLD)).toBe(true);
    expect(meetsThreshold(0.6666, 1, CONSENSUS_THRESHOLD)).toBe(false);
  });

  it('전체 스테이크가 0이면 거부해야 함', () => {
    expect(meetsThreshold(0, 0, CONSENSUS_THRESHOLD)).toBe(false);
  });

  it('다른 비율도 적용해야 함', () => {
    const half = { numerator: 1, denominator: 2 };

    expect(meetsThreshold(50, 100, half)).toBe(true);
    expect(meetsThreshold(49, 100, half)).toBe(false);
  });
});
