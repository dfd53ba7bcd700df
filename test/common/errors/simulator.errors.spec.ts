import {
  ChainConsistencyViolationError,
  describeError,
  ExternalSourceError,
  InvalidTransactionError,
  SimulatorError,
} from '../../../src/common/errors/simulator.errors';

/**
 * 시뮬레이터 에러 테스트
 */
describe('Simulator Errors', () => {
  it('에러 이름은 클래스 이름이어야 함', () => {
    const error = new InvalidTransactionError('bad amount');

    expect(error).toBeInstanceOf(SimulatorError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidTransactionError');
    expect(error.message).toBe('bad amount');
  });

  it('원인을 보존해야 함', () => {
    const cause = new Error('socket hang up');
    const error = new ExternalSourceError('feed failed', { cause });

    expect(error.cause).toBe(cause);
  });

  it('체인 일관성 위반은 블록 번호와 해시를 담아야 함', () => {
    const hash = '0x' + 'ab'.repeat(32);
    const error = new ChainConsistencyViolationError(4, hash);

    expect(error.blockIndex).toBe(4);
    expect(error.blockHash).toBe(hash);
    expect(error.message).toBe(
      `Block #4 (${hash}) failed final validation despite consensus`,
    );
  });

  it('unknown 값에서 메시지를 추출해야 함', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain string')).toBe('plain string');
    expect(describeError(42)).toBe('42');
  });
});
