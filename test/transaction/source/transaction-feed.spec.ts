import { Logger } from '@nestjs/common';
import { InvalidTransactionError } from '../../../src/common/errors/simulator.errors';
import { TransactionPool } from '../../../src/transaction/pool/transaction.pool';
import { TransactionFeed } from '../../../src/transaction/source/transaction-feed';
import { TransactionRecord } from '../../../src/transaction/source/transaction-source.interface';
import {
  createStubSource,
  createTransaction,
  FIXED_TIME,
  fixedClock,
  testAddress,
} from '../../utils/test-fixtures';

/**
 * TransactionFeed 테스트
 *
 * 테스트 범위:
 * - 원격 소스 성공 → remote
 * - 원격 소스 실패 → 로컬 생성 대체
 * - Pool 뒤에 추가
 */
describe('TransactionFeed', () => {
  const remoteRecords: TransactionRecord[] = [
    {
      sender: testAddress(1),
      receiver: testAddress(2),
      amount: 1.25,
      metadata: { api_title: 'first post' },
    },
    { sender: testAddress(3), receiver: testAddress(4), amount: 3 },
  ];
  const localRecords: TransactionRecord[] = [
    { sender: testAddress(5), receiver: testAddress(6), amount: 0.5 },
  ];

  let pool: TransactionPool;

  beforeEach(() => {
    pool = new TransactionPool();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('원격 소스의 레코드를 트랜잭션으로 변환해 추가해야 함', async () => {
    const primary = createStubSource('remote', remoteRecords);
    const fallback = createStubSource('synthetic', localRecords);
    const feed = new TransactionFeed(primary, fallback, fixedClock);

    const result = await feed.fill(pool, 2);

    expect(result).toEqual({ added: 2, origin: 'remote' });
    expect(primary.fetch).toHaveBeenCalledWith(2);
    expect(fallback.fetch).not.toHaveBeenCalled();

    const [first, second] = pool.getAll();
    expect(first.toJSON()).toEqual({
      sender: testAddress(1),
      receiver: testAddress(2),
      amount: 1.25,
      metadata: { api_title: 'first post' },
      timestamp: FIXED_TIME,
    });
    expect(second.metadata).toEqual({});
  });

  it('기존 트랜잭션 뒤에 추가해야 함', async () => {
    const existing = createTransaction(9);
    pool.add(existing);
    const feed = new TransactionFeed(
      null,
      createStubSource('synthetic', localRecords),
      fixedClock,
    );

    await feed.fill(pool, 1);

    expect(pool.size()).toBe(2);
    expect(pool.getAll()[0]).toBe(existing);
    expect(pool.getAll()[1].amount).toBe(0.5);
  });

  it('원격 소스가 실패하면 로컬 생성으로 대체해야 함', async () => {
    const errorSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    const primary = createStubSource('remote');
    primary.fetch.mockRejectedValue(new Error('connection refused'));
    const fallback = createStubSource('synthetic', localRecords);
    const feed = new TransactionFeed(primary, fallback, fixedClock);

    const result = await feed.fill(pool, 1);

    expect(result).toEqual({ added: 1, origin: 'synthetic' });
    expect(fallback.fetch).toHaveBeenCalledWith(1);
    expect(pool.size()).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to fetch transactions from remote: connection refused. Generating locally.',
    );
  });

  it('원격 소스가 없으면 바로 로컬 생성해야 함', async () => {
    const fallback = createStubSource('synthetic', localRecords);
    const feed = new TransactionFeed(null, fallback, fixedClock);

    const result = await feed.fill(pool, 1);

    expect(result.origin).toBe('synthetic');
    expect(fallback.fetch).toHaveBeenCalledWith(1);
  });

  it('소스가 빈 배열을 주면 아무것도 추가하지 않아야 함', async () => {
    const feed = new TransactionFeed(
      null,
      createStubSource('synthetic'),
      fixedClock,
    );

    const result = await feed.fill(pool, 5);

    expect(result).toEqual({ added: 0, origin: 'synthetic' });
    expect(pool.size()).toBe(0);
  });

  it('금액이 잘못된 레코드가 있으면 Pool을 바꾸지 않고 에러를 전파해야 함', async () => {
    const feed = new TransactionFeed(
      createStubSource('remote', [
        { sender: testAddress(1), receiver: testAddress(2), amount: 1 },
        { sender: testAddress(1), receiver: testAddress(2), amount: -1 },
      ]),
      createStubSource('synthetic'),
      fixedClock,
    );

    await expect(feed.fill(pool, 2)).rejects.toThrow(InvalidTransactionError);
    expect(pool.size()).toBe(0);
  });
});
