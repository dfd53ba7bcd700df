import { TransactionPool } from '../../../src/transaction/pool/transaction.pool';
import { createTransaction, createTransactions } from '../../utils/test-fixtures';

/**
 * TransactionPool 테스트
 *
 * 테스트 범위:
 * - FIFO 추가/조회
 * - 앞에서부터 제거
 * - 통계
 */
describe('TransactionPool', () => {
  let pool: TransactionPool;

  beforeEach(() => {
    pool = new TransactionPool();
  });

  describe('트랜잭션 추가', () => {
    it('도착 순서대로 저장해야 함', () => {
      const [first, second, third] = createTransactions(3);

      pool.add(first);
      pool.addMany([second, third]);

      expect(pool.size()).toBe(3);
      expect(pool.getAll()).toEqual([first, second, third]);
    });
  });

  describe('peek', () => {
    it('앞에서부터 가져오되 제거하지 않아야 함', () => {
      const txs = createTransactions(7);
      pool.addMany(txs);

      const batch = pool.peek(5);

      expect(batch).toEqual(txs.slice(0, 5));
      expect(pool.size()).toBe(7);
    });

    it('개수보다 적으면 있는 만큼 반환해야 함', () => {
      const txs = createTransactions(2);
      pool.addMany(txs);

      expect(pool.peek(5)).toEqual(txs);
    });

    it('0 이하이면 빈 배열을 반환해야 함', () => {
      pool.addMany(createTransactions(2));

      expect(pool.peek(0)).toEqual([]);
      expect(pool.peek(-1)).toEqual([]);
    });
  });

  describe('removeFirst', () => {
    it('앞에서부터 제거하고 나머지 순서를 유지해야 함', () => {
      const txs = createTransactions(7);
      pool.addMany(txs);

      const removed = pool.removeFirst(5);

      expect(removed).toEqual(txs.slice(0, 5));
      expect(pool.getAll()).toEqual([txs[5], txs[6]]);
    });
  });

  describe('getAll', () => {
    it('복사본을 반환해야 함', () => {
      pool.addMany(createTransactions(2));

      const all = pool.getAll();
      all.pop();

      expect(pool.size()).toBe(2);
    });
  });

  describe('통계', () => {
    it('개수와 총 금액을 반환해야 함', () => {
      pool.add(createTransaction(1.5));
      pool.add(createTransaction(2.5));

      const stats = pool.getStats();

      expect(stats.pendingCount).toBe(2);
      expect(stats.totalAmount).toBe(4);
      expect(stats.transactions.map((tx) => tx.amount)).toEqual([1.5, 2.5]);
    });

    it('모두 제거하면 빈 통계를 반환해야 함', () => {
      pool.addMany(createTransactions(3));
      pool.removeFirst(3);

      expect(pool.getStats()).toEqual({
        pendingCount: 0,
        totalAmount: 0,
        transactions: [],
      });
    });
  });
});
