import {
  createRandomSource,
  MathRandomSource,
  SeededRandomSource,
} from '../../../src/common/random/random-source';

/**
 * RandomSource 테스트
 */
describe('RandomSource', () => {
  describe('SeededRandomSource', () => {
    it('같은 시드는 같은 수열을 만들어야 함', () => {
      const first = new SeededRandomSource(42);
      const second = new SeededRandomSource(42);

      const a = Array.from({ length: 5 }, () => first.next());
      const b = Array.from({ length: 5 }, () => second.next());

      expect(a).toEqual(b);
    });

    it('다른 시드는 다른 수열을 만들어야 함', () => {
      const first = new SeededRandomSource(1);
      const second = new SeededRandomSource(2);

      expect(first.next()).not.toBe(second.next());
    });

    it('Park-Miller 수열을 따라야 함', () => {
      const random = new SeededRandomSource(1);

      // state: 1 → 48271
      expect(random.next()).toBe(48270 / 2147483646);
    });

    it('시드 0은 1로 보정해야 함', () => {
      expect(new SeededRandomSource(0).next()).toBe(
        new SeededRandomSource(1).next(),
      );
    });

    it('정수가 아닌 시드는 거부해야 함', () => {
      expect(() => new SeededRandomSource(1.5)).toThrow(RangeError);
    });

    it('next()는 [0, 1) 범위여야 함', () => {
      const random = new SeededRandomSource(7);

      for (let i = 0; i < 1000; i++) {
        const value = random.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('uniform()은 [min, max) 범위여야 함', () => {
      const random = new SeededRandomSource(7);

      for (let i = 0; i < 1000; i++) {
        const value = random.uniform(0.8, 1.5);
        expect(value).toBeGreaterThanOrEqual(0.8);
        expect(value).toBeLessThan(1.5);
      }
    });

    it('integer()는 양끝을 포함해야 함', () => {
      const random = new SeededRandomSource(11);
      const seen = new Set<number>();

      for (let i = 0; i < 1000; i++) {
        const value = random.integer(5, 10);
        expect(Number.isInteger(value)).toBe(true);
        seen.add(value);
      }

      expect([...seen].sort((a, b) => a - b)).toEqual([5, 6, 7, 8, 9, 10]);
    });

    it('integer()는 잘못된 범위를 거부해야 함', () => {
      const random = new SeededRandomSource(11);

      expect(random.integer(3, 3)).toBe(3);
      expect(() => random.integer(5, 4)).toThrow(RangeError);
      expect(() => random.integer(1.5, 3)).toThrow(RangeError);
    });

    it('bytes()는 요청한 길이의 바이트를 반환해야 함', () => {
      const bytes = new SeededRandomSource(3).bytes(20);

      expect(bytes).toHaveLength(20);
      for (const byte of bytes) {
        expect(byte).toBeGreaterThanOrEqual(0);
        expect(byte).toBeLessThanOrEqual(255);
      }
    });
  });

  describe('createRandomSource', () => {
    it('시드가 없으면 MathRandomSource를 반환해야 함', () => {
      expect(createRandomSource()).toBeInstanceOf(MathRandomSource);
    });

    it('시드가 있으면 SeededRandomSource를 반환해야 함', () => {
      const random = createRandomSource(5);

      expect(random).toBeInstanceOf(SeededRandomSource);
      expect(random.next()).toBe(new SeededRandomSource(5).next());
    });
  });
});
