import { isValidChecksumAddress } from '@ethereumjs/util';
import { Test, TestingModule } from '@nestjs/testing';
import {
  CryptoService,
  keccak256Canonical,
  keccak256Utf8,
} from '../../../src/common/crypto/crypto.service';
import { SeededRandomSource } from '../../../src/common/random/random-source';

/**
 * 해싱 함수 / CryptoService 테스트
 *
 * 테스트 범위:
 * - Keccak-256 해싱
 * - Canonical JSON 해싱
 * - 체크섬 주소 생성
 */
describe('keccak256Utf8', () => {
  it('빈 문자열의 Keccak-256 해시를 계산해야 함', () => {
    expect(keccak256Utf8('')).toBe(
      '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470',
    );
  });

  it('"abc"의 Keccak-256 해시를 계산해야 함', () => {
    expect(keccak256Utf8('abc')).toBe(
      '0x4e03657aea45a94fc7d47ba826c8d667c0d1e6e33a64a036ec44f58fa12d6c45',
    );
  });
});

describe('keccak256Canonical', () => {
  it('키 순서와 무관하게 같은 해시를 반환해야 함', () => {
    const first = keccak256Canonical({ b: 1, a: 2 });
    const second = keccak256Canonical({ a: 2, b: 1 });

    expect(first).toBe(second);
    expect(first).toBe(keccak256Utf8('{"a":2,"b":1}'));
  });

  it('값이 다르면 다른 해시를 반환해야 함', () => {
    expect(keccak256Canonical({ a: 1 })).not.toBe(keccak256Canonical({ a: 2 }));
  });
});

describe('CryptoService', () => {
  let service: CryptoService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CryptoService],
    }).compile();

    service = module.get<CryptoService>(CryptoService);
  });

  describe('generateAddress', () => {
    it('EIP-55 체크섬 주소를 생성해야 함', () => {
      const address = service.generateAddress(new SeededRandomSource(1));

      expect(address).toMatch(/^0x[0-9a-fA-F]{40}$/);
      expect(isValidChecksumAddress(address)).toBe(true);
    });

    it('같은 시드는 같은 주소를 생성해야 함', () => {
      expect(service.generateAddress(new SeededRandomSource(9))).toBe(
        service.generateAddress(new SeededRandomSource(9)),
      );
    });

    it('연속 생성된 주소는 달라야 함', () => {
      const random = new SeededRandomSource(9);

      expect(service.generateAddress(random)).not.toBe(
        service.generateAddress(random),
      );
    });
  });
});
