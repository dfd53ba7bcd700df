import { Injectable } from '@nestjs/common';
import { bytesToHex, toChecksumAddress } from '@ethereumjs/util';
import createKeccakHash from 'keccak';
import { ADDRESS_BYTE_LENGTH } from '../constants/blockchain.constants';
import { RandomSource } from '../random/random-source';
import { addHexPrefix, Address, Hash } from '../types/common.types';
import { CanonicalValue, canonicalStringify } from '../utils/canonical-json.util';

/**
 * Keccak-256 해시 (Buffer 입력)
 *
 * @returns "0x" + 64 hex characters (32 bytes)
 */
export function keccak256(buffer: Buffer): Hash {
  const hash = createKeccakHash('keccak256').update(buffer).digest('hex');
  return addHexPrefix(hash);
}

/**
 * Keccak-256 해시 (UTF-8 텍스트 입력)
 */
export function keccak256Utf8(text: string): Hash {
  return keccak256(Buffer.from(text, 'utf8'));
}

/**
 * Canonical JSON으로 직렬화한 뒤 Keccak-256
 *
 * 키 순서와 무관하게 같은 값이면 같은 해시 (블록 해시에 사용)
 */
export function keccak256Canonical(value: CanonicalValue): Hash {
  return keccak256Utf8(canonicalStringify(value));
}

/**
 * CryptoService
 *
 * 시뮬레이터의 주소 기능 담당
 * - 체크섬 주소 생성 (EIP-55)
 * - 해싱은 keccak256* 함수 사용 (엔티티에서 DI 없이 호출)
 *
 * 서명은 하지 않음 (트랜잭션 서명은 시뮬레이터 범위 밖)
 */
@Injectable()
export class CryptoService {
  /**
   * 무작위 주소 생성
   *
   * 이더리움:
   * - 공개키 해시의 마지막 20바이트
   *
   * 우리:
   * - 키 쌍 없이 20바이트를 바로 뽑음 (서명이 없으므로)
   * - EIP-55 체크섬 표기로 변환
   *
   * @param random - 바이트를 뽑을 난수 소스 (시드 가능)
   * @returns "0x" + 40 hex (체크섬 대소문자)
   */
  generateAddress(random: RandomSource): Address {
    const bytes = random.bytes(ADDRESS_BYTE_LENGTH);
    return toChecksumAddress(bytesToHex(bytes));
  }
}
