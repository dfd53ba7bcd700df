/**
 * 시뮬레이터 전체에서 사용되는 공통 타입 정의
 * 이더리움 주소/해시 형식을 따름
 */

/**
 * Address: 참여자 식별자
 *
 * 형식:
 * - "0x" + 40 hex characters (20 bytes)
 * - EIP-55 체크섬 대소문자 표기
 *
 * 용도:
 * - Validator 식별
 * - 트랜잭션 발신자/수신자
 *
 * 예외:
 * - Genesis Block의 proposer는 고정 sentinel 문자열 (SYSTEM_GENESIS)
 */
export type Address = string;

/**
 * Hash: Keccak-256 해시값
 *
 * 형식:
 * - "0x" + 64 hex characters (32 bytes)
 */
export type Hash = string;

/**
 * Clock: 현재 시각 공급자 (Unix timestamp, milliseconds)
 *
 * 테스트에서 고정 시각을 주입하기 위해 분리
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열에 "0x" 접두사 추가
 */
export function addHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex : '0x' + hex;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 32 = 64 hex chars)
 */
export function isHexString(value: string, byteLength?: number): boolean {
  if (!value || typeof value !== 'string') {
    return false;
  }

  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

/**
 * 주소 형식 검증 (20 bytes, 체크섬은 확인하지 않음)
 */
export function isValidAddress(address: string): boolean {
  return isHexString(address, 20);
}

/**
 * 해시 형식 검증 (32 bytes)
 */
export function isValidHash(hash: string): boolean {
  return isHexString(hash, 32);
}
