/**
 * Canonical JSON 직렬화
 *
 * 해시 입력용 직렬화 규칙:
 * - 객체 키는 모든 깊이에서 사전순 정렬
 * - 배열은 저장된 순서 그대로
 * - undefined 멤버는 생략
 * - 공백 없음
 *
 * 같은 필드 값 → 항상 같은 문자열 (키 삽입 순서와 무관)
 */
export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

export function canonicalStringify(value: CanonicalValue): string {
  return encode(value, new Set<object>());
}

function encode(value: CanonicalValue, seen: Set<object>): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot canonicalize non-finite number: ${value}`);
    }
    return JSON.stringify(value);
  }

  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }

  if (seen.has(value)) {
    throw new TypeError('Cannot canonicalize circular structure');
  }
  seen.add(value);

  let encoded: string;
  if (isCanonicalArray(value)) {
    encoded = '[' + value.map((item) => encode(item, seen)).join(',') + ']';
  } else {
    const record = value;
    const members = Object.keys(record)
      .sort()
      .filter((key) => record[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${encode(record[key], seen)}`);
    encoded = '{' + members.join(',') + '}';
  }

  seen.delete(value);
  return encoded;
}

function isCanonicalArray(
  value: CanonicalValue,
): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}
