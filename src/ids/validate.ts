import { IdentifierError } from '../errors';
import type { Identifier } from '../types';

export const MAX_STRING_ID_LENGTH = 255;

// " + / ? \ `
const RESERVED_CODE_POINTS: ReadonlySet<number> = new Set([0x22, 0x2b, 0x2f, 0x3f, 0x5c, 0x60]);
const RESERVED_VALUES: ReadonlySet<string> = new Set(['.', '..']);

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function isDefaultStringId(id: string | null | undefined): boolean {
  return id === null || id === undefined || id === '';
}

export function isDefaultNumericId(id: bigint | number): boolean {
  return id === 0 || id === 0n;
}

export function isDefaultIdentifier(id: Identifier): boolean {
  return id.kind === 'string' ? isDefaultStringId(id.value) : isDefaultNumericId(id.value);
}

/** ISO control: U+0000..U+001F and U+007F..U+009F. */
export function isControlCodePoint(codePoint: number): boolean {
  return codePoint <= 0x1f || (codePoint >= 0x7f && codePoint <= 0x9f);
}

export function containsControlCharacter(s: string): boolean {
  for (const ch of s) {
    if (isControlCodePoint(ch.codePointAt(0) ?? 0)) return true;
  }
  return false;
}

export function containsReservedCharacter(s: string): boolean {
  for (const ch of s) {
    if (RESERVED_CODE_POINTS.has(ch.codePointAt(0) ?? 0)) return true;
  }
  return false;
}

function codePointLength(s: string): number {
  let n = 0;
  for (const _ of s) n += 1;
  return n;
}

/**
 * Raw string-id legality. The default sentinel (null, undefined or '') passes;
 * operations that need an existing row reject it separately via {@link requireConcreteId}.
 */
export function isValidStringId(id: string | null | undefined): boolean {
  if (id === null || id === undefined || id === '') return true;

  return (
    codePointLength(id) <= MAX_STRING_ID_LENGTH &&
    !containsControlCharacter(id) &&
    !containsReservedCharacter(id) &&
    !RESERVED_VALUES.has(id)
  );
}

export function isValidNumericId(id: bigint | number): boolean {
  return isDefaultNumericId(id) || id > 0;
}

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

export function isValidIdentifier(id: Identifier): boolean {
  return id.kind === 'string' ? isValidStringId(id.value) : isValidNumericId(id.value);
}

/** Second-tier check for delete, update and lookup: a malformed id or the default sentinel fails. */
export function requireConcreteId(id: Identifier, subject = 'id'): Identifier {
  if (id.kind === 'string') {
    if (!isValidStringId(id.value) || isDefaultStringId(id.value)) {
      throw new IdentifierError('InvalidStringIdentifier', `The string ${subject} is invalid.`);
    }
    return id;
  }

  if (!isValidNumericId(id.value) || isDefaultNumericId(id.value)) {
    throw new IdentifierError('InvalidNumericIdentifier', `The numeric ${subject} is invalid.`);
  }
  return id;
}
