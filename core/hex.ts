/**
 * Hex Encoding
 * Conversion between byte buffers and lowercase hex strings
 */

import { CoinbitsError } from './errors';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

const UINT32_MAX = 0xffffffff;

/**
 * True when every character is a hex digit (either case). Length is not checked.
 */
export function isHexDigits(str: string): boolean {
  return HEX_PATTERN.test(str);
}

/**
 * Throw unless `value` is an integer in [0, 2^32 - 1].
 *
 * Negative and fractional values are VALIDATION_ERROR; values past 32 bits
 * throw `overflowCode`.
 */
export function assertUint32(
  name: string,
  value: number,
  overflowCode: 'VALIDATION_ERROR' | 'FIELD_TOO_LONG' = 'VALIDATION_ERROR'
): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new CoinbitsError(`${name} must be a non-negative integer, got ${value}`, 'VALIDATION_ERROR');
  }
  if (value > UINT32_MAX) {
    throw new CoinbitsError(`${name} does not fit in 32 bits: ${value}`, overflowCode);
  }
}

/**
 * Throw MALFORMED_HEX unless `hex` is an even-length string of hex digits
 */
export function assertHex(hex: string): void {
  if (hex.length % 2 !== 0) {
    throw new CoinbitsError(`Malformed hex: odd length ${hex.length}`, 'MALFORMED_HEX');
  }
  if (!isHexDigits(hex)) {
    throw new CoinbitsError('Malformed hex: non-hex characters', 'MALFORMED_HEX');
  }
}

/**
 * Convert Uint8Array to hex string
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Convert hex string to Uint8Array
 *
 * @example
 * ```ts
 * toBytes('f9beb4d9'); // Uint8Array [249, 190, 180, 217]
 * toBytes('abc');      // throws CoinbitsError (MALFORMED_HEX)
 * ```
 */
export function toBytes(hex: string): Uint8Array {
  assertHex(hex);
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Space-separated byte pairs, for display only
 */
export function prettyHex(hex: string): string {
  return (hex.match(/.{1,2}/g) ?? []).join(' ');
}

/**
 * Reverse the byte order of a hex string (little-endian <-> big-endian)
 */
export function reverseHex(hex: string): string {
  return toHex(toBytes(hex).reverse());
}
