/**
 * Base58 Integer Codec
 *
 * Base58 here is a positional integer encoding: leading zero bytes are not
 * mapped to leading '1's. Address encoding adds its own '1' for version 00.
 */

import { CoinbitsError } from './errors';
import { isHexDigits } from './hex';

// =============================================================================
// Constants
// =============================================================================

/** Base58 alphabet (no 0, O, I or l) */
export const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

const BASE = BigInt(BASE58_ALPHABET.length);

/** Hex digits that fit in 256 bits; longer input is cut off by encodeBase58 */
const MAX_ENCODED_HEX_DIGITS = 64;

// =============================================================================
// Integer Encoding
// =============================================================================

/**
 * Encode a non-negative integer as Base58
 *
 * @example
 * ```ts
 * encodeInt(0n);  // '1'
 * encodeInt(58n); // '21'
 * ```
 */
export function encodeInt(value: bigint): string {
  if (value < 0n) {
    throw new CoinbitsError('Cannot Base58-encode a negative integer', 'VALIDATION_ERROR');
  }

  let num = value;
  let encoded = '';
  while (num >= BASE) {
    const remainder = num % BASE;
    encoded = BASE58_ALPHABET[Number(remainder)] + encoded;
    num = num / BASE;
  }

  return BASE58_ALPHABET[Number(num)] + encoded;
}

/**
 * Decode a Base58 string to an integer
 *
 * @throws CoinbitsError INVALID_BASE58_CHARACTER for characters outside the alphabet
 */
export function decodeInt(str: string): bigint {
  let num = 0n;
  for (const char of str) {
    const index = BASE58_ALPHABET.indexOf(char);
    if (index === -1) {
      throw new CoinbitsError(`Invalid base58 character: ${char}`, 'INVALID_BASE58_CHARACTER');
    }
    num = num * BASE + BigInt(index);
  }
  return num;
}

/**
 * Base58 encode the numeric value of a hex string.
 *
 * Only the first 64 hex digits are used; anything past 256 bits is dropped
 * without error. Existing addresses depend on this, so it stays.
 */
export function encodeBase58(hex: string): string {
  const head = hex.substring(0, MAX_ENCODED_HEX_DIGITS);
  if (!isHexDigits(head)) {
    throw new CoinbitsError('Malformed hex: non-hex characters', 'MALFORMED_HEX');
  }
  return encodeInt(head.length === 0 ? 0n : BigInt('0x' + head));
}
