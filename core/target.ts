/**
 * Compact Difficulty Target ("nBits")
 *
 * A 32-bit value packing a size byte and a 3-byte mantissa:
 * target = mantissa * 256^(size - 3). Encoding truncates the target to its
 * three most significant content bytes, so large targets lose precision.
 */

import { CoinbitsError } from './errors';
import { assertUint32, isHexDigits, toBytes } from './hex';

/** Width of a full target in hex digits (256 bits) */
const TARGET_HEX_LENGTH = 64;

export interface DecodedTarget {
  /** Full-precision target */
  target: bigint;
  /** Compact representation */
  bits: number;
}

function parseHexInt(hex: string): bigint {
  if (hex.length === 0 || !isHexDigits(hex)) {
    throw new CoinbitsError('Malformed hex: expected hex digits', 'MALFORMED_HEX');
  }
  return BigInt('0x' + hex);
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Expand compact bits to the target as hex, left-padded to 64 digits
 *
 * @example
 * ```ts
 * compactBitsToHex(0x1d00ffff);
 * // '00000000ffff0000000000000000000000000000000000000000000000000000'
 * ```
 *
 * @throws CoinbitsError VALIDATION_ERROR unless bits is a 32-bit unsigned integer
 */
export function compactBitsToHex(bits: number): string {
  assertUint32('Compact bits', bits);
  const size = (bits >>> 24) & 0xff;
  const bytes = new Array<number>(size).fill(0);
  if (size >= 1) bytes[0] = (bits >>> 16) & 0xff;
  if (size >= 2) bytes[1] = (bits >>> 8) & 0xff;
  if (size >= 3) bytes[2] = bits & 0xff;

  return bytes
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('')
    .padStart(TARGET_HEX_LENGTH, '0');
}

/**
 * Expand compact bits to the full target
 */
export function decodeCompactBits(bits: number): bigint {
  return BigInt('0x' + compactBitsToHex(bits));
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Pack a target into compact bits.
 *
 * The target is laid out as a length-prefixed big number with an explicit
 * zero sign byte before the magnitude bytes: [len(4) | 00 | magnitude...].
 * The size byte counts everything after the length prefix and the mantissa
 * is the three bytes starting at the sign byte.
 *
 * @example
 * ```ts
 * encodeCompactBits(0xffffn << 208n); // 0x1d00ffff
 * ```
 */
export function encodeCompactBits(target: bigint): number {
  if (target < 0n) {
    throw new CoinbitsError('Target must be non-negative', 'VALIDATION_ERROR');
  }

  let magnitudeHex = target.toString(16);
  if (magnitudeHex.length % 2 !== 0) magnitudeHex = '0' + magnitudeHex;
  const magnitude = toBytes(magnitudeHex);

  const bytes = new Uint8Array(4 + 1 + magnitude.length);
  new DataView(bytes.buffer).setUint32(0, magnitude.length + 1);
  bytes.set(magnitude, 5);

  const size = bytes.length - 4;
  if (size > 0xff) {
    throw new CoinbitsError(`Target too large for compact form: ${size} bytes`, 'FIELD_TOO_LONG');
  }

  let nbits = size << 24;
  if (size >= 1) nbits |= bytes[4] << 16;
  if (size >= 2) nbits |= bytes[5] << 8;
  if (size >= 3) nbits |= bytes[6];
  return nbits >>> 0;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize compact bits to both representations
 */
export function decodeTargetFromCompact(bits: number): DecodedTarget {
  return { target: decodeCompactBits(bits), bits };
}

/**
 * Normalize a hex target to both representations
 *
 * @example
 * ```ts
 * decodeTargetFromHex('00000000ffff0000000000000000000000000000000000000000000000000000');
 * // { target: 0xffffn << 208n, bits: 0x1d00ffff }
 * ```
 */
export function decodeTargetFromHex(hex: string): DecodedTarget {
  const target = parseHexInt(hex);
  return { target, bits: encodeCompactBits(target) };
}
