/**
 * Hash primitives
 *
 * SHA-256, RIPEMD-160 and the composites built from them. All functions take
 * and return hex strings; CryptoJS operates on word arrays parsed from hex.
 */

import CryptoJS from 'crypto-js';
import { assertHex, reverseHex } from './hex';

// =============================================================================
// Hash Functions
// =============================================================================

/**
 * Compute SHA256 hash
 */
export function sha256(hex: string): string {
  assertHex(hex);
  return CryptoJS.SHA256(CryptoJS.enc.Hex.parse(hex)).toString();
}

/**
 * Compute double SHA256
 */
export function doubleSha256(hex: string): string {
  return sha256(sha256(hex));
}

/**
 * Compute RIPEMD160 hash
 */
export function ripemd160(hex: string): string {
  assertHex(hex);
  return CryptoJS.RIPEMD160(CryptoJS.enc.Hex.parse(hex)).toString();
}

/**
 * Compute HASH160 (SHA256 -> RIPEMD160), the 20-byte digest addresses commit to
 */
export function hash160(hex: string): string {
  return ripemd160(sha256(hex));
}

/**
 * 4-byte checksum: first 8 hex digits of double SHA256
 */
export function checksum(hex: string): string {
  return doubleSha256(hex).substring(0, 8);
}

/**
 * Double SHA256 in display byte order.
 *
 * Hashes are serialized little-endian but shown and compared big-endian, so
 * the input is reversed before hashing and the digest reversed after.
 *
 * @example
 * ```ts
 * // Merkle parent of two display-order transaction ids
 * bitcoinHash(rightTxid + leftTxid);
 * ```
 */
export function bitcoinHash(hex: string): string {
  return reverseHex(doubleSha256(reverseHex(hex)));
}
