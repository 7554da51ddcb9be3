/**
 * Base58Check Addresses
 *
 * address = base58(version || hash160 || checksum(version || hash160))
 *
 * Version 00 gets a literal '1' in front of the Base58 digits, since the
 * integer encoding drops the zero version byte.
 */

import { decodeInt, encodeBase58 } from './base58';
import { checksum, hash160 } from './crypto';
import { CoinbitsError } from './errors';
import { isHexDigits } from './hex';
import { logger } from './logger';

/** Version byte of the main network */
export const MAINNET_VERSION = '00';

const HASH160_HEX_LENGTH = 40;
const CHECKSUM_HEX_LENGTH = 8;

/**
 * Lowercase a one-byte version, throwing MALFORMED_HEX for anything else
 */
function normalizeVersion(version: string): string {
  if (version.length !== 2 || !isHexDigits(version)) {
    throw new CoinbitsError(`Malformed hex: version must be one byte, got '${version}'`, 'MALFORMED_HEX');
  }
  return version.toLowerCase();
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Create address from a hash160
 *
 * @example
 * ```ts
 * hash160ToAddress('62e907b15cbf27d5425399ebf6f0fb50ebb88f18', '00');
 * // '1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa'
 * ```
 */
export function hash160ToAddress(hash160Hex: string, version: string): string {
  const normalized = normalizeVersion(version);
  const payload = normalized + hash160Hex;
  const address = encodeBase58(payload + checksum(payload));
  return normalized === MAINNET_VERSION ? '1' + address : address;
}

/**
 * Create address from a hex-encoded public key
 */
export function pubkeyToAddress(publicKey: string, version: string): string {
  return hash160ToAddress(hash160(publicKey), version);
}

// =============================================================================
// Decoding
// =============================================================================

interface DecodedAddress {
  version: string;
  hash160: string;
  checksum: string;
}

/**
 * Split an address into version, hash160 and checksum.
 * Returns null when the decoded value has the wrong width.
 * `version` must already be normalized.
 */
function decodeAddress(address: string, version: string): DecodedAddress | null {
  const value = decodeInt(address);
  const versionLength = version === MAINNET_VERSION ? 0 : version.length;
  const width = versionLength + HASH160_HEX_LENGTH + CHECKSUM_HEX_LENGTH;

  const hex = value.toString(16).padStart(width, '0');
  if (hex.length !== width) return null;

  return {
    version: version === MAINNET_VERSION ? MAINNET_VERSION : hex.substring(0, versionLength),
    hash160: hex.substring(versionLength, versionLength + HASH160_HEX_LENGTH),
    checksum: hex.substring(width - CHECKSUM_HEX_LENGTH),
  };
}

function checksumMatches(decoded: DecodedAddress): boolean {
  return checksum(decoded.version + decoded.hash160) === decoded.checksum;
}

/**
 * Check the trailing 4 bytes against the checksum of the payload before them
 *
 * @throws CoinbitsError INVALID_BASE58_CHARACTER
 */
export function isAddressChecksumValid(address: string, version: string): boolean {
  const decoded = decodeAddress(address, normalizeVersion(version));
  return decoded !== null && checksumMatches(decoded);
}

/**
 * Validate an address for the given version byte.
 *
 * Wrong but well-formed addresses return false; characters outside the
 * Base58 alphabet still throw.
 *
 * @throws CoinbitsError INVALID_BASE58_CHARACTER, MALFORMED_HEX for a malformed version
 */
export function isValidAddress(address: string, rawVersion: string): boolean {
  const version = normalizeVersion(rawVersion);
  const decoded = decodeAddress(address, version);
  if (!decoded) {
    logger.debug('Address', 'Rejected address: wrong payload width', { address, version });
    return false;
  }

  if (version === MAINNET_VERSION ? address[0] !== '1' : decoded.version !== version) {
    logger.debug('Address', 'Rejected address: version mismatch', { address, version });
    return false;
  }

  if (!checksumMatches(decoded)) {
    logger.debug('Address', 'Rejected address: bad checksum', { address, version });
    return false;
  }

  return true;
}

/**
 * Extract the hash160 from an address, or null if its checksum fails
 */
export function hash160FromAddress(address: string, version: string): string | null {
  const decoded = decodeAddress(address, normalizeVersion(version));
  return decoded && checksumMatches(decoded) ? decoded.hash160 : null;
}
