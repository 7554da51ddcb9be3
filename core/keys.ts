/**
 * secp256k1 keys
 *
 * Key generation, ECDSA signing and verification, and address derivation.
 * Curve arithmetic is delegated to elliptic.
 */

import elliptic from 'elliptic';
import { pubkeyToAddress } from './address';
import { hash160 } from './crypto';
import { CoinbitsError } from './errors';
import { assertHex } from './hex';
import { logger } from './logger';

// =============================================================================
// Constants
// =============================================================================

const ec = new elliptic.ec('secp256k1');

/** secp256k1 curve order */
const CURVE_ORDER = BigInt(
  '0xFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFEBAAEDCE6AF48A03BBFD25E8CD0364141'
);

const PRIVATE_KEY_HEX_LENGTH = 64;
const PUBLIC_KEY_HEX_LENGTH = 130;

// =============================================================================
// Types
// =============================================================================

export interface KeyPair {
  /** Private scalar, 64 hex digits */
  privateKey: string;
  /** Uncompressed public point, 130 hex digits */
  publicKey: string;
}

export interface AddressInfo extends KeyPair {
  address: string;
  hash160: string;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate if a hex string is a valid secp256k1 private key
 * Must be 0 < key < n (curve order)
 */
export function isValidPrivateKey(hex: string): boolean {
  if (!/^[0-9a-fA-F]{1,64}$/.test(hex)) {
    return false;
  }
  const key = BigInt('0x' + hex);
  return key > 0n && key < CURVE_ORDER;
}

function keyFromPrivate(privateKey: string): elliptic.ec.KeyPair {
  if (!isValidPrivateKey(privateKey)) {
    throw new CoinbitsError('Invalid private key', 'INVALID_PRIVATE_KEY');
  }
  return ec.keyFromPrivate(privateKey, 'hex');
}

function keyFromPublic(publicKey: string): elliptic.ec.KeyPair {
  let key: elliptic.ec.KeyPair;
  try {
    assertHex(publicKey);
    key = ec.keyFromPublic(publicKey, 'hex');
  } catch (err) {
    throw new CoinbitsError('Invalid public key: cannot decode point', 'INVALID_PUBLIC_KEY', err);
  }

  const { result, reason } = key.validate();
  if (!result) {
    throw new CoinbitsError(`Invalid public key: ${reason}`, 'INVALID_PUBLIC_KEY');
  }
  return key;
}

// =============================================================================
// Key Pair Operations
// =============================================================================

/**
 * Fixed-width hex view of an elliptic key pair
 *
 * @throws CoinbitsError INVALID_PRIVATE_KEY for a public-only key
 */
export function inspectKey(key: elliptic.ec.KeyPair): KeyPair {
  if (!key.getPrivate()) {
    throw new CoinbitsError('Key pair has no private key', 'INVALID_PRIVATE_KEY');
  }
  return {
    privateKey: key.getPrivate('hex').padStart(PRIVATE_KEY_HEX_LENGTH, '0'),
    publicKey: key.getPublic(false, 'hex').padStart(PUBLIC_KEY_HEX_LENGTH, '0'),
  };
}

/**
 * Generate a fresh key pair
 */
export function generateKey(): KeyPair {
  return inspectKey(ec.genKeyPair());
}

/**
 * Get public key from private key
 * @param privateKey - Private key as hex string
 * @param compressed - Return compressed public key (default: false)
 */
export function getPublicKey(privateKey: string, compressed: boolean = false): string {
  return keyFromPrivate(privateKey).getPublic(compressed, 'hex');
}

/**
 * Open an elliptic key pair from hex.
 * When a public key is given it must belong to the private key.
 */
export function openKey(privateKey: string, publicKey?: string): elliptic.ec.KeyPair {
  const key = keyFromPrivate(privateKey);
  if (publicKey !== undefined && !keyFromPublic(publicKey).getPublic().eq(key.getPublic())) {
    throw new CoinbitsError('Public key does not match private key', 'INVALID_PUBLIC_KEY');
  }
  return key;
}

// =============================================================================
// Signatures
// =============================================================================

/**
 * Sign a message digest
 * @returns DER-encoded signature as hex
 */
export function signData(privateKey: string, digest: string): string {
  assertHex(digest);
  return keyFromPrivate(privateKey).sign(digest, { canonical: true }).toDER('hex');
}

/**
 * Verify a DER signature over a message digest.
 * Malformed signatures verify as false; undecodable public keys throw.
 *
 * @throws CoinbitsError INVALID_PUBLIC_KEY
 */
export function verifySignature(digest: string, signature: string, publicKey: string): boolean {
  assertHex(digest);
  const key = keyFromPublic(publicKey);
  try {
    return key.verify(digest, signature);
  } catch (err) {
    logger.debug('Keys', 'Signature could not be parsed', err);
    return false;
  }
}

// =============================================================================
// Address Generation
// =============================================================================

/**
 * Generate a fresh key pair and its address
 *
 * @example
 * ```ts
 * const { address, privateKey } = generateAddress('6f');
 * // address starts with 'm' or 'n' on testnet
 * ```
 */
export function generateAddress(version: string): AddressInfo {
  const { privateKey, publicKey } = generateKey();
  return {
    address: pubkeyToAddress(publicKey, version),
    privateKey,
    publicKey,
    hash160: hash160(publicKey),
  };
}

// Re-export elliptic instance for advanced use cases
export { ec };
