/**
 * coinbits - encoding and cryptographic primitives for a Bitcoin-style ledger
 */

// Errors
export { CoinbitsError, isCoinbitsError } from './core/errors';
export type { CoinbitsErrorCode } from './core/errors';

// Logging
export { logger } from './core/logger';
export type { LogLevel, LogTag, LogHandler, LoggerConfig } from './core/logger';

// Hex
export {
  toHex,
  toBytes,
  prettyHex,
  reverseHex,
  assertHex,
  isHexDigits,
  assertUint32,
} from './core/hex';

// Base58
export { BASE58_ALPHABET, encodeInt, decodeInt, encodeBase58 } from './core/base58';

// Hashes
export {
  sha256,
  doubleSha256,
  ripemd160,
  hash160,
  checksum,
  bitcoinHash,
} from './core/crypto';

// Addresses
export {
  MAINNET_VERSION,
  hash160ToAddress,
  pubkeyToAddress,
  isAddressChecksumValid,
  isValidAddress,
  hash160FromAddress,
} from './core/address';

// Difficulty target
export {
  compactBitsToHex,
  decodeCompactBits,
  encodeCompactBits,
  decodeTargetFromCompact,
  decodeTargetFromHex,
} from './core/target';
export type { DecodedTarget } from './core/target';

// Merkle tree and blocks
export { merkleMerge, hashMerkleTree, buildMerkleRoot, blockHash } from './core/merkle';
export type { BlockHeader } from './core/merkle';
export { BLOCK_HEADER_SIZE, parseBlockHeader, hashBlockHeader } from './core/block';

// Keys
export {
  isValidPrivateKey,
  inspectKey,
  generateKey,
  getPublicKey,
  openKey,
  signData,
  verifySignature,
  generateAddress,
  ec,
} from './core/keys';
export type { KeyPair, AddressInfo } from './core/keys';

// Networks
export {
  NETWORKS,
  NetworkRegistry,
  defineNetwork,
  resolveNetwork,
  forNetwork,
} from './core/network';
export type { NetworkContext } from './core/network';
export { NETWORK_DEFINITIONS, DEFAULT_NETWORK } from './constants';
export type { NetworkType } from './constants';
export type { NetworkDefinition, NetworkParams } from './types';
