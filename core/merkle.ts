/**
 * Merkle Tree and Block Hash
 *
 * Hashes are display-order hex throughout; bitcoinHash handles the
 * little-endian serialization.
 */

import { bitcoinHash } from './crypto';
import { CoinbitsError } from './errors';
import { assertUint32 } from './hex';

const HASH_HEX_LENGTH = 64;
const UINT32_HEX_LENGTH = 8;

export interface BlockHeader {
  /** Previous block hash, display order */
  prevBlock: string;
  /** Merkle root, display order */
  merkleRoot: string;
  /** Unix timestamp */
  time: number;
  /** Compact difficulty target */
  bits: number;
  nonce: number;
  version: number;
}

// =============================================================================
// Merkle Tree
// =============================================================================

/**
 * Parent of two Merkle nodes. The right node is concatenated first because
 * bitcoinHash reverses the whole buffer before hashing.
 */
export function merkleMerge(left: string, right: string): string {
  return bitcoinHash(right + left);
}

/**
 * Every level of the Merkle tree, flattened: leaves first, root last.
 * An odd node at the end of a level is paired with itself.
 */
export function hashMerkleTree(leaves: readonly string[]): string[] {
  const levels: string[][] = [[...leaves]];

  let level = levels[0];
  while (level.length >= 2) {
    const next: string[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = i + 1 < level.length ? level[i + 1] : left;
      next.push(merkleMerge(left, right));
    }
    levels.push(next);
    level = next;
  }

  return levels.flat();
}

/**
 * Merkle root of an ordered list of transaction hashes
 *
 * @example
 * ```ts
 * buildMerkleRoot([txid]);       // txid
 * buildMerkleRoot([a, b, c]);    // merkleMerge(merkleMerge(a, b), merkleMerge(c, c))
 * ```
 */
export function buildMerkleRoot(leaves: readonly string[]): string {
  if (leaves.length === 0) {
    throw new CoinbitsError('Cannot build a merkle root from an empty list', 'VALIDATION_ERROR');
  }
  const tree = hashMerkleTree(leaves);
  return tree[tree.length - 1];
}

// =============================================================================
// Block Hash
// =============================================================================

function hashField(name: string, hex: string): string {
  if (hex.length > HASH_HEX_LENGTH) {
    throw new CoinbitsError(
      `Header field ${name} is ${hex.length} hex digits, max ${HASH_HEX_LENGTH}`,
      'FIELD_TOO_LONG'
    );
  }
  return hex.padStart(HASH_HEX_LENGTH, '0');
}

function uint32Field(name: string, value: number): string {
  assertUint32(`Header field ${name}`, value, 'FIELD_TOO_LONG');
  return value.toString(16).padStart(UINT32_HEX_LENGTH, '0');
}

/**
 * Hash of a block header given its fields.
 *
 * Fields are laid out big-endian in reverse order
 * (nonce, bits, time, merkle root, previous hash, version) so that
 * bitcoinHash's byte reversal yields the serialized header.
 */
export function blockHash(header: BlockHeader): string {
  const serialized =
    uint32Field('nonce', header.nonce) +
    uint32Field('bits', header.bits) +
    uint32Field('time', header.time) +
    hashField('merkleRoot', header.merkleRoot) +
    hashField('prevBlock', header.prevBlock) +
    uint32Field('version', header.version);
  return bitcoinHash(serialized);
}
