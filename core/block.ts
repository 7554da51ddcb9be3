/**
 * Serialized block header reading
 */

import { CoinbitsError } from './errors';
import { reverseHex, toHex } from './hex';
import { blockHash, type BlockHeader } from './merkle';

/** Size of a serialized block header in bytes */
export const BLOCK_HEADER_SIZE = 80;

/**
 * Read the 80-byte header at the start of a serialized block.
 *
 * Layout (all little-endian): version(4) prevBlock(32) merkleRoot(32)
 * time(4) bits(4) nonce(4). Hashes are returned in display order.
 */
export function parseBlockHeader(block: Uint8Array): BlockHeader {
  if (block.length < BLOCK_HEADER_SIZE) {
    throw new CoinbitsError(
      `Block header needs ${BLOCK_HEADER_SIZE} bytes, got ${block.length}`,
      'VALIDATION_ERROR'
    );
  }

  const view = new DataView(block.buffer, block.byteOffset, BLOCK_HEADER_SIZE);

  return {
    version: view.getUint32(0, true),
    prevBlock: reverseHex(toHex(block.subarray(4, 36))),
    merkleRoot: reverseHex(toHex(block.subarray(36, 68))),
    time: view.getUint32(68, true),
    bits: view.getUint32(72, true),
    nonce: view.getUint32(76, true),
  };
}

/**
 * Hash of the header at the start of a serialized block
 */
export function hashBlockHeader(block: Uint8Array): string {
  return blockHash(parseBlockHeader(block));
}
