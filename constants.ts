/**
 * Library constants
 */

import type { NetworkDefinition } from './types';

// =============================================================================
// Networks
// =============================================================================

/** Coinbase transaction shared by both genesis blocks */
const GENESIS_COINBASE =
  '01000000010000000000000000000000000000000000000000000000000000000000000000ffffffff4d04ffff001d0104455468652054696d65732030332f4a616e2f32303039204368616e63656c6c6f72206f6e206272696e6b206f66207365636f6e64206261696c6f757420666f722062616e6b73ffffffff0100f2052a01000000434104678afdb0fe5548271967f1a67130b7105cd6a828e03909a67962e0ea1f61deb649f6bc3f4cef38c4f35504e51ec112de5c384df7ba0b8d578a4c702b6bf11d5fac00000000';

/** Genesis header prefix: version 1, no previous block, merkle root of the coinbase */
const GENESIS_HEADER_PREFIX =
  '0100000000000000000000000000000000000000000000000000000000000000000000003ba3edfd7a7b12b27ac72c3e67768f617fc81bc3888a51323a9fb8aa4b1e5e4a';

export const NETWORK_DEFINITIONS = {
  bitcoin: {
    magicHead: 'f9beb4d9',
    addressVersion: '00',
    defaultPort: 8333,
    dnsSeeds: ['bitseed.xf2.org', 'bitseed.bitcoin.org.uk'],
    genesisHash: '000000000019d6689c085ae165831e934ff763ae46a2a6c172b3f1b60a8ce26f',
    // time 29ab5f49, bits ffff001d, nonce 1dac2b7c, 1 transaction
    genesisBlock: GENESIS_HEADER_PREFIX + '29ab5f49ffff001d1dac2b7c' + '01' + GENESIS_COINBASE,
  },
  testnet: {
    magicHead: 'fabfb5da',
    addressVersion: '6f',
    defaultPort: 18333,
    dnsSeeds: [],
    genesisHash: '00000007199508e34a9ff81e6ec0c477a4cccff2a4767a8eee39c11db367b008',
    genesisBlock: GENESIS_HEADER_PREFIX + 'dae5494df8ff071dff0bec16' + '01' + GENESIS_COINBASE,
  },
} as const satisfies Record<string, NetworkDefinition>;

export type NetworkType = keyof typeof NETWORK_DEFINITIONS;

export const DEFAULT_NETWORK: NetworkType = 'bitcoin';
