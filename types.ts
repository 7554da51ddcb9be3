/**
 * Shared types
 */

/**
 * Network parameters as written in configuration: byte fields are hex.
 */
export interface NetworkDefinition {
  /** Message start bytes, 4 bytes */
  magicHead: string;
  /** Address version byte, 2 hex digits */
  addressVersion: string;
  defaultPort: number;
  dnsSeeds: readonly string[];
  /** Genesis block hash, display order */
  genesisHash: string;
  /** Serialized genesis block */
  genesisBlock: string;
}

/**
 * Registered, immutable network parameters
 */
export interface NetworkParams {
  readonly name: string;
  readonly magicHead: Uint8Array;
  readonly addressVersion: string;
  readonly defaultPort: number;
  readonly dnsSeeds: readonly string[];
  readonly genesisHash: string;
  readonly genesisBlock: Uint8Array;
}
