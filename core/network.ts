/**
 * Network parameters
 *
 * Networks are plain values: nothing in the library reads a process-wide
 * "current network". Callers pass a NetworkParams (or a built-in name) to
 * whatever needs one, or bind helpers once with forNetwork().
 *
 * @example
 * ```ts
 * import { forNetwork, NetworkRegistry } from 'coinbits';
 *
 * const testnet = forNetwork('testnet');
 * const { address } = testnet.generateAddress();
 * testnet.isValidAddress(address); // true
 *
 * const registry = new NetworkRegistry();
 * registry.register('regtest', { ...definition });
 * forNetwork(registry.get('regtest'));
 * ```
 */

import { DEFAULT_NETWORK, NETWORK_DEFINITIONS, type NetworkType } from '../constants';
import type { NetworkDefinition, NetworkParams } from '../types';
import {
  hash160FromAddress,
  hash160ToAddress,
  isValidAddress,
  pubkeyToAddress,
} from './address';
import { hashBlockHeader } from './block';
import { CoinbitsError } from './errors';
import { toBytes } from './hex';
import { generateAddress, type AddressInfo } from './keys';
import { logger } from './logger';

// =============================================================================
// Definition
// =============================================================================

function requireBytes(name: string, field: string, hex: string, length: number): Uint8Array {
  const bytes = toBytes(hex);
  if (bytes.length !== length) {
    throw new CoinbitsError(
      `Network ${name}: ${field} must be ${length} bytes, got ${bytes.length}`,
      'VALIDATION_ERROR'
    );
  }
  return bytes;
}

/**
 * Validate a definition and turn it into frozen parameters
 */
export function defineNetwork(name: string, definition: NetworkDefinition): NetworkParams {
  const magicHead = requireBytes(name, 'magicHead', definition.magicHead, 4);
  requireBytes(name, 'addressVersion', definition.addressVersion, 1);
  requireBytes(name, 'genesisHash', definition.genesisHash, 32);

  const port = definition.defaultPort;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new CoinbitsError(`Network ${name}: invalid default port ${port}`, 'VALIDATION_ERROR');
  }

  return Object.freeze({
    name,
    magicHead,
    addressVersion: definition.addressVersion.toLowerCase(),
    defaultPort: port,
    dnsSeeds: Object.freeze([...definition.dnsSeeds]),
    genesisHash: definition.genesisHash.toLowerCase(),
    genesisBlock: toBytes(definition.genesisBlock),
  });
}

/** Built-in networks */
export const NETWORKS: Readonly<Record<NetworkType, NetworkParams>> = Object.freeze({
  bitcoin: defineNetwork('bitcoin', NETWORK_DEFINITIONS.bitcoin),
  testnet: defineNetwork('testnet', NETWORK_DEFINITIONS.testnet),
});

function isNetworkType(name: string): name is NetworkType {
  return Object.prototype.hasOwnProperty.call(NETWORKS, name);
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Name -> parameters table. Starts with the built-in networks; entries can be
 * added but never replaced.
 */
export class NetworkRegistry {
  private readonly networks = new Map<string, NetworkParams>();

  constructor(includeBuiltins: boolean = true) {
    if (includeBuiltins) {
      for (const params of Object.values(NETWORKS)) {
        this.networks.set(params.name, params);
      }
    }
  }

  register(name: string, definition: NetworkDefinition): NetworkParams {
    if (this.networks.has(name)) {
      throw new CoinbitsError(`Network already registered: ${name}`, 'NETWORK_ALREADY_REGISTERED');
    }
    const params = defineNetwork(name, definition);
    this.networks.set(name, params);
    logger.debug('Network', 'Registered network', { name, addressVersion: params.addressVersion });
    return params;
  }

  get(name: string): NetworkParams {
    const params = this.networks.get(name);
    if (!params) {
      throw new CoinbitsError(`Unknown network: ${name}`, 'UNKNOWN_NETWORK');
    }
    return params;
  }

  has(name: string): boolean {
    return this.networks.has(name);
  }

  names(): string[] {
    return [...this.networks.keys()];
  }
}

/**
 * Accept either a built-in network name or parameters
 */
export function resolveNetwork(network: NetworkType | NetworkParams = DEFAULT_NETWORK): NetworkParams {
  if (typeof network !== 'string') return network;
  if (!isNetworkType(network)) {
    throw new CoinbitsError(`Unknown network: ${network}`, 'UNKNOWN_NETWORK');
  }
  return NETWORKS[network];
}

// =============================================================================
// Bound helpers
// =============================================================================

export interface NetworkContext {
  readonly network: NetworkParams;
  hash160ToAddress(hash160Hex: string): string;
  pubkeyToAddress(publicKey: string): string;
  isValidAddress(address: string): boolean;
  hash160FromAddress(address: string): string | null;
  generateAddress(): AddressInfo;
  genesisHash(): string;
  /** Hash the genesis block header and compare with genesisHash */
  verifyGenesis(): boolean;
}

/**
 * Address and genesis helpers bound to one network's parameters
 */
export function forNetwork(network: NetworkType | NetworkParams = DEFAULT_NETWORK): NetworkContext {
  const params = resolveNetwork(network);
  const version = params.addressVersion;

  return {
    network: params,
    hash160ToAddress: (hash160Hex) => hash160ToAddress(hash160Hex, version),
    pubkeyToAddress: (publicKey) => pubkeyToAddress(publicKey, version),
    isValidAddress: (address) => isValidAddress(address, version),
    hash160FromAddress: (address) => hash160FromAddress(address, version),
    generateAddress: () => generateAddress(version),
    genesisHash: () => params.genesisHash,
    verifyGenesis: () => {
      const computed = hashBlockHeader(params.genesisBlock);
      if (computed !== params.genesisHash) {
        logger.warn('Network', `Genesis hash mismatch on ${params.name}`, {
          expected: params.genesisHash,
          computed,
        });
        return false;
      }
      return true;
    },
  };
}
