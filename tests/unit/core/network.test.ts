import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  NETWORKS,
  NetworkRegistry,
  defineNetwork,
  forNetwork,
  resolveNetwork,
} from '../../../core/network';
import { NETWORK_DEFINITIONS } from '../../../constants';
import { CoinbitsError } from '../../../core/errors';
import { logger } from '../../../core/logger';
import { toHex } from '../../../core/hex';
import type { NetworkDefinition } from '../../../types';

const GENESIS_PUBKEY =
  '04678afdb0fe5548271967f1a67130b7105cd6a828e03909a67962e0ea1f61deb649f6bc3f4cef38c4f35504e51ec112de5c384df7ba0b8d578a4c702b6bf11d5f';

const REGTEST: NetworkDefinition = {
  magicHead: 'fabfb5da',
  addressVersion: '6F',
  defaultPort: 18444,
  dnsSeeds: [],
  genesisHash: NETWORK_DEFINITIONS.testnet.genesisHash,
  genesisBlock: NETWORK_DEFINITIONS.testnet.genesisBlock,
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof CoinbitsError ? err.code : undefined;
  }
  return undefined;
}

describe('network', () => {
  afterEach(() => {
    logger.reset();
  });

  describe('NETWORKS', () => {
    it('should describe the main network', () => {
      const bitcoin = NETWORKS.bitcoin;
      expect(bitcoin.name).toBe('bitcoin');
      expect(toHex(bitcoin.magicHead)).toBe('f9beb4d9');
      expect(bitcoin.addressVersion).toBe('00');
      expect(bitcoin.defaultPort).toBe(8333);
      expect(bitcoin.dnsSeeds).toEqual(['bitseed.xf2.org', 'bitseed.bitcoin.org.uk']);
      expect(bitcoin.genesisBlock).toHaveLength(285);
    });

    it('should describe the test network', () => {
      const testnet = NETWORKS.testnet;
      expect(toHex(testnet.magicHead)).toBe('fabfb5da');
      expect(testnet.addressVersion).toBe('6f');
      expect(testnet.defaultPort).toBe(18333);
      expect(testnet.dnsSeeds).toEqual([]);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(NETWORKS)).toBe(true);
      expect(Object.isFrozen(NETWORKS.bitcoin)).toBe(true);
      expect(Object.isFrozen(NETWORKS.bitcoin.dnsSeeds)).toBe(true);
    });
  });

  describe('defineNetwork', () => {
    it('should normalize hex case', () => {
      expect(defineNetwork('regtest', REGTEST).addressVersion).toBe('6f');
    });

    it('should reject a magic head that is not 4 bytes', () => {
      expect(codeOf(() => defineNetwork('bad', { ...REGTEST, magicHead: 'fabfb5' }))).toBe('VALIDATION_ERROR');
    });

    it('should reject a version that is not 1 byte', () => {
      expect(codeOf(() => defineNetwork('bad', { ...REGTEST, addressVersion: '0000' }))).toBe('VALIDATION_ERROR');
    });

    it('should reject malformed genesis bytes', () => {
      expect(codeOf(() => defineNetwork('bad', { ...REGTEST, genesisBlock: 'abc' }))).toBe('MALFORMED_HEX');
    });

    it('should reject invalid ports', () => {
      expect(codeOf(() => defineNetwork('bad', { ...REGTEST, defaultPort: 0 }))).toBe('VALIDATION_ERROR');
      expect(codeOf(() => defineNetwork('bad', { ...REGTEST, defaultPort: 70000 }))).toBe('VALIDATION_ERROR');
    });
  });

  describe('NetworkRegistry', () => {
    it('should start with the built-in networks', () => {
      const registry = new NetworkRegistry();
      expect(registry.names()).toEqual(['bitcoin', 'testnet']);
      expect(registry.get('bitcoin')).toBe(NETWORKS.bitcoin);
    });

    it('should start empty on request', () => {
      expect(new NetworkRegistry(false).names()).toEqual([]);
    });

    it('should register new networks', () => {
      const registry = new NetworkRegistry();
      const params = registry.register('regtest', REGTEST);
      expect(registry.has('regtest')).toBe(true);
      expect(registry.get('regtest')).toBe(params);
      expect(params.defaultPort).toBe(18444);
    });

    it('should log registrations at debug level', () => {
      const handler = vi.fn();
      logger.configure({ debug: true, handler });
      new NetworkRegistry().register('regtest', REGTEST);
      expect(handler).toHaveBeenCalledWith('debug', 'Network', 'Registered network', {
        name: 'regtest',
        addressVersion: '6f',
      });
    });

    it('should refuse to replace an entry', () => {
      const registry = new NetworkRegistry();
      expect(codeOf(() => registry.register('bitcoin', REGTEST))).toBe('NETWORK_ALREADY_REGISTERED');
      expect(registry.get('bitcoin')).toBe(NETWORKS.bitcoin);
    });

    it('should throw for unknown names', () => {
      expect(codeOf(() => new NetworkRegistry().get('litecoin'))).toBe('UNKNOWN_NETWORK');
    });
  });

  describe('resolveNetwork', () => {
    it('should default to the main network', () => {
      expect(resolveNetwork()).toBe(NETWORKS.bitcoin);
    });

    it('should pass parameters through', () => {
      const params = defineNetwork('regtest', REGTEST);
      expect(resolveNetwork(params)).toBe(params);
    });
  });

  describe('forNetwork', () => {
    it('should bind the mainnet version byte', () => {
      const bitcoin = forNetwork('bitcoin');
      expect(bitcoin.pubkeyToAddress(GENESIS_PUBKEY)).toBe('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa');
      expect(bitcoin.hash160ToAddress('62e907b15cbf27d5425399ebf6f0fb50ebb88f18')).toBe(
        '1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa'
      );
      expect(bitcoin.isValidAddress('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa')).toBe(true);
      expect(bitcoin.hash160FromAddress('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa')).toBe(
        '62e907b15cbf27d5425399ebf6f0fb50ebb88f18'
      );
    });

    it('should keep networks apart', () => {
      const testnet = forNetwork('testnet');
      expect(testnet.pubkeyToAddress(GENESIS_PUBKEY)).toBe('mpXwg4jMtRhuSpVq4xS3HFHmCmWp9NyGKt');
      expect(testnet.isValidAddress('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa')).toBe(false);
      expect(forNetwork('bitcoin').isValidAddress('mpXwg4jMtRhuSpVq4xS3HFHmCmWp9NyGKt')).toBe(false);
    });

    it('should generate addresses valid on its network', () => {
      const testnet = forNetwork('testnet');
      const { address } = testnet.generateAddress();
      expect(testnet.isValidAddress(address)).toBe(true);
    });

    it('should verify both genesis blocks', () => {
      expect(forNetwork('bitcoin').verifyGenesis()).toBe(true);
      expect(forNetwork('testnet').verifyGenesis()).toBe(true);
      expect(forNetwork('bitcoin').genesisHash()).toBe(NETWORKS.bitcoin.genesisHash);
    });

    it('should warn when the genesis block does not match its hash', () => {
      const handler = vi.fn();
      logger.configure({ handler });
      const broken = defineNetwork('broken', {
        ...REGTEST,
        genesisHash: NETWORK_DEFINITIONS.bitcoin.genesisHash,
      });
      expect(forNetwork(broken).verifyGenesis()).toBe(false);
      expect(handler).toHaveBeenCalledWith('warn', 'Network', 'Genesis hash mismatch on broken', {
        expected: NETWORK_DEFINITIONS.bitcoin.genesisHash,
        computed: NETWORK_DEFINITIONS.testnet.genesisHash,
      });
    });
  });
});
