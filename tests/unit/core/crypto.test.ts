import { describe, it, expect } from 'vitest';
import {
  bitcoinHash,
  checksum,
  doubleSha256,
  hash160,
  ripemd160,
  sha256,
} from '../../../core/crypto';
import { CoinbitsError } from '../../../core/errors';

const GENESIS_PUBKEY =
  '04678afdb0fe5548271967f1a67130b7105cd6a828e03909a67962e0ea1f61deb649f6bc3f4cef38c4f35504e51ec112de5c384df7ba0b8d578a4c702b6bf11d5f';

describe('crypto', () => {
  describe('sha256', () => {
    it('should hash the empty input', () => {
      expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should hash bytes given as hex', () => {
      // "abc"
      expect(sha256('616263')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should reject malformed hex', () => {
      expect(() => sha256('abc')).toThrow(CoinbitsError);
    });
  });

  describe('doubleSha256', () => {
    it('should hash twice', () => {
      expect(doubleSha256('')).toBe('5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456');
    });
  });

  describe('ripemd160', () => {
    it('should hash the empty input', () => {
      expect(ripemd160('')).toBe('9c1185a5c5e9fc54612808977ee8f548b2258d31');
    });
  });

  describe('hash160', () => {
    it('should match the reference value for the genesis public key', () => {
      expect(hash160(GENESIS_PUBKEY)).toBe('62e907b15cbf27d5425399ebf6f0fb50ebb88f18');
    });

    it('should be 20 bytes', () => {
      expect(hash160('')).toBe('b472a266d0bd89c13706a4132ccfb16f7c3b9fcb');
    });
  });

  describe('checksum', () => {
    it('should be the first 4 bytes of double SHA256', () => {
      expect(checksum('00')).toBe('1406e058');
      expect(checksum('')).toBe(doubleSha256('').substring(0, 8));
    });
  });

  describe('bitcoinHash', () => {
    it('should reverse input and output around double SHA256', () => {
      expect(doubleSha256('0201')).toBe('2a9f6a20d0d4251cd87a3c92612ddfbe677b3142b0fc42aa666b544a3539917c');
      expect(bitcoinHash('0102')).toBe('7c9139354a546b66aa42fcb042317b67bedf2d61923c7ad81c25d4d0206a9f2a');
    });

    it('should hash a single byte', () => {
      expect(bitcoinHash('ab')).toBe('d2fc99738366fa75f81b5066630eec399068f0cb3cbfa7585d0f3770d1fd20a4');
    });
  });
});
