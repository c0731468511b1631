import { describe, it, expect } from 'vitest';
import {
  generateKeypair,
  sign,
  verify,
  blake2b256,
  digest,
  canonicalize,
  signObject,
  verifyObjectSignature,
  toBase64url,
  fromBase64url,
  addressFromPublicKey,
  deriveContractAddress,
} from '../src/core/crypto.js';

describe('Crypto Utilities', () => {
  describe('base64url', () => {
    it('should encode without padding or URL-unsafe characters', () => {
      expect(toBase64url(new Uint8Array([0, 1, 2, 255, 254, 253]))).toBe('AAEC__79');
    });

    it('should decode back to the original bytes', () => {
      expect(fromBase64url('AAEC__79')).toEqual(new Uint8Array([0, 1, 2, 255, 254, 253]));
    });

    it('should handle empty input', () => {
      expect(toBase64url(new Uint8Array(0))).toBe('');
      expect(fromBase64url('').length).toBe(0);
    });
  });

  describe('generateKeypair', () => {
    it('should produce unique addresses', () => {
      expect(generateKeypair().address).not.toBe(generateKeypair().address);
    });

    it('should use the encoded public key as a 43-character address', () => {
      const kp = generateKeypair();
      expect(kp.address).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(addressFromPublicKey(fromBase64url(kp.address))).toBe(kp.address);
    });

    it('should set name only when provided', () => {
      expect(generateKeypair('alice').name).toBe('alice');
      expect(generateKeypair().name).toBeUndefined();
    });

    it('should have a 32-byte private key', () => {
      expect(generateKeypair().privateKey.length).toBe(32);
    });
  });

  describe('sign and verify', () => {
    const msg = new TextEncoder().encode('hello');

    it('should verify a valid signature', () => {
      const kp = generateKeypair();
      expect(verify(fromBase64url(kp.address), msg, sign(kp.privateKey, msg))).toBe(true);
    });

    it('should reject a wrong message', () => {
      const kp = generateKeypair();
      const sig = sign(kp.privateKey, msg);
      expect(verify(fromBase64url(kp.address), new TextEncoder().encode('world'), sig)).toBe(false);
    });

    it('should reject a wrong key', () => {
      const sig = sign(generateKeypair().privateKey, msg);
      expect(verify(fromBase64url(generateKeypair().address), msg, sig)).toBe(false);
    });

    it('should return false for a garbage signature', () => {
      const kp = generateKeypair();
      expect(verify(fromBase64url(kp.address), msg, new Uint8Array(64))).toBe(false);
    });
  });

  describe('hashing', () => {
    it('should produce a 32-byte BLAKE2b hash', () => {
      expect(blake2b256(new TextEncoder().encode('test')).length).toBe(32);
    });

    it('should digest empty code to the known BLAKE2b-256 value', () => {
      expect(digest(new Uint8Array(0))).toBe('DldRwCblQ7Loqy6wYJnaodHl30d3j3eH-qtFzfEv46g');
    });
  });

  describe('deriveContractAddress', () => {
    it('should be deterministic in deployer and nonce', () => {
      const deployer = generateKeypair().address;
      expect(deriveContractAddress(deployer, 3)).toBe(deriveContractAddress(deployer, 3));
      expect(deriveContractAddress(deployer, 3)).not.toBe(deriveContractAddress(deployer, 4));
    });

    it('should look like an account address', () => {
      expect(deriveContractAddress(generateKeypair().address, 0)).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });
  });

  describe('canonicalize', () => {
    it('should sort keys', () => {
      expect(canonicalize({ b: 2, a: 1 })).toBe('{"a":1,"b":2}');
    });

    it('should throw for undefined', () => {
      expect(() => canonicalize(undefined)).toThrow('Failed to canonicalize object');
    });
  });

  describe('signObject / verifyObjectSignature', () => {
    it('should sign and verify an object', () => {
      const kp = generateKeypair();
      const obj = { foo: 'bar', n: 42 };
      expect(verifyObjectSignature(kp.address, obj, signObject(kp.privateKey, obj))).toBe(true);
    });

    it('should reject a tampered object', () => {
      const kp = generateKeypair();
      const sig = signObject(kp.privateKey, { foo: 'bar' });
      expect(verifyObjectSignature(kp.address, { foo: 'baz' }, sig)).toBe(false);
    });

    it('should reject a key that is not valid base64', () => {
      const kp = generateKeypair();
      const sig = signObject(kp.privateKey, { foo: 'bar' });
      expect(verifyObjectSignature('not base64!', { foo: 'bar' }, sig)).toBe(false);
    });
  });
});
