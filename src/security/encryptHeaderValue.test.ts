import { constants, generateKeyPairSync, type KeyObject, privateDecrypt } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { encryptHeaderValue, encryptWithKeyMaterial, type KeyMaterial, toKeyMaterial } from './encryptHeaderValue.js';

// Printable key strings whose UTF-8 bytes form a usable 1023-bit odd modulus
const ASCII_KEY = { modulus: `${'k'.repeat(127)}Q`, exponent: 'AQAB' };

/**
 * Decrypts without padding and strips an EME-PKCS1-v1_5 block by hand: 0x00 0x02 <non-zero filler> 0x00 <message>.
 */
function decryptPkcs1(ciphertext: string, privateKey: KeyObject): string {
  const block = privateDecrypt({ key: privateKey, padding: constants.RSA_NO_PADDING }, Buffer.from(ciphertext, 'base64'));
  expect(block[0]).toBe(0x00);
  expect(block[1]).toBe(0x02);

  const separator = block.indexOf(0x00, 2);
  expect(separator).toBeGreaterThanOrEqual(10);

  return block.subarray(separator + 1).toString('utf8');
}

function generatedKeyMaterial(): { material: KeyMaterial; privateKey: KeyObject } {
  const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength: 1024 });
  const jwk = publicKey.export({ format: 'jwk' });

  return {
    material: {
      modulus: Buffer.from(jwk.n ?? '', 'base64url'),
      exponent: Buffer.from(jwk.e ?? '', 'base64url'),
    },
    privateKey,
  };
}

describe('toKeyMaterial', () => {
  it('uses the UTF-8 bytes of the key strings as-is', () => {
    const material = toKeyMaterial({ modulus: 'x1+/=', exponent: 'AQAB' });

    expect([...material.modulus]).toEqual([0x78, 0x31, 0x2b, 0x2f, 0x3d]);
    expect([...material.exponent]).toEqual([0x41, 0x51, 0x41, 0x42]);
  });

  it('does not decode base64 looking strings', () => {
    expect(toKeyMaterial({ modulus: 'AQAB', exponent: 'AQAB' }).modulus.toString('utf8')).toBe('AQAB');
  });
});

describe('encryptWithKeyMaterial', () => {
  it('round trips through the matching private key', () => {
    const { material, privateKey } = generatedKeyMaterial();
    const encrypted = encryptWithKeyMaterial('extranet\\editor', material);

    expect(decryptPkcs1(encrypted, privateKey)).toBe('extranet\\editor');
  });

  it('round trips non-ascii values as UTF-8', () => {
    const { material, privateKey } = generatedKeyMaterial();

    expect(decryptPkcs1(encryptWithKeyMaterial('pässwörd-test', material), privateKey)).toBe('pässwörd-test');
  });

  it('produces different ciphertexts for the same value', () => {
    const { material } = generatedKeyMaterial();

    expect(encryptWithKeyMaterial('editor', material)).not.toBe(encryptWithKeyMaterial('editor', material));
  });
});

describe('encryptHeaderValue', () => {
  it('returns a base64 ciphertext as long as the modulus', () => {
    const encrypted = encryptHeaderValue('editor', ASCII_KEY);

    expect(encrypted).toMatch(/^[A-Za-z0-9+/]+={0,2}$/);
    expect(Buffer.from(encrypted, 'base64')).toHaveLength(128);
  });

  it.each(['', '   '])('throws InvalidArgumentError for value "%s"', (value) => {
    expect(() => encryptHeaderValue(value, ASCII_KEY)).toThrow(InvalidArgumentError);
    expect(() => encryptHeaderValue(value, ASCII_KEY)).toThrow('value cannot be null or empty when encrypting headers');
  });

  it('throws InvalidArgumentError without a key', () => {
    expect(() => encryptHeaderValue('editor', null)).toThrow(
      new InvalidArgumentError('key cannot be null when encrypting headers', 'key'),
    );
  });
});
