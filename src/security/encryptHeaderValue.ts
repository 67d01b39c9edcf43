import { constants, createPublicKey, type KeyObject, publicEncrypt } from 'node:crypto';
import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import type { PublicKey } from './publicKey.js';

/** Raw RSA key components. */
export interface KeyMaterial {
  modulus: Buffer;
  exponent: Buffer;
}

/**
 * Turns the server's key strings into key bytes.
 *
 * The server expects the UTF-8 bytes of the modulus and exponent strings to be used as the
 * big-endian key components, not their decoded values. Keep it that way, decoding them here
 * breaks decryption on the server.
 */
export function toKeyMaterial(key: PublicKey): KeyMaterial {
  return {
    modulus: Buffer.from(key.modulus, 'utf8'),
    exponent: Buffer.from(key.exponent, 'utf8'),
  };
}

/**
 * Imports an RSA public key from its big-endian modulus and exponent bytes.
 */
export function importPublicKey({ modulus, exponent }: KeyMaterial): KeyObject {
  return createPublicKey({
    key: { kty: 'RSA', n: modulus.toString('base64url'), e: exponent.toString('base64url') },
    format: 'jwk',
  });
}

/**
 * Encrypts `value` (UTF-8) with PKCS#1 v1.5 padding and returns the base64 ciphertext.
 * The padding is randomized, two calls never produce the same output.
 */
export function encryptWithKeyMaterial(value: string, material: KeyMaterial): string {
  const encrypted = publicEncrypt(
    { key: importPublicKey(material), padding: constants.RSA_PKCS1_PADDING },
    Buffer.from(value, 'utf8'),
  );

  return encrypted.toString('base64');
}

/**
 * Encrypts a header value with the public key fetched from the server.
 *
 * @throws {InvalidArgumentError} when `value` is blank or `key` is missing
 */
export function encryptHeaderValue(value: string, key: PublicKey | null): string {
  if (!value?.trim()) {
    throw new InvalidArgumentError('value cannot be null or empty when encrypting headers', 'value');
  }

  if (!key) {
    throw new InvalidArgumentError('key cannot be null when encrypting headers', 'key');
  }

  return encryptWithKeyMaterial(value, toKeyMaterial(key));
}
