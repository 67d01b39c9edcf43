import { z } from 'zod';
import type { ApiResponse } from '../types/response.js';

/** RSA public key material as the server sends it, both parts as strings. */
export interface PublicKey {
  modulus: string;
  exponent: string;
}

/** Response of the `getpublickey` action that passed validation. */
export type PublicKeyResponse = ApiResponse<PublicKey> & { data: PublicKey };

/** Server action returning the RSA public key used for encrypted headers. */
export const PUBLIC_KEY_ACTION = 'getpublickey';

const keyPart = (name: string) =>
  z.string({ required_error: `${name} is required` }).refine((value) => value.trim().length > 0, `${name} cannot be empty`);

/**
 * Accepts the key either as JSON (`{ "modulus": "...", "exponent": "..." }`)
 * or as the parsed XML `<RSAKeyValue><Modulus/><Exponent/></RSAKeyValue>` document.
 */
export const publicKeySchema = z.union([
  z.object({ modulus: keyPart('modulus'), exponent: keyPart('exponent') }),
  z
    .object({ RSAKeyValue: z.object({ Modulus: keyPart('Modulus'), Exponent: keyPart('Exponent') }) })
    .transform(({ RSAKeyValue }): PublicKey => ({ modulus: RSAKeyValue.Modulus, exponent: RSAKeyValue.Exponent })),
]);

/**
 * Narrows a public key response to one carrying key material.
 */
export function isPublicKeyResponse(response: ApiResponse<PublicKey>): response is PublicKeyResponse {
  return response.failure === null && response.data !== null;
}
