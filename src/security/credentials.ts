import { z } from 'zod';

/** Credentials sent with every request of an authenticated context. */
export interface Credentials {
  userName: string;
  password: string;
  /**
   * Encrypt user name and password with the server's public key before sending them.
   * Only for plain `http://` hosts, over TLS the server rejects encrypted headers.
   */
  encryptHeaders: boolean;
}

export type CredentialValidation = { valid: true } | { valid: false; reason: string };

/**
 * zod schema used by {@link validateCredentials}.
 */
export const credentialsSchema = z.object({
  userName: z
    .string({ required_error: 'userName is required', invalid_type_error: 'userName must be a string' })
    .trim()
    .min(1, 'userName cannot be empty'),
  password: z
    .string({ required_error: 'password is required', invalid_type_error: 'password must be a string' })
    .trim()
    .min(1, 'password cannot be empty'),
  encryptHeaders: z.boolean({ invalid_type_error: 'encryptHeaders must be a boolean' }).default(false),
});

/**
 * Checks that a user name and password are present and not blank. Runs synchronously
 * so a context can reject its credentials while it is being constructed.
 */
export function validateCredentials(credentials: unknown): CredentialValidation {
  const result = credentialsSchema.safeParse(credentials);
  if (result.success) {
    return { valid: true };
  }

  return { valid: false, reason: result.error.issues[0]?.message ?? 'credentials are invalid' };
}
