import { z } from 'zod';

import { AuthError } from '../errors';

export type Credential = {
  idToken: string;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date;
};

/** On-disk shape of a cached credential. */
export const StoredCredentialSchema = z.object({
  idToken: z.string().min(1),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).nullable(),
  expiresAt: z.string().datetime({ offset: true }),
});

export type StoredCredential = z.infer<typeof StoredCredentialSchema>;

export function toStored(credential: Credential): StoredCredential {
  return {
    idToken: credential.idToken,
    accessToken: credential.accessToken,
    refreshToken: credential.refreshToken,
    expiresAt: credential.expiresAt.toISOString(),
  };
}

export function fromStored(stored: StoredCredential): Credential {
  return { ...stored, expiresAt: new Date(stored.expiresAt) };
}

// Tokens this close to expiry are treated as expired
export const EXPIRY_SKEW_MS = 60_000;

export function isExpired(credential: Credential, now: Date = new Date(), skewMs: number = EXPIRY_SKEW_MS): boolean {
  return credential.expiresAt.getTime() - skewMs <= now.getTime();
}

const IdTokenClaimsSchema = z.object({
  'cognito:username': z.string().min(1),
  email: z.string().min(1),
  exp: z.number().optional(),
});

export type IdentityClaims = {
  memberUuid: string;
  email: string;
};

/**
 * Read the member identity out of an id token. The signature is not checked;
 * the token came straight from the identity provider.
 */
export function readIdentityClaims(idToken: string): IdentityClaims {
  const payload = idToken.split('.')[1];
  if (!payload) {
    throw new AuthError('Id token is not a JWT', 'malformed_token');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  } catch (err) {
    throw new AuthError('Id token payload is not JSON', 'malformed_token', { cause: err });
  }

  const result = IdTokenClaimsSchema.safeParse(decoded);
  if (!result.success) {
    throw new AuthError('Id token is missing identity claims', 'malformed_token');
  }
  return { memberUuid: result.data['cognito:username'], email: result.data.email };
}
