import { AuthError } from '../errors';
import type { Logger } from '../logger';
import type { Authenticator } from './cognito';
import type { CredentialCache } from './credentialCache';
import { isExpired, readIdentityClaims, type Credential } from './credentials';

/** The authenticated member: username, current tokens and the identity they carry. */
export class User {
  readonly memberUuid: string;
  readonly email: string;

  constructor(
    readonly username: string,
    readonly credential: Credential
  ) {
    const claims = readIdentityClaims(credential.idToken);
    this.memberUuid = claims.memberUuid;
    this.email = claims.email;
  }

  isExpired(now?: Date): boolean {
    return isExpired(this.credential, now);
  }
}

export type ResolveUserOptions = {
  username: string;
  password: string;
  cache: CredentialCache;
  authenticator: Authenticator;
  logger: Logger;
  now?: () => Date;
};

/**
 * Cached tokens when still valid, else a refresh, else a full sign-in.
 * Whatever was obtained from the provider is written back to the cache.
 */
export async function resolveUser(options: ResolveUserOptions): Promise<User> {
  const { username, password, cache, authenticator, logger } = options;
  const now = options.now ?? (() => new Date());

  if (!username.trim() || !password) {
    throw new AuthError('Username and password are required', 'missing_credentials');
  }

  const cached = await cache.load(username);
  if (cached && !isExpired(cached, now())) {
    logger.debug('Using cached credentials', { username });
    return new User(username, cached);
  }

  let credential: Credential | null = null;
  if (cached?.refreshToken) {
    try {
      credential = await authenticator.refresh(username, cached.refreshToken);
    } catch (err) {
      if (!(err instanceof AuthError)) throw err;
      logger.info('Refresh token rejected, signing in again', { username, code: err.code });
    }
  }

  credential ??= await authenticator.authenticate(username, password);
  await cache.save(username, credential);
  return new User(username, credential);
}
