/**
 * Username/password authentication against the identity provider's
 * `InitiateAuth` endpoint.
 */

import { z } from 'zod';

import type { Transport, TransportResponse } from '../api/transport';
import { AuthError, HttpError, NetworkError } from '../errors';
import type { Logger } from '../logger';
import type { Credential } from './credentials';

export interface Authenticator {
  authenticate(username: string, password: string): Promise<Credential>;
  refresh(username: string, refreshToken: string): Promise<Credential>;
}

export type CognitoOptions = {
  region: string;
  clientId: string;
  transport: Transport;
  logger: Logger;
  now?: () => Date;
};

const AuthenticationResultSchema = z.object({
  AuthenticationResult: z.object({
    IdToken: z.string().min(1),
    AccessToken: z.string().min(1),
    RefreshToken: z.string().min(1).optional(),
    ExpiresIn: z.number().int().positive(),
  }),
});

const ErrorBodySchema = z.object({
  __type: z.string(),
  message: z.string().optional(),
});

const CREDENTIAL_ERRORS = new Set([
  'NotAuthorizedException',
  'UserNotFoundException',
  'PasswordResetRequiredException',
  'UserNotConfirmedException',
]);

/** `"com.amazonaws...#NotAuthorizedException"` → `"NotAuthorizedException"` */
function errorType(raw: string): string {
  const hash = raw.lastIndexOf('#');
  return hash >= 0 ? raw.slice(hash + 1) : raw;
}

function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

export class CognitoAuthenticator implements Authenticator {
  private readonly url: string;
  private readonly now: () => Date;

  constructor(private readonly options: CognitoOptions) {
    this.url = `https://cognito-idp.${options.region}.amazonaws.com/`;
    this.now = options.now ?? (() => new Date());
  }

  async authenticate(username: string, password: string): Promise<Credential> {
    this.options.logger.info('Authenticating', { username });
    return this.initiate(
      { AuthFlow: 'USER_PASSWORD_AUTH', AuthParameters: { USERNAME: username, PASSWORD: password } },
      null
    );
  }

  async refresh(username: string, refreshToken: string): Promise<Credential> {
    this.options.logger.info('Refreshing tokens', { username });
    return this.initiate(
      { AuthFlow: 'REFRESH_TOKEN_AUTH', AuthParameters: { REFRESH_TOKEN: refreshToken } },
      refreshToken
    );
  }

  private async initiate(
    payload: { AuthFlow: string; AuthParameters: Record<string, string> },
    previousRefreshToken: string | null
  ): Promise<Credential> {
    let response: TransportResponse;
    let text: string;
    try {
      response = await this.options.transport.send(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-amz-json-1.1',
          'X-Amz-Target': 'AWSCognitoIdentityProviderService.InitiateAuth',
        },
        body: JSON.stringify({ ...payload, ClientId: this.options.clientId }),
      });
      text = await response.text();
    } catch (err) {
      throw new NetworkError(`Authentication request failed: ${err instanceof Error ? err.message : String(err)}`, this.url, false, {
        cause: err,
      });
    }

    const body = parseJson(text);

    if (!response.ok) {
      const problem = ErrorBodySchema.safeParse(body);
      if (problem.success && CREDENTIAL_ERRORS.has(errorType(problem.data.__type))) {
        throw new AuthError(problem.data.message ?? 'Invalid credentials', errorType(problem.data.__type));
      }
      throw new HttpError(response.status, this.url, text);
    }

    const result = AuthenticationResultSchema.safeParse(body);
    if (!result.success) {
      throw new AuthError('Authentication did not return tokens (challenge required?)', 'unexpected_response');
    }

    const tokens = result.data.AuthenticationResult;
    return {
      idToken: tokens.IdToken,
      accessToken: tokens.AccessToken,
      // Refresh responses omit the refresh token; keep the one we sent
      refreshToken: tokens.RefreshToken ?? previousRefreshToken,
      expiresAt: new Date(this.now().getTime() + tokens.ExpiresIn * 1000),
    };
  }
}
