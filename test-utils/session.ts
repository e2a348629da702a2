import { MemoryCredentialCache, type Authenticator, type Credential } from '@/lib/auth';
import { DEFAULT_HOSTS } from '@/lib/config';
import { Logger } from '@/lib/logger';
import { Api, type ApiOptions } from '@/src/api/client';

import { FakeTransport, jsonResponse } from './fakeTransport';
import { HOME_STUDIO_UUID, idTokenFor, MEMBER_EMAIL, MEMBER_UUID, memberDetailJson, studioDetailJson } from './fixtures';

export const NOW = new Date('2024-01-01T00:00:00Z');
export const TEST_PASSWORD = 'test-password';

export function validCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    idToken: idTokenFor(),
    accessToken: 'test-access-token',
    refreshToken: 'test-refresh-token',
    expiresAt: new Date(NOW.getTime() + 60 * 60 * 1000),
    ...overrides,
  };
}

/** Authenticator that fails the test if the session tries to sign in. */
export const refusingAuthenticator: Authenticator = {
  authenticate: async () => {
    throw new Error('unexpected sign-in');
  },
  refresh: async () => {
    throw new Error('unexpected refresh');
  },
};

export function routeBootstrap(transport: FakeTransport): FakeTransport {
  return transport
    .on('GET', `/member/members/${MEMBER_UUID}`, jsonResponse(200, { data: memberDetailJson() }))
    .on('GET', `/mobile/v1/studios/${HOME_STUDIO_UUID}`, jsonResponse(200, { data: studioDetailJson() }));
}

export async function seededCache(credential: Credential = validCredential()): Promise<MemoryCredentialCache> {
  const cache = new MemoryCredentialCache();
  await cache.save(MEMBER_EMAIL, credential);
  return cache;
}

export function testOptions(transport: FakeTransport, overrides: Partial<ApiOptions> = {}): ApiOptions {
  return {
    username: MEMBER_EMAIL,
    password: TEST_PASSWORD,
    transport,
    authenticator: refusingAuthenticator,
    logger: new Logger({ enabled: false }),
    now: () => NOW,
    config: { hosts: { ...DEFAULT_HOSTS }, requestTimeoutMs: 0, credentialsDir: '/nonexistent/otf-test' },
    ...overrides,
  };
}

/**
 * A bootstrapped session on a fake transport. Routes for the calls under
 * test can be added to `transport` before or after.
 */
export async function createTestApi(transport: FakeTransport = new FakeTransport()): Promise<{ api: Api; transport: FakeTransport }> {
  routeBootstrap(transport);
  const api = await Api.create(testOptions(transport, { cache: await seededCache() }));
  return { api, transport };
}
