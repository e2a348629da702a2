import { CognitoAuthenticator } from '@/lib/auth';
import { AuthError, HttpError, NetworkError } from '@/lib/errors';
import { Logger } from '@/lib/logger';
import { FakeTransport, jsonResponse } from '@/test-utils/fakeTransport';

const NOW = new Date('2024-01-01T00:00:00Z');

function makeAuthenticator(transport: FakeTransport) {
  return new CognitoAuthenticator({
    region: 'us-east-1',
    clientId: 'test-client-id',
    transport,
    logger: new Logger({ enabled: false }),
    now: () => NOW,
  });
}

const tokens = (extra: Record<string, unknown> = {}) => ({
  AuthenticationResult: {
    IdToken: 'test-id-token',
    AccessToken: 'test-access-token',
    ExpiresIn: 3600,
    ...extra,
  },
});

describe('CognitoAuthenticator', () => {
  test('signs in with USER_PASSWORD_AUTH', async () => {
    const transport = new FakeTransport().on('POST', '/', jsonResponse(200, tokens({ RefreshToken: 'test-refresh' })));

    const credential = await makeAuthenticator(transport).authenticate('member@example.test', 'test-password');

    expect(credential).toEqual({
      idToken: 'test-id-token',
      accessToken: 'test-access-token',
      refreshToken: 'test-refresh',
      expiresAt: new Date('2024-01-01T01:00:00Z'),
    });
    const sent = transport.requests[0];
    expect(sent?.url).toBe('https://cognito-idp.us-east-1.amazonaws.com/');
    expect(sent?.headers).toEqual({
      'Content-Type': 'application/x-amz-json-1.1',
      'X-Amz-Target': 'AWSCognitoIdentityProviderService.InitiateAuth',
    });
    expect(sent?.body).toEqual({
      AuthFlow: 'USER_PASSWORD_AUTH',
      AuthParameters: { USERNAME: 'member@example.test', PASSWORD: 'test-password' },
      ClientId: 'test-client-id',
    });
  });

  test('keeps the existing refresh token when a refresh omits it', async () => {
    const transport = new FakeTransport().on('POST', '/', jsonResponse(200, tokens()));

    const credential = await makeAuthenticator(transport).refresh('member@example.test', 'test-refresh');

    expect(credential.refreshToken).toBe('test-refresh');
    expect(transport.requests[0]?.body).toEqual({
      AuthFlow: 'REFRESH_TOKEN_AUTH',
      AuthParameters: { REFRESH_TOKEN: 'test-refresh' },
      ClientId: 'test-client-id',
    });
  });

  test('maps rejected credentials to AuthError', async () => {
    const transport = new FakeTransport().on(
      'POST',
      '/',
      jsonResponse(400, {
        __type: 'com.amazonaws.cognito#NotAuthorizedException',
        message: 'Incorrect username or password.',
      })
    );

    const failure = makeAuthenticator(transport).authenticate('member@example.test', 'wrong');

    await expect(failure).rejects.toBeInstanceOf(AuthError);
    await expect(failure).rejects.toMatchObject({
      code: 'NotAuthorizedException',
      message: 'Incorrect username or password.',
    });
  });

  test('maps other error responses to HttpError', async () => {
    const transport = new FakeTransport().on('POST', '/', jsonResponse(500, { __type: 'InternalErrorException' }));

    const failure = makeAuthenticator(transport).authenticate('member@example.test', 'test-password');

    await expect(failure).rejects.toBeInstanceOf(HttpError);
    await expect(failure).rejects.toMatchObject({ status: 500 });
  });

  test('fails when a challenge is returned instead of tokens', async () => {
    const transport = new FakeTransport().on('POST', '/', jsonResponse(200, { ChallengeName: 'NEW_PASSWORD_REQUIRED' }));

    await expect(
      makeAuthenticator(transport).authenticate('member@example.test', 'test-password')
    ).rejects.toMatchObject({ name: 'AuthError', code: 'unexpected_response' });
  });

  test('wraps transport failures in NetworkError', async () => {
    const transport = new FakeTransport().on('POST', '/', new Error('socket hang up'));

    const failure = makeAuthenticator(transport).authenticate('member@example.test', 'test-password');

    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toMatchObject({ message: 'Authentication request failed: socket hang up' });
  });
});
