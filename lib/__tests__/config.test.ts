import path from 'node:path';

import { DEFAULT_HOSTS, DEFAULT_REQUEST_TIMEOUT_MS, loadConfig } from '@/lib/config';
import { StateError } from '@/lib/errors';

const KEYS = [
  'OTF_API_HOST',
  'OTF_API_IO_HOST',
  'OTF_API_DNA_HOST',
  'OTF_REQUEST_TIMEOUT_MS',
  'OTF_CREDENTIALS_DIR',
  'OTF_COGNITO_REGION',
  'OTF_COGNITO_CLIENT_ID',
];

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  test('falls back to built-in defaults', () => {
    const config = loadConfig();

    expect(config.hosts).toEqual(DEFAULT_HOSTS);
    expect(config.requestTimeoutMs).toBe(DEFAULT_REQUEST_TIMEOUT_MS);
    expect(config.cognito.region).toBe('us-east-1');
    expect(config.credentialsDir.endsWith(path.join('.cache', 'otf-api-client'))).toBe(true);
  });

  test('reads OTF_* environment variables', () => {
    process.env['OTF_API_IO_HOST'] = 'io.example.test';
    process.env['OTF_REQUEST_TIMEOUT_MS'] = '5000';
    process.env['OTF_CREDENTIALS_DIR'] = '/tmp/otf-creds';

    const config = loadConfig();

    expect(config.hosts.io).toBe('io.example.test');
    expect(config.hosts.default).toBe(DEFAULT_HOSTS.default);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.credentialsDir).toBe('/tmp/otf-creds');
  });

  test('prefers explicit overrides over the environment', () => {
    process.env['OTF_API_HOST'] = 'env.example.test';

    const config = loadConfig({ hosts: { default: 'override.example.test' }, requestTimeoutMs: 0 });

    expect(config.hosts.default).toBe('override.example.test');
    expect(config.requestTimeoutMs).toBe(0);
  });

  test('rejects a non-numeric timeout', () => {
    process.env['OTF_REQUEST_TIMEOUT_MS'] = 'soon';

    expect(() => loadConfig()).toThrow(StateError);
    expect(() => loadConfig()).toThrow(/^Invalid client configuration at requestTimeoutMs: /);
  });

  test('rejects hosts that carry a scheme', () => {
    expect(() => loadConfig({ hosts: { dna: 'https://dna.example.test' } })).toThrow(
      'Invalid client configuration at hosts.dna: must be a bare hostname without scheme or path'
    );
  });
});
