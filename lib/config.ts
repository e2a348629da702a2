/**
 * Client configuration.
 *
 * Values come from (lowest to highest precedence) built-in defaults, the
 * OTF_* environment variables and the overrides passed by the caller.
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { env } from './env';
import { StateError } from './errors';

const hostname = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, 'must be a bare hostname without scheme or path');

const ClientConfigSchema = z.object({
  hosts: z.object({
    default: hostname,
    io: hostname,
    dna: hostname,
  }),
  requestTimeoutMs: z.number().int().nonnegative(),
  credentialsDir: z.string().min(1),
  cognito: z.object({
    region: z.string().min(1),
    clientId: z.string().min(1),
  }),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export type ClientConfigOverrides = {
  hosts?: Partial<ClientConfig['hosts']>;
  requestTimeoutMs?: number;
  credentialsDir?: string;
  cognito?: Partial<ClientConfig['cognito']>;
};

export const DEFAULT_HOSTS = {
  default: 'api.orangetheory.co',
  io: 'api.orangetheory.io',
  dna: 'api.yuzu.orangetheory.com',
} as const;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const DEFAULT_COGNITO_REGION = 'us-east-1';
const DEFAULT_COGNITO_CLIENT_ID = '65knvqta6p37efc2l3eh26pl5o';

function readTimeout(): number {
  const raw = env.get('OTF_REQUEST_TIMEOUT_MS');
  if (raw === undefined || raw.trim() === '') return DEFAULT_REQUEST_TIMEOUT_MS;
  // NaN fails the schema below
  return Number(raw);
}

export function loadConfig(overrides: ClientConfigOverrides = {}): ClientConfig {
  const candidate = {
    hosts: {
      default: overrides.hosts?.default ?? env.getOrDefault('OTF_API_HOST', DEFAULT_HOSTS.default),
      io: overrides.hosts?.io ?? env.getOrDefault('OTF_API_IO_HOST', DEFAULT_HOSTS.io),
      dna: overrides.hosts?.dna ?? env.getOrDefault('OTF_API_DNA_HOST', DEFAULT_HOSTS.dna),
    },
    requestTimeoutMs: overrides.requestTimeoutMs ?? readTimeout(),
    credentialsDir:
      overrides.credentialsDir ??
      env.getOrDefault('OTF_CREDENTIALS_DIR', path.join(os.homedir(), '.cache', 'otf-api-client')),
    cognito: {
      region: overrides.cognito?.region ?? env.getOrDefault('OTF_COGNITO_REGION', DEFAULT_COGNITO_REGION),
      clientId: overrides.cognito?.clientId ?? env.getOrDefault('OTF_COGNITO_CLIENT_ID', DEFAULT_COGNITO_CLIENT_ID),
    },
  };

  const result = ClientConfigSchema.safeParse(candidate);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const key = issue ? issue.path.join('.') : '<root>';
  throw new StateError(`Invalid client configuration at ${key}: ${issue?.message ?? 'unknown issue'}`);
}
