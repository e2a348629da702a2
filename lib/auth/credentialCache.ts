/**
 * Credential storage keyed by username.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from '../logger';
import { isRecord } from '../typesafe';
import { fromStored, StoredCredentialSchema, toStored, type Credential } from './credentials';

export interface CredentialCache {
  load(username: string): Promise<Credential | null>;
  save(username: string, credential: Credential): Promise<void>;
}

/** Usernames are matched case-insensitively, ignoring surrounding spaces. */
function cacheKey(username: string): string {
  return username.trim().toLowerCase();
}

export class MemoryCredentialCache implements CredentialCache {
  private readonly entries = new Map<string, Credential>();

  async load(username: string): Promise<Credential | null> {
    return this.entries.get(cacheKey(username)) ?? null;
  }

  async save(username: string, credential: Credential): Promise<void> {
    this.entries.set(cacheKey(username), credential);
  }
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err['code'] === 'ENOENT';
}

/**
 * One JSON file per username under `directory`. A malformed entry is logged
 * and reported as a miss, so the caller re-authenticates and overwrites it.
 */
export class FileCredentialCache implements CredentialCache {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger
  ) {}

  fileFor(username: string): string {
    const safe = encodeURIComponent(cacheKey(username));
    return path.join(this.directory, `${safe}.json`);
  }

  async load(username: string): Promise<Credential | null> {
    const file = this.fileFor(username);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('Ignoring unreadable credential cache entry', { file });
      return null;
    }

    const result = StoredCredentialSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Ignoring malformed credential cache entry', { file });
      return null;
    }
    return fromStored(result.data);
  }

  async save(username: string, credential: Credential): Promise<void> {
    await mkdir(this.directory, { recursive: true, mode: 0o700 });
    await writeFile(this.fileFor(username), JSON.stringify(toStored(credential), null, 2), {
      encoding: 'utf8',
      mode: 0o600,
    });
  }
}
