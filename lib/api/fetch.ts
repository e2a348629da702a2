/**
 * Request dispatcher.
 *
 * Builds the URL for a host alias, merges headers with the session's auth
 * headers, sends through the session transport and decodes the JSON body.
 * No retries: every failure surfaces to the caller as a typed error.
 */

import { DecodeError, HttpError, NetworkError } from '../errors';
import type { Logger } from '../logger';
import { buildUrl, resolveHost, type HostAlias, type HostMap, type QueryParams } from './hosts';
import type { Transport, TransportResponse } from './transport';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type DispatchRequest = {
  method: HttpMethod;
  host: HostAlias;
  path: string;
  params?: QueryParams;
  headers?: Readonly<Record<string, string>>;
  /** JSON-encoded when present. */
  body?: unknown;
  signal?: AbortSignal;
};

export type DispatchContext = {
  transport: Transport;
  hosts: HostMap;
  authHeaders: Readonly<Record<string, string>>;
  logger: Logger;
  /** 0 disables the timeout. */
  timeoutMs?: number;
};

/**
 * Caller headers first, auth headers last. Names compare case-insensitively,
 * so a caller's `authorization` cannot survive next to the session's.
 */
export function mergeHeaders(
  extra: Readonly<Record<string, string>> = {},
  auth: Readonly<Record<string, string>>
): Record<string, string> {
  const authNames = new Set(Object.keys(auth).map((name) => name.toLowerCase()));
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(extra)) {
    if (!authNames.has(name.toLowerCase())) merged[name] = value;
  }
  return { ...merged, ...auth };
}

/** Params as sent, for the debug trace. */
function loggableParams(params: QueryParams = {}): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) out[key] = value;
  }
  return out;
}

type LinkedSignal = {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
};

function linkSignal(timeoutMs: number, outer: AbortSignal | undefined): LinkedSignal {
  const controller = new AbortController();
  let expired = false;

  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          expired = true;
          controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
        }, timeoutMs)
      : undefined;

  const forward = () => controller.abort(outer?.reason);
  if (outer?.aborted) {
    forward();
  } else {
    outer?.addEventListener('abort', forward, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose() {
      if (timer !== undefined) clearTimeout(timer);
      outer?.removeEventListener('abort', forward);
    },
  };
}

// Tells concurrent timers for the same URL apart in the debug trace
let dispatchCount = 0;

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function dispatch(ctx: DispatchContext, request: DispatchRequest): Promise<unknown> {
  const { method, path, params } = request;
  const url = buildUrl(resolveHost(ctx.hosts, request.host), path, params);
  const headers = mergeHeaders(request.headers, ctx.authHeaders);
  const body = request.body === undefined ? undefined : JSON.stringify(request.body);

  ctx.logger.debug(`API ${method} ${url}`, { params: loggableParams(params) });

  const linked = linkSignal(ctx.timeoutMs ?? 0, request.signal);
  dispatchCount += 1;
  const timer = `API ${method} ${url} #${dispatchCount}`;
  ctx.logger.time(timer);

  let response: TransportResponse;
  let text: string;
  try {
    response = await ctx.transport.send(url, { method, headers, body, signal: linked.signal });
    text = await response.text();
  } catch (err) {
    const timedOut = linked.timedOut();
    const cancelled: unknown = linked.signal.aborted ? linked.signal.reason : undefined;
    const reason = timedOut ? `timed out after ${ctx.timeoutMs}ms` : describeFailure(cancelled ?? err);
    ctx.logger.error(`API ${method} ${url} failed`, err, { timedOut });
    throw new NetworkError(`${method} ${url} failed: ${reason}`, url, timedOut, { cause: err });
  } finally {
    linked.dispose();
    ctx.logger.timeEnd(timer);
  }

  if (!response.ok) {
    ctx.logger.warn('API error response', { method, url, status: response.status });
    throw new HttpError(response.status, url, text);
  }

  if (response.status === 204 || text.trim() === '') {
    return null;
  }

  try {
    const decoded: unknown = JSON.parse(text);
    return decoded;
  } catch (err) {
    ctx.logger.warn('API response is not JSON', { method, url, status: response.status });
    throw new DecodeError(url, text, { cause: err });
  }
}
