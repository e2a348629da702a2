/**
 * HTTP transport owned by one client session.
 *
 * `PooledTransport` sends through one axios instance bound to a keep-alive
 * `https.Agent`: a single connection pool shared by every request the
 * session makes, released by `close()`.
 */

import https from 'node:https';
import axios, { type AxiosInstance } from 'axios';

import { StateError } from '../errors';

export type TransportRequest = {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

/** The part of a fetch `Response` the dispatcher reads. */
export interface TransportResponse {
  readonly status: number;
  readonly ok: boolean;
  text(): Promise<string>;
}

export interface Transport {
  readonly closed: boolean;
  send(url: string, request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export type PooledTransportOptions = {
  /** Max sockets per origin; unlimited by default. */
  connections?: number;
};

export class PooledTransport implements Transport {
  private readonly agent: https.Agent;
  private readonly http: AxiosInstance;
  private isClosed = false;

  constructor(options: PooledTransportOptions = {}) {
    this.agent = new https.Agent({ keepAlive: true, maxSockets: options.connections ?? Infinity });
    this.http = axios.create({
      httpsAgent: this.agent,
      // The dispatcher decodes bodies and maps statuses itself
      responseType: 'text',
      validateStatus: () => true,
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async send(url: string, request: TransportRequest): Promise<TransportResponse> {
    if (this.isClosed) {
      throw new StateError('Transport is closed');
    }
    const response = await this.http.request<unknown>({
      url,
      method: request.method,
      headers: request.headers,
      data: request.body,
      signal: request.signal,
    });
    const text = typeof response.data === 'string' ? response.data : '';
    return {
      status: response.status,
      ok: response.status >= 200 && response.status < 300,
      text: async () => text,
    };
  }

  /** Idempotent: the pool's sockets are destroyed on the first call only. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.agent.destroy();
  }
}
