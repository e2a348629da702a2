import type { Transport, TransportRequest, TransportResponse } from '@/lib/api/transport';

export type RecordedRequest = {
  url: string;
  method: string;
  host: string;
  path: string;
  query: URLSearchParams;
  headers: Record<string, string>;
  body: unknown;
  signal: AbortSignal | undefined;
};

export type Reply = TransportResponse | Error | ((request: RecordedRequest) => TransportResponse | Promise<TransportResponse>);

type Route = {
  method: string;
  match: string | RegExp;
  reply: Reply;
};

export function jsonResponse(status: number, body: unknown): TransportResponse {
  const text = body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body);
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () => text,
  };
}

/**
 * In-process stand-in for `PooledTransport`. Routes match on method plus the
 * exact path (string) or the full URL (RegExp); the first match wins.
 * Unrouted requests get a 404.
 */
export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  closeCalls = 0;
  private readonly routes: Route[] = [];
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  on(method: string, match: string | RegExp, reply: Reply): this {
    this.routes.push({ method, match, reply });
    return this;
  }

  async send(url: string, request: TransportRequest): Promise<TransportResponse> {
    if (this.isClosed) {
      throw new Error('transport is closed');
    }
    const parsed = new URL(url);
    const recorded: RecordedRequest = {
      url,
      method: request.method,
      host: parsed.host,
      path: parsed.pathname,
      query: parsed.searchParams,
      headers: request.headers,
      body: request.body === undefined ? undefined : JSON.parse(request.body),
      signal: request.signal,
    };
    this.requests.push(recorded);

    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method &&
        (typeof candidate.match === 'string' ? candidate.match === recorded.path : candidate.match.test(url))
    );
    if (!route) {
      return jsonResponse(404, { message: `no route for ${request.method} ${recorded.path}` });
    }
    if (route.reply instanceof Error) {
      throw route.reply;
    }
    if (typeof route.reply === 'function') {
      return route.reply(recorded);
    }
    return route.reply;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.isClosed = true;
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path === path);
  }
}
