/* lib/errors.ts
 * Error taxonomy shared by the dispatcher, the model layer and the session.
 */

export class ApiClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ApiClientError';
  }
}

/** Bad or expired credentials; the caller has to prompt again. */
export class AuthError extends ApiClientError {
  constructor(message: string, public readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/** Transport failure: no response was received. */
export class NetworkError extends ApiClientError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/** Non-2xx response. `body` is the raw response text. */
export class HttpError extends ApiClientError {
  constructor(public readonly status: number, public readonly url: string, public readonly body: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpError';
  }
}

export class DecodeError extends ApiClientError {
  constructor(public readonly url: string, public readonly body: string, options?: { cause?: unknown }) {
    super(`Response from ${url} is not valid JSON`, options);
    this.name = 'DecodeError';
  }
}

export type ValidationDetails = {
  path: string;
  reason: string;
  value?: unknown;
  allowed?: readonly string[];
};

/** JSON did not match the declared model. `path` is the dotted internal field path. */
export class ValidationError extends ApiClientError {
  readonly path: string;
  readonly reason: string;
  readonly value: unknown;
  readonly allowed: readonly string[] | undefined;

  constructor(details: ValidationDetails) {
    const allowed = details.allowed ? ` (allowed: ${details.allowed.join(', ')})` : '';
    super(`${details.path}: ${details.reason}${allowed}`);
    this.name = 'ValidationError';
    this.path = details.path;
    this.reason = details.reason;
    this.value = details.value;
    this.allowed = details.allowed;
  }
}

/** Operation attempted without the setup it needs, e.g. no authenticated user. */
export class StateError extends ApiClientError {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}
