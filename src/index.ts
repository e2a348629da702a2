export { Api, withApi, type ApiOptions } from './api/client';
export type { ApiRequest, ApiSession } from './api/session';
export * from './api/schemas';
export * from './api/services';

export { dispatch, mergeHeaders, type DispatchContext, type DispatchRequest, type HttpMethod } from '../lib/api/fetch';
export { buildQuery, buildUrl, HOST_ALIASES, type HostAlias, type HostMap, type QueryParams } from '../lib/api/hosts';
export { PooledTransport, type PooledTransportOptions, type Transport, type TransportRequest, type TransportResponse } from '../lib/api/transport';
export * from '../lib/auth';
export { DEFAULT_HOSTS, DEFAULT_REQUEST_TIMEOUT_MS, loadConfig, type ClientConfig, type ClientConfigOverrides } from '../lib/config';
export {
  ApiClientError,
  AuthError,
  DecodeError,
  HttpError,
  NetworkError,
  StateError,
  ValidationError,
} from '../lib/errors';
export { Logger, type LogLevel, type LoggerOptions, type LogSink } from '../lib/logger';
export * from '../lib/models';
