/**
 * Authenticated session.
 *
 * An `Api` owns one transport (connection pool) and one signed-in user for
 * its whole lifetime. Façades share both through `request`; none of them
 * opens a transport of its own. Prefer `withApi`, which closes the session on
 * every exit path.
 */

import { dispatch } from '../../lib/api/fetch';
import { PooledTransport, type Transport } from '../../lib/api/transport';
import {
  CognitoAuthenticator,
  FileCredentialCache,
  resolveUser,
  type Authenticator,
  type CredentialCache,
  type User,
} from '../../lib/auth';
import { loadConfig, type ClientConfig, type ClientConfigOverrides } from '../../lib/config';
import { StateError } from '../../lib/errors';
import { Logger } from '../../lib/logger';
import type { MemberDetail, StudioDetail } from './schemas';
import {
  createClassesApi,
  createDnaApi,
  createMembersApi,
  createPerformanceApi,
  createStudiosApi,
  type ClassesApi,
  type DnaApi,
  type MembersApi,
  type PerformanceApi,
  type StudiosApi,
} from './services';
import type { ApiRequest, ApiSession } from './session';

export type ApiOptions = {
  username: string;
  password: string;
  config?: ClientConfigOverrides;
  logger?: Logger;
  /** Taken over by the session and closed with it. */
  transport?: Transport;
  cache?: CredentialCache;
  authenticator?: Authenticator;
  now?: () => Date;
};

export class Api implements ApiSession {
  readonly members: MembersApi;
  readonly studios: StudiosApi;
  readonly classes: ClassesApi;
  readonly performance: PerformanceApi;
  readonly dna: DnaApi;

  private currentUser: User | null;
  private memberDetail: MemberDetail | null = null;
  private homeStudioDetail: StudioDetail | null = null;
  private renewing: Promise<User> | null = null;
  private closing: Promise<void> | null = null;

  private constructor(
    user: User,
    private readonly renewUser: () => Promise<User>,
    private readonly transport: Transport,
    readonly config: ClientConfig,
    readonly logger: Logger,
    private readonly now: () => Date
  ) {
    this.currentUser = user;
    this.members = createMembersApi(this);
    this.studios = createStudiosApi(this);
    this.classes = createClassesApi(this, this.members);
    this.performance = createPerformanceApi(this);
    this.dna = createDnaApi(this);
  }

  /**
   * Sign in (cached tokens, refresh, or password) and load the member and
   * home studio. If any step fails the transport is closed before the error
   * propagates.
   */
  static async create(options: ApiOptions): Promise<Api> {
    const logger = options.logger ?? new Logger();
    const transport = options.transport ?? new PooledTransport();
    const now = options.now ?? (() => new Date());

    try {
      const config = loadConfig(options.config);
      const cache = options.cache ?? new FileCredentialCache(config.credentialsDir, logger);
      const authenticator =
        options.authenticator ??
        new CognitoAuthenticator({
          region: config.cognito.region,
          clientId: config.cognito.clientId,
          transport,
          logger,
          now,
        });
      const resolve = () =>
        resolveUser({ username: options.username, password: options.password, cache, authenticator, logger, now });

      const user = await resolve();
      const api = new Api(user, resolve, transport, config, logger, now);
      await api.bootstrap();
      return api;
    } catch (err) {
      logger.error('Failed to create API session', err, { username: options.username });
      await transport.close();
      throw err;
    }
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  get user(): User {
    if (!this.currentUser) {
      throw new StateError('No user is logged in');
    }
    return this.currentUser;
  }

  get member(): MemberDetail {
    if (!this.memberDetail) {
      throw new StateError('Session has not loaded the member yet');
    }
    return this.memberDetail;
  }

  get homeStudio(): StudioDetail {
    if (!this.homeStudioDetail) {
      throw new StateError('Session has not loaded the home studio yet');
    }
    return this.homeStudioDetail;
  }

  get homeStudioUuid(): string {
    return this.member.homeStudio.studioUuid;
  }

  get baseHeaders(): Record<string, string> {
    if (this.closed) {
      throw new StateError('Session is closed');
    }
    return {
      Authorization: `Bearer ${this.user.credential.idToken}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  /** Send one request on the session's transport, with fresh auth headers. */
  async request(request: ApiRequest): Promise<unknown> {
    if (this.closed) {
      throw new StateError('Session is closed');
    }
    await this.ensureFreshCredentials();
    return dispatch(
      {
        transport: this.transport,
        hosts: this.config.hosts,
        authHeaders: this.baseHeaders,
        logger: this.logger,
        timeoutMs: this.config.requestTimeoutMs,
      },
      request
    );
  }

  /** Release the transport. Safe to call more than once. */
  close(): Promise<void> {
    if (!this.closing) {
      this.logger.debug('Closing API session');
      this.currentUser = null;
      this.closing = this.transport.close();
    }
    return this.closing;
  }

  private async bootstrap(): Promise<void> {
    this.memberDetail = await this.members.getMemberDetail();
    this.homeStudioDetail = await this.studios.getStudioDetail(this.memberDetail.homeStudio.studioUuid);
    this.logger.info('API session ready', {
      memberUuid: this.memberDetail.memberUuid,
      homeStudio: this.homeStudioDetail.name,
    });
  }

  private async ensureFreshCredentials(): Promise<void> {
    if (!this.user.isExpired(this.now())) return;

    this.renewing ??= this.renewUser().finally(() => {
      this.renewing = null;
    });
    const renewed = await this.renewing;
    if (!this.closed) this.currentUser = renewed;
  }
}

/**
 * Run `fn` against a fresh session and close it afterwards, whether `fn`
 * resolves or throws.
 *
 * @example
 * ```ts
 * const bookings = await withApi({ username, password }, (api) => api.members.getBookings());
 * ```
 */
export async function withApi<T>(options: ApiOptions, fn: (api: Api) => Promise<T>): Promise<T> {
  const api = await Api.create(options);
  try {
    return await fn(api);
  } finally {
    await api.close();
  }
}
