import type { DispatchRequest } from '../../lib/api/fetch';
import type { User } from '../../lib/auth';
import type { MemberDetail, StudioDetail } from './schemas';

export type ApiRequest = DispatchRequest;

/** What a façade needs from the session it belongs to. */
export interface ApiSession {
  readonly user: User;
  /** Set once the session has bootstrapped. */
  readonly member: MemberDetail;
  readonly homeStudio: StudioDetail;
  readonly homeStudioUuid: string;
  request(request: ApiRequest): Promise<unknown>;
}

/** Path segment for a member- or studio-scoped endpoint. */
export function segment(value: string): string {
  return encodeURIComponent(value);
}

/** `yyyy-MM-dd` for the date-only query parameters the API takes. */
export function toDateParam(value: Date | null | undefined): string | null {
  return value ? value.toISOString().slice(0, 10) : null;
}
