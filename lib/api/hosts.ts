/**
 * Host aliases. Each façade call names one; the session's config maps it to a hostname.
 */

export const HOST_ALIASES = ['default', 'io', 'dna'] as const;

export type HostAlias = (typeof HOST_ALIASES)[number];

export type HostMap = Readonly<Record<HostAlias, string>>;

export function resolveHost(hosts: HostMap, alias: HostAlias): string {
  return hosts[alias];
}

export type QueryValue = string | number | boolean | Date | null | undefined;

export type QueryParams = Readonly<Record<string, QueryValue | readonly QueryValue[]>>;

function isList(value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] {
  return Array.isArray(value);
}

function encodeValue(value: Exclude<QueryValue, null | undefined>): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Drop null and undefined entries. Absent and explicitly-null both mean
 * "not sent"; arrays repeat the key.
 */
export function buildQuery(params: QueryParams = {}): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, raw] of Object.entries(params)) {
    const values = isList(raw) ? raw : [raw];
    for (const value of values) {
      if (value === null || value === undefined) continue;
      search.append(key, encodeValue(value));
    }
  }
  return search;
}

/** `https://<host>/<path>?<query>` */
export function buildUrl(host: string, path: string, params?: QueryParams): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(`https://${host}${normalizedPath}`);
  const query = buildQuery(params);
  const encoded = query.toString();
  if (encoded) url.search = encoded;
  return url.toString();
}
