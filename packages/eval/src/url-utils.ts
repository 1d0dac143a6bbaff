export type QueryParams = Record<string, string[]>;

export interface UrlParts {
  baseUrl: string;
  queryParams: QueryParams;
}

export interface Base64QueryExtraction {
  path: string;
  queries: string[];
}

const BASE64_SEGMENT = /^[A-Za-z0-9_-]{4,}={0,2}$/;
const QUERY_SHAPE = /^[^=&]+=[^&]*(?:&[^=&]+=[^&]*)*$/;
const DEFAULT_PORTS: Record<string, string> = { http: ':80', https: ':443' };

const utf8 = new TextDecoder('utf-8', { fatal: true });

function byKey<V>([a]: [string, V], [b]: [string, V]): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function decodeComponent(text: string): string {
  const spaced = text.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch (err) {
    if (err instanceof URIError) return spaced;
    throw err;
  }
}

function decodeBase64Segment(segment: string): string | null {
  if (!BASE64_SEGMENT.test(segment)) return null;
  const body = segment.replace(/=+$/, '');
  if (body.length % 4 === 1) return null;
  const bytes = Buffer.from(body.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
  try {
    return utf8.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

/**
 * Merge query mappings, concatenating values per key. Keys and values come out sorted.
 */
export function mergeQueryParams(...sources: QueryParams[]): QueryParams {
  const merged = new Map<string, string[]>();
  for (const source of sources) {
    for (const [key, values] of Object.entries(source)) {
      merged.set(key, [...(merged.get(key) ?? []), ...values]);
    }
  }
  return Object.fromEntries(
    [...merged.entries()].sort(byKey).map(([key, values]): [string, string[]] => [key, [...values].sort()])
  );
}

/**
 * Parse a query string into a key-sorted mapping of sorted values. `+` reads as a space and a key
 * without `=` maps to an empty string.
 */
export function normalizeQuery(query: string): QueryParams {
  const params: QueryParams = {};
  for (const part of query.replace(/^[?&]+/, '').split('&')) {
    if (!part) continue;
    const eq = part.indexOf('=');
    const key = decodeComponent(eq >= 0 ? part.slice(0, eq) : part);
    const value = eq >= 0 ? decodeComponent(part.slice(eq + 1)) : '';
    params[key] = [...(params[key] ?? []), value];
  }
  return mergeQueryParams(params);
}

/**
 * Pull URL-safe base64 path segments that decode to `key=value[&key=value]` out of a path.
 * Leading and trailing slashes survive the removal.
 */
export function extractBase64Query(path: string): Base64QueryExtraction {
  const leading = path.startsWith('/');
  const trailing = path.length > 1 && path.endsWith('/');
  const kept: string[] = [];
  const queries: string[] = [];

  for (const segment of path.split('/')) {
    if (!segment) continue;
    const decoded = decodeBase64Segment(segment)?.replace(/^[?&]+/, '');
    if (decoded !== undefined && QUERY_SHAPE.test(decoded)) {
      queries.push(decoded);
    } else {
      kept.push(segment);
    }
  }

  if (queries.length === 0) return { path, queries };

  let rebuilt = (leading ? '/' : '') + kept.join('/');
  if (trailing && kept.length > 0) rebuilt += '/';
  if (rebuilt === '' && leading) rebuilt = '/';
  return { path: rebuilt, queries };
}

/**
 * Canonical URL: fragment dropped, scheme and host lowercased, default port and trailing slashes
 * removed, base64 query segments folded into the query mapping.
 */
export function normalizeUrl(url: string): UrlParts {
  const withoutFragment = url.trim().split('#')[0];
  const queryStart = withoutFragment.indexOf('?');
  const base = queryStart >= 0 ? withoutFragment.slice(0, queryStart) : withoutFragment;
  const query = queryStart >= 0 ? withoutFragment.slice(queryStart + 1) : '';

  let origin = '';
  let path = base;
  const match = /^([a-z][a-z0-9+.-]*):\/\/([^/]*)(.*)$/i.exec(base);
  if (match) {
    const scheme = match[1].toLowerCase();
    let host = match[2].toLowerCase();
    const defaultPort = DEFAULT_PORTS[scheme];
    if (defaultPort && host.endsWith(defaultPort)) host = host.slice(0, -defaultPort.length);
    origin = `${scheme}://${host}`;
    path = match[3];
  }

  const extracted = extractBase64Query(path);
  return {
    baseUrl: origin + extracted.path.replace(/\/+$/, ''),
    queryParams: mergeQueryParams(normalizeQuery(query), ...extracted.queries.map(normalizeQuery)),
  };
}
