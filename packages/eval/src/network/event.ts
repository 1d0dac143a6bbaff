import type { HarEntry, HarHeader } from './har.js';

const STATIC_ASSET_EXTENSIONS = ['.css', '.js', '.png', '.jpg', '.jpeg', '.gif', '.svg', '.woff', '.woff2', '.ttf', '.ico'];

export interface NetworkEventInit {
  url: string;
  method: string;
  requestHeaders?: Record<string, string>;
  responseStatus: number;
  responseHeaders?: Record<string, string>;
  redirectUrl?: string | null;
  postData?: string | null;
}

/**
 * Lower-cased header names; repeated headers are joined with `, `.
 */
export function headersToRecord(headers: readonly HarHeader[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const { name, value } of headers) {
    const key = name.toLowerCase();
    record[key] = key in record ? `${record[key]}, ${value}` : value;
  }
  return record;
}

function lowerCaseKeys(headers: Record<string, string> = {}): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
}

/**
 * One HTTP transaction from a capture.
 */
export class NetworkEvent {
  readonly url: string;
  readonly method: string;
  readonly requestHeaders: Readonly<Record<string, string>>;
  readonly responseStatus: number;
  readonly responseHeaders: Readonly<Record<string, string>>;
  readonly redirectUrl: string | null;
  readonly postData: string | null;

  constructor(init: NetworkEventInit) {
    this.url = init.url;
    this.method = init.method.toUpperCase();
    this.requestHeaders = Object.freeze(lowerCaseKeys(init.requestHeaders));
    this.responseStatus = init.responseStatus;
    this.responseHeaders = Object.freeze(lowerCaseKeys(init.responseHeaders));
    const isRedirectStatus = init.responseStatus >= 300 && init.responseStatus < 400;
    this.redirectUrl = isRedirectStatus ? init.redirectUrl || this.responseHeaders.location || null : null;
    this.postData = init.postData ?? null;
    Object.freeze(this);
  }

  static fromHarEntry(entry: HarEntry): NetworkEvent {
    return new NetworkEvent({
      url: entry.request.url,
      method: entry.request.method,
      requestHeaders: headersToRecord(entry.request.headers),
      responseStatus: entry.response.status,
      responseHeaders: headersToRecord(entry.response.headers),
      redirectUrl: entry.response.redirectURL,
      postData: entry.request.postData?.text,
    });
  }

  get isRedirect(): boolean {
    return this.responseStatus >= 300 && this.responseStatus < 400 && this.redirectUrl !== null;
  }

  get isRequestSuccess(): boolean {
    return this.responseStatus >= 100 && this.responseStatus < 400;
  }

  /** URL path without scheme, host, query or fragment. */
  get path(): string {
    const withoutOrigin = this.url.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i, '');
    const path = withoutOrigin.split(/[?#]/)[0];
    return path || '/';
  }

  get isEvaluationEvent(): boolean {
    const path = this.path.toLowerCase();
    return !STATIC_ASSET_EXTENSIONS.some((extension) => path.endsWith(extension));
  }

  header(name: string): string | undefined {
    return this.requestHeaders[name.toLowerCase()];
  }
}
