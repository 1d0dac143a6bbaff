import { isRecord } from '@webgrade/sdk';
import { ValidationError } from '../errors.js';
import { mergeQueryParams, normalizeUrl, type QueryParams, type UrlParts } from '../url-utils.js';
import { NormalizedValue, describeRaw } from './base.js';

const SITE_PLACEHOLDER = /__[A-Z][A-Z0-9_]*__/;

function readQueryRecord(raw: unknown): QueryParams {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ValidationError(`query_params must be an object, got ${describeRaw(raw)}`);
  const params: QueryParams = {};
  for (const [key, value] of Object.entries(raw)) {
    const values = Array.isArray(value) ? value : [value];
    params[key] = values.map((item) => String(item));
  }
  return params;
}

export class UrlValue extends NormalizedValue<UrlParts> {
  readonly kind = 'url' as const;

  parse(raw: unknown): UrlValue {
    return new UrlValue(raw, this.options);
  }

  protected normalize(raw: unknown): UrlParts {
    if (typeof raw === 'string') {
      if (!raw.trim()) throw new ValidationError('URL value is empty');
      return normalizeUrl(this.render(raw));
    }
    if (isRecord(raw) && typeof raw.base_url === 'string') {
      const base = normalizeUrl(this.render(raw.base_url));
      return {
        baseUrl: base.baseUrl,
        queryParams: mergeQueryParams(base.queryParams, readQueryRecord(raw.query_params)),
      };
    }
    throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a URL`);
  }

  private render(url: string): string {
    if (this.options.renderUrl && SITE_PLACEHOLDER.test(url)) return this.options.renderUrl(url);
    return url;
  }

  protected serialize(value: UrlParts): { base_url: string; query_params: QueryParams } {
    return { base_url: value.baseUrl, query_params: value.queryParams };
  }
}
