import { ValidationError } from '../errors.js';
import { isPattern, textMatches } from '../patterns.js';
import { NormalizedValue, describeRaw } from './base.js';

const SURROUNDING_QUOTES = /^[\s"'`]+|[\s"'`]+$/g;

/**
 * Trim quotes and whitespace, lowercase. Plain text also collapses inner whitespace and drops
 * trailing periods; patterns are left as written.
 */
export function normalizeText(raw: string): string {
  const stripped = raw.replace(SURROUNDING_QUOTES, '').toLowerCase();
  if (isPattern(stripped)) return stripped;
  return stripped.replace(/\s+/g, ' ').replace(/\.+$/, '').trim();
}

export class StringValue extends NormalizedValue<string> {
  readonly kind = 'string' as const;

  parse(raw: unknown): StringValue {
    return new StringValue(raw, this.options);
  }

  protected normalize(raw: unknown): string {
    if (typeof raw === 'string') return normalizeText(raw);
    if (typeof raw === 'number' || typeof raw === 'boolean') return normalizeText(String(raw));
    throw new ValidationError(`Cannot read ${describeRaw(raw)} as a string`);
  }

  protected matches(a: string, b: string): boolean {
    return textMatches(a, b);
  }

  /** True when the canonical value is a regex pattern. */
  get isPattern(): boolean {
    return isPattern(this.normalized);
  }
}
