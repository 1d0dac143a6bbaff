import { ValidationError } from '../errors.js';
import { isPattern, textMatches } from '../patterns.js';
import { NormalizedValue } from './base.js';

const BASE64 = /^[A-Za-z0-9+/_-]+={0,2}$/;
const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Base64 payload compared by its decoded text. Case is kept; patterns are matched dot-all
 * against the decoded text of the other side.
 */
export class Base64Value extends NormalizedValue<string> {
  readonly kind = 'base64' as const;

  parse(raw: unknown): Base64Value {
    return new Base64Value(raw, this.options);
  }

  protected normalize(raw: unknown): string {
    if (typeof raw !== 'string') {
      throw new ValidationError('Base64String only accepts string input');
    }
    const trimmed = raw.trim();
    if (!trimmed) throw new ValidationError('Base64String value is empty');
    if (isPattern(trimmed)) return trimmed;

    const compact = trimmed.replace(/\s+/g, '');
    if (!BASE64.test(compact) || compact.replace(/=+$/, '').length % 4 === 1) {
      throw new ValidationError(`Base64String got invalid base64: '${trimmed}'`);
    }
    let decoded: string;
    try {
      decoded = utf8.decode(Buffer.from(compact.replace(/-/g, '+').replace(/_/g, '/'), 'base64'));
    } catch (err) {
      if (err instanceof TypeError) {
        throw new ValidationError(`Base64String got invalid base64: '${trimmed}' is not UTF-8 text`);
      }
      throw err;
    }
    return decoded.replace(/\r\n?/g, '\n').trim();
  }

  protected matches(a: string, b: string): boolean {
    return textMatches(a, b, 's');
  }
}
