import { isRecord } from '@webgrade/sdk';
import { ValidationError, errorMessage } from '../errors.js';
import { NormalizedValue } from './base.js';

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])])
    );
  }
  return value;
}

/**
 * Compact JSON with object keys sorted at every depth.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export class JsonStringValue extends NormalizedValue<string> {
  readonly kind = 'json' as const;

  parse(raw: unknown): JsonStringValue {
    return new JsonStringValue(raw, this.options);
  }

  protected normalize(raw: unknown): string {
    if (typeof raw !== 'string') {
      throw new ValidationError('JsonString only accepts string input');
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(`JsonString got invalid JSON: ${errorMessage(err)}`);
    }
    return canonicalJson(parsed);
  }

  protected keyOf(value: string): string {
    return value;
  }
}
