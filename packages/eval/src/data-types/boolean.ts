import { ValidationError } from '../errors.js';
import { NormalizedValue, describeRaw } from './base.js';

const TRUTHY = new Set(['true', 'yes', 'y', 'on', '1']);
const FALSY = new Set(['false', 'no', 'n', 'off', '0']);

export class BooleanValue extends NormalizedValue<boolean> {
  readonly kind = 'boolean' as const;

  parse(raw: unknown): BooleanValue {
    return new BooleanValue(raw, this.options);
  }

  protected normalize(raw: unknown): boolean {
    if (typeof raw === 'boolean') return raw;
    if (raw === 1 || raw === 0) return raw === 1;
    if (typeof raw === 'string') {
      const text = raw.trim().toLowerCase();
      if (TRUTHY.has(text)) return true;
      if (FALSY.has(text)) return false;
    }
    throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a boolean`);
  }
}
