import { ValidationError } from '../errors.js';
import { NormalizedValue, describeRaw } from './base.js';

const NUMBER_WORDS = [
  'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten',
  'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen', 'seventeen', 'eighteen',
  'nineteen', 'twenty',
];

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;

export function parseNumber(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;
  const text = raw.trim().toLowerCase();
  const wordIndex = NUMBER_WORDS.indexOf(text);
  if (wordIndex >= 0) return wordIndex;
  const compact = text.replace(/[,\s]/g, '');
  if (!NUMERIC.test(compact)) return null;
  return Number(compact);
}

export class NumberValue extends NormalizedValue<number> {
  readonly kind = 'number' as const;

  parse(raw: unknown): NumberValue {
    return new NumberValue(raw, this.options);
  }

  protected normalize(raw: unknown): number {
    const value = parseNumber(raw);
    if (value === null) {
      throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a number`);
    }
    return value;
  }

  protected matches(a: number, b: number): boolean {
    return a === b;
  }
}
