import { ValidationError } from '../errors.js';
import { NormalizedValue, describeRaw } from './base.js';

const SYMBOLS = /[$€£¥₹]|\b(?:usd|eur|gbp|jpy|cad|aud)\b/gi;

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Read the separator layout of an unsigned amount. When both `,` and `.` occur the last one is
 * the decimal separator; a lone separator followed by groups of three digits is a thousands
 * separator.
 */
function parseAmount(digits: string): number | null {
  if (!/^[\d.,]+$/.test(digits) || !/\d/.test(digits)) return null;
  const lastComma = digits.lastIndexOf(',');
  const lastDot = digits.lastIndexOf('.');
  let decimal: ',' | '.' | null = null;
  if (lastComma >= 0 && lastDot >= 0) {
    decimal = lastComma > lastDot ? ',' : '.';
  } else if (lastComma >= 0) {
    decimal = /^\d{1,3}(,\d{3})+$/.test(digits) ? null : ',';
  } else if (lastDot >= 0) {
    decimal = /^\d{1,3}(\.\d{3}){2,}$/.test(digits) ? null : '.';
  }
  const thousands = decimal === ',' ? '.' : ',';
  let plain = digits.split(thousands).join('');
  if (decimal === null) plain = plain.replace(/[.,]/g, '');
  else if (decimal === ',') plain = plain.replace(',', '.');
  if (!/^(\d+\.?\d*|\.\d+)$/.test(plain)) return null;
  return Number(plain);
}

export function parseCurrency(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? roundToCents(raw) : null;
  if (typeof raw !== 'string') return null;
  let text = raw.trim();
  let negative = false;
  if (/^\(.*\)$/.test(text)) {
    negative = true;
    text = text.slice(1, -1);
  }
  text = text.replace(SYMBOLS, '').replace(/\s+/g, '');
  if (text.includes('-')) {
    negative = true;
    text = text.replace(/-/g, '');
  }
  text = text.replace(/^\+/, '');
  const amount = parseAmount(text);
  if (amount === null) return null;
  return roundToCents(negative ? -amount : amount);
}

export class CurrencyValue extends NormalizedValue<number> {
  readonly kind = 'currency' as const;

  parse(raw: unknown): CurrencyValue {
    return new CurrencyValue(raw, this.options);
  }

  protected normalize(raw: unknown): number {
    const amount = parseCurrency(raw);
    if (amount === null) {
      throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a currency amount`);
    }
    return amount;
  }

  protected matches(a: number, b: number): boolean {
    return a === b;
  }

  /** Decimal string, e.g. `100.0` or `99.99`. */
  protected serialize(value: number): string {
    return Number.isInteger(value) ? `${value}.0` : String(value);
  }
}
