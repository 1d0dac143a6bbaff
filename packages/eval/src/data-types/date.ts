import { ValidationError } from '../errors.js';
import { NormalizedValue, describeRaw } from './base.js';

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const ISO = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[t ].*)?$/;
const YEAR_FIRST_SLASHED = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const YEAR_LAST = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const MONTH_NAME_FIRST = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const DAY_FIRST = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/;

function monthFromName(name: string): number | null {
  if (name.length < 3) return null;
  const index = MONTHS.findIndex((month) => month.startsWith(name));
  return index >= 0 ? index + 1 : null;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toIsoDate(year: number, month: number | null, day: number): string | null {
  if (month === null || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parse the date formats agents commonly emit into `YYYY-MM-DD`. Slashed dates are read as
 * month first unless the first field cannot be a month.
 */
export function parseDate(raw: string): string | null {
  const text = raw.trim().toLowerCase();
  let match = ISO.exec(text) ?? YEAR_FIRST_SLASHED.exec(text);
  if (match) return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = YEAR_LAST.exec(text);
  if (match) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    const year = Number(match[3]);
    return first > 12 ? toIsoDate(year, second, first) : toIsoDate(year, first, second);
  }

  match = MONTH_NAME_FIRST.exec(text);
  if (match) return toIsoDate(Number(match[3]), monthFromName(match[1]), Number(match[2]));

  match = DAY_FIRST.exec(text);
  if (match) return toIsoDate(Number(match[3]), monthFromName(match[2]), Number(match[1]));

  return null;
}

export class DateValue extends NormalizedValue<string> {
  readonly kind = 'date' as const;

  parse(raw: unknown): DateValue {
    return new DateValue(raw, this.options);
  }

  protected normalize(raw: unknown): string {
    const parsed = typeof raw === 'string' ? parseDate(raw) : null;
    if (parsed === null) {
      throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a date`);
    }
    return parsed;
  }
}
