import { ValidationError } from '../errors.js';
import { NormalizedValue, describeRaw } from './base.js';

const SECONDS_PER_UNIT: Array<[RegExp, number]> = [
  [/^d(ays?)?$/, 86400],
  [/^h(ours?|rs?)?$/, 3600],
  [/^m(inutes?|ins?)?$/, 60],
  [/^s(econds?|ecs?)?$/, 1],
];

const CLOCK = /^(\d+):(\d{2})(?::(\d{2}))?$/;
const COMPONENT = /(\d+(?:\.\d+)?)\s*([a-z]+)/g;

const MIN_TOLERANCE_SECONDS = 180;
const RELATIVE_TOLERANCE = 0.1;

function unitSeconds(unit: string): number | null {
  for (const [pattern, seconds] of SECONDS_PER_UNIT) {
    if (pattern.test(unit)) return seconds;
  }
  return null;
}

/**
 * Parse a duration into seconds. Accepts clock forms (`2:30`, `2:30:45`) and unit sequences
 * (`2h30m`, `2 hours 30 minutes`). A bare number counts minutes.
 */
export function parseDuration(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw * 60 : null;
  if (typeof raw !== 'string') return null;
  const text = raw.trim().toLowerCase();
  if (/^\d+(\.\d+)?$/.test(text)) return Number(text) * 60;

  const clock = CLOCK.exec(text);
  if (clock) {
    return Number(clock[1]) * 3600 + Number(clock[2]) * 60 + Number(clock[3] ?? 0);
  }

  let total = 0;
  let found = false;
  const rest = text.replace(COMPONENT, (whole: string, amount: string, unit: string) => {
    const seconds = unitSeconds(unit);
    if (seconds === null) return whole;
    total += Number(amount) * seconds;
    found = true;
    return ' ';
  });
  if (!found || rest.replace(/\band\b|,/g, '').trim() !== '') return null;
  return total;
}

export class DurationValue extends NormalizedValue<number> {
  readonly kind = 'duration' as const;

  parse(raw: unknown): DurationValue {
    return new DurationValue(raw, this.options);
  }

  protected normalize(raw: unknown): number {
    const seconds = parseDuration(raw);
    if (seconds === null) {
      throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a duration`);
    }
    return seconds;
  }

  protected matches(a: number, b: number): boolean {
    const tolerance = Math.max(MIN_TOLERANCE_SECONDS, RELATIVE_TOLERANCE * Math.max(a, b));
    return Math.abs(a - b) <= tolerance;
  }
}
