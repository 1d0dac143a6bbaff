import { ValidationError } from '../errors.js';
import { NormalizedValue, describeRaw } from './base.js';

const METERS_PER_UNIT: Record<string, number> = {
  m: 1,
  meter: 1,
  meters: 1,
  metre: 1,
  metres: 1,
  km: 1000,
  kilometer: 1000,
  kilometers: 1000,
  kilometre: 1000,
  kilometres: 1000,
  mi: 1609.34,
  mile: 1609.34,
  miles: 1609.34,
  ft: 0.3048,
  foot: 0.3048,
  feet: 0.3048,
};

const MIN_TOLERANCE_METERS = 10;
const RELATIVE_TOLERANCE = 0.02;

export function parseDistance(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;
  const match = /^(\d+(?:\.\d+)?|\.\d+)\s*([a-z]+)?\.?$/.exec(raw.trim().toLowerCase().replace(/,/g, ''));
  if (!match) return null;
  const unit = match[2] ?? 'm';
  const factor = METERS_PER_UNIT[unit];
  if (factor === undefined) return null;
  return Number(match[1]) * factor;
}

export class DistanceValue extends NormalizedValue<number> {
  readonly kind = 'distance' as const;

  parse(raw: unknown): DistanceValue {
    return new DistanceValue(raw, this.options);
  }

  protected normalize(raw: unknown): number {
    const meters = parseDistance(raw);
    if (meters === null) {
      throw new ValidationError(`Cannot parse ${describeRaw(raw)} as a distance`);
    }
    return meters;
  }

  protected matches(a: number, b: number): boolean {
    const tolerance = Math.max(MIN_TOLERANCE_METERS, RELATIVE_TOLERANCE * Math.max(Math.abs(a), Math.abs(b)));
    return Math.abs(a - b) <= tolerance;
  }
}
