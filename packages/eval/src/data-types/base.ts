import { ValidationError } from '../errors.js';

export type ValueKind =
  | 'string'
  | 'number'
  | 'boolean'
  | 'date'
  | 'currency'
  | 'distance'
  | 'duration'
  | 'url'
  | 'base64'
  | 'json'
  | 'markdown';

export interface ValueOptions {
  /** Resolves site placeholders (`__SITE__`) in URL values. */
  renderUrl?: (template: string) => string;
}

/**
 * Immutable canonical value with one or more acceptable alternatives.
 *
 * A raw array is read as alternatives and must hold at least two items; anything else is a
 * single alternative. Two values are equal when any pair of their alternatives matches under
 * the kind's predicate.
 */
export abstract class NormalizedValue<T> {
  abstract readonly kind: ValueKind;
  readonly alternatives: readonly T[];
  protected readonly options: ValueOptions;

  constructor(raw: unknown, options: ValueOptions = {}) {
    this.options = options;
    if (Array.isArray(raw)) {
      if (raw.length < 2) {
        throw new ValidationError(`Alternatives require 2+ items, got ${raw.length}`);
      }
      this.alternatives = Object.freeze(raw.map((item) => this.normalize(item)));
    } else {
      this.alternatives = Object.freeze([this.normalize(raw)]);
    }
  }

  /** Canonical form of the first alternative. */
  get normalized(): T {
    return this.alternatives[0];
  }

  /** Build a value of the same kind and options from actual data. */
  abstract parse(raw: unknown): NormalizedValue<T>;

  protected abstract normalize(raw: unknown): T;

  protected matches(a: T, b: T): boolean {
    return this.keyOf(a) === this.keyOf(b);
  }

  protected keyOf(value: T): string {
    return JSON.stringify(this.serialize(value));
  }

  protected serialize(value: T): unknown {
    return value;
  }

  equals(other: NormalizedValue<T>): boolean {
    if (other.kind !== this.kind) return false;
    for (const mine of this.alternatives) {
      for (const theirs of other.alternatives) {
        if (this.matches(mine, theirs)) return true;
      }
    }
    return false;
  }

  hashKey(): string {
    const keys = this.alternatives.map((value) => this.keyOf(value));
    if (keys.length === 1) return `${this.kind}:${keys[0]}`;
    return `${this.kind}:[${keys.sort().join(',')}]`;
  }

  toJSON(): unknown {
    if (this.alternatives.length === 1) return this.serialize(this.normalized);
    return this.alternatives.map((value) => this.serialize(value));
  }

  toString(): string {
    return `${this.kind}(${JSON.stringify(this.toJSON())})`;
  }
}

export function describeRaw(raw: unknown): string {
  return typeof raw === 'string' ? `'${raw}'` : JSON.stringify(raw) ?? String(raw);
}
