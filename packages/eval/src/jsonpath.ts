import { isRecord } from '@webgrade/sdk';
import { ValidationError } from './errors.js';
import { isPattern } from './patterns.js';

type PathSegment = { kind: 'key'; key: string } | { kind: 'index'; index: number } | { kind: 'wildcard' };

const DOT_KEY = /^[A-Za-z_][\w-]*/;
const BRACKET = /^\[\s*(?:(\d+)|(\*)|'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)")\s*\]/;

export interface JsonPathOptions {
  /** Throw on malformed paths and on paths that match nothing. */
  strict?: boolean;
}

/**
 * Keys in expected request bodies that address values by JSONPath (`$...`) or by a key
 * pattern (`^...$`) instead of by name.
 */
export function isJsonPathKey(key: unknown): boolean {
  if (typeof key !== 'string' || key === '') return false;
  return key.startsWith('$') || isPattern(key);
}

function parsePath(path: string): PathSegment[] | null {
  if (!path.startsWith('$')) return null;
  const segments: PathSegment[] = [];
  let rest = path.slice(1);

  while (rest.length > 0) {
    if (rest.startsWith('.*')) {
      segments.push({ kind: 'wildcard' });
      rest = rest.slice(2);
    } else if (rest.startsWith('.')) {
      const match = DOT_KEY.exec(rest.slice(1));
      if (!match) return null;
      segments.push({ kind: 'key', key: match[0] });
      rest = rest.slice(1 + match[0].length);
    } else if (rest.startsWith('[')) {
      const match = BRACKET.exec(rest);
      if (!match) return null;
      if (match[1] !== undefined) segments.push({ kind: 'index', index: Number(match[1]) });
      else if (match[2] !== undefined) segments.push({ kind: 'wildcard' });
      else segments.push({ kind: 'key', key: (match[3] ?? match[4]).replace(/\\(.)/g, '$1') });
      rest = rest.slice(match[0].length);
    } else {
      return null;
    }
  }
  return segments;
}

function step(values: unknown[], segment: PathSegment): unknown[] {
  const next: unknown[] = [];
  for (const value of values) {
    if (segment.kind === 'key') {
      if (isRecord(value) && Object.hasOwn(value, segment.key)) next.push(value[segment.key]);
    } else if (segment.kind === 'index') {
      if (Array.isArray(value) && segment.index < value.length) next.push(value[segment.index]);
    } else if (Array.isArray(value)) {
      next.push(...value);
    } else if (isRecord(value)) {
      next.push(...Object.values(value));
    }
  }
  return next;
}

/** Every value a path selects, in document order, or null for a malformed path. */
export function jsonPathMatches(data: unknown, path: string): unknown[] | null {
  const segments = parsePath(path);
  return segments === null ? null : segments.reduce<unknown[]>(step, [data]);
}

/**
 * Evaluate a JSONPath subset (`$`, `.key`, `['key']`, `[n]`, `[*]`, `.*`). One match returns the
 * value itself, several return an array, none returns null unless strict.
 */
export function extractJsonPath(data: unknown, path: string, options: JsonPathOptions = {}): unknown {
  const matches = jsonPathMatches(data, path);
  if (matches === null) {
    if (options.strict) throw new ValidationError(`Invalid JSONPath expression: '${path}'`);
    return null;
  }
  if (matches.length === 0) {
    if (options.strict) throw new ValidationError(`JSONPath '${path}' matched 0 values`);
    return null;
  }
  return matches.length === 1 ? matches[0] : matches;
}

function tryParseStructured(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return text;
  try {
    return JSON.parse(trimmed);
  } catch (err) {
    if (err instanceof SyntaxError) return text;
    throw err;
  }
}

/**
 * Decode object values that hold JSON text. List items are left alone, and freshly decoded
 * values are not decoded again.
 */
export function deserializeNestedJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === 'string' ? item : deserializeNestedJson(item)));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        typeof item === 'string' ? tryParseStructured(item) : deserializeNestedJson(item),
      ])
    );
  }
  return value;
}
