import { isRecord, type AssertionResult, type DiagnosticKind } from '@webgrade/sdk';
import { CircularReferenceError, ValidationError } from './errors.js';
import type { NormalizedValue } from './data-types/index.js';
import { describeTree, type ValueLeaf, type ValueList, type ValueMap, type ValueTree } from './value-tree.js';

export interface CompareOptions {
  /** Name of the root in diagnostic paths. Default `root`. */
  rootName?: string;
  /** Report keys present in actual but not expected. */
  strict?: boolean;
  /** Keys skipped on both sides. */
  ignoredKeys?: readonly string[];
}

export interface ComparisonOutcome {
  ok: boolean;
  assertions: AssertionResult[];
}

interface CompareContext {
  strict: boolean;
  ignoredKeys: ReadonlySet<string>;
}

const SUFFIXES: Record<DiagnosticKind, string> = {
  mismatch: 'mismatch',
  type_mismatch: 'type_mismatch',
  none_mismatch: 'none_mismatch',
  invalid_format: 'invalid_format',
  missing_key: 'keys_mismatch',
  extra_keys: 'keys_mismatch',
  array_values_mismatch: 'array_values_mismatch',
  not_found: 'not_found',
};

export function makeAssertion(
  path: string,
  kind: DiagnosticKind,
  expected: unknown,
  actual: unknown,
  messages: string[]
): AssertionResult {
  return { assertionName: `${path}_${SUFFIXES[kind]}`, kind, path, expected, actual, messages };
}

export function typeLabel(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function enter(ancestors: readonly object[], value: object, path: string): object[] {
  if (ancestors.includes(value)) throw new CircularReferenceError(path);
  return [...ancestors, value];
}

function compareLeaf(expected: ValueLeaf, actual: unknown, path: string): AssertionResult[] {
  const value = expected.value;
  if (Array.isArray(actual) || isRecord(actual)) {
    return [
      makeAssertion(path, 'mismatch', value.toJSON(), actual, [
        `Expected a single ${value.kind} value, got ${typeLabel(actual)}`,
      ]),
    ];
  }
  let parsed: NormalizedValue<unknown>;
  try {
    parsed = value.parse(actual);
  } catch (err) {
    if (err instanceof ValidationError) {
      return [makeAssertion(path, 'type_mismatch', value.toJSON(), actual, [err.message])];
    }
    throw err;
  }
  if (value.equals(parsed)) return [];
  return [
    makeAssertion(path, 'mismatch', value.toJSON(), actual, [
      `Expected ${JSON.stringify(value.toJSON())}, got ${JSON.stringify(parsed.toJSON())}`,
    ]),
  ];
}

function compareOrdered(
  expected: ValueList,
  actual: unknown[],
  path: string,
  ctx: CompareContext,
  ancestors: readonly object[]
): AssertionResult[] {
  if (expected.items.length !== actual.length) {
    return [
      makeAssertion(path, 'array_values_mismatch', describeTree(expected), actual, [
        `Expected ${expected.items.length} element(s) in order, got ${actual.length}`,
      ]),
    ];
  }
  return expected.items.flatMap((item, index) => compareNode(item, actual[index], `${path}[${index}]`, ctx, ancestors));
}

/**
 * Unordered lists pair expected and actual elements by maximum bipartite matching, so
 * overlapping patterns or alternatives never consume an element another expectation needs.
 */
function compareUnordered(
  expected: ValueList,
  actual: unknown[],
  path: string,
  ctx: CompareContext,
  ancestors: readonly object[]
): AssertionResult[] {
  const items = expected.items;
  const compatible = items.map((item) =>
    actual.map((candidate, j) => compareNode(item, candidate, `${path}[${j}]`, ctx, ancestors).length === 0)
  );
  const ownerOfActual = Array.from({ length: actual.length }, () => -1);

  const assign = (i: number, seen: boolean[]): boolean => {
    for (let j = 0; j < actual.length; j++) {
      if (!compatible[i][j] || seen[j]) continue;
      seen[j] = true;
      const owner = ownerOfActual[j];
      if (owner === -1 || assign(owner, seen)) {
        ownerOfActual[j] = i;
        return true;
      }
    }
    return false;
  };

  let matched = 0;
  for (let i = 0; i < items.length; i++) {
    if (assign(i, Array.from({ length: actual.length }, () => false))) matched++;
  }

  const missing = items.length - matched;
  const extra = actual.length - matched;
  if (missing === 0 && extra === 0) return [];

  let message: string;
  if (missing === 0) {
    message = `Actual contains all expected elements (${items.length}/${items.length}) but has ${extra} extra element(s)`;
  } else if (extra === 0) {
    message = `Matched (${matched}/${items.length}): missing ${missing} expected element(s)`;
  } else {
    message = `Matched (${matched}/${items.length}). Missing: ${missing}, Extra: ${extra}`;
  }
  const assertions = [makeAssertion(path, 'array_values_mismatch', describeTree(expected), actual, [message])];

  // A single leftover pair is most likely the same element with a wrong value.
  if (missing === 1 && extra === 1) {
    const i = items.findIndex((_item, index) => !ownerOfActual.includes(index));
    const j = ownerOfActual.indexOf(-1);
    assertions.push(...compareNode(items[i], actual[j], `${path}[${i}]`, ctx, ancestors));
  }
  return assertions;
}

function compareMap(
  expected: ValueMap,
  actual: Record<string, unknown>,
  path: string,
  ctx: CompareContext,
  ancestors: readonly object[]
): AssertionResult[] {
  const assertions: AssertionResult[] = [];
  const expectedKeys = Object.keys(expected.entries).filter((key) => !ctx.ignoredKeys.has(key));
  const actualKeys = Object.keys(actual).filter((key) => !ctx.ignoredKeys.has(key));

  const missing = expectedKeys.filter((key) => !Object.hasOwn(actual, key));
  if (missing.length > 0) {
    assertions.push(
      makeAssertion(path, 'missing_key', expectedKeys, actualKeys, [`Missing key(s): ${missing.join(', ')}`])
    );
  }
  if (ctx.strict) {
    const extra = actualKeys.filter((key) => !Object.hasOwn(expected.entries, key));
    if (extra.length > 0) {
      assertions.push(
        makeAssertion(path, 'extra_keys', expectedKeys, actualKeys, [`Unexpected key(s): ${extra.join(', ')}`])
      );
    }
  }

  for (const key of expectedKeys) {
    if (!Object.hasOwn(actual, key)) continue;
    assertions.push(...compareNode(expected.entries[key], actual[key], `${path}.${key}`, ctx, ancestors));
  }
  return assertions;
}

function compareNode(
  expected: ValueTree,
  actual: unknown,
  path: string,
  ctx: CompareContext,
  ancestors: readonly object[]
): AssertionResult[] {
  const actualIsNull = actual === null || actual === undefined;
  if (expected.kind === 'null') {
    if (actualIsNull) return [];
    return [makeAssertion(path, 'none_mismatch', null, actual, [`Expected null, got ${typeLabel(actual)}`])];
  }
  if (actualIsNull) {
    return [makeAssertion(path, 'none_mismatch', describeTree(expected), null, ['Expected a value, got null'])];
  }

  switch (expected.kind) {
    case 'leaf':
      return compareLeaf(expected, actual, path);
    case 'list': {
      if (!Array.isArray(actual)) {
        return [
          makeAssertion(path, 'invalid_format', describeTree(expected), actual, [
            `Expected an array, got ${typeLabel(actual)}`,
          ]),
        ];
      }
      const inner = enter(ancestors, actual, path);
      return expected.ordered
        ? compareOrdered(expected, actual, path, ctx, inner)
        : compareUnordered(expected, actual, path, ctx, inner);
    }
    case 'map': {
      if (!isRecord(actual)) {
        return [
          makeAssertion(path, 'invalid_format', describeTree(expected), actual, [
            `Expected an object, got ${typeLabel(actual)}`,
          ]),
        ];
      }
      return compareMap(expected, actual, path, ctx, enter(ancestors, actual, path));
    }
  }
}

/**
 * Compare actual data against an expected tree. The expected side decides how each actual
 * value is read. Neither input is modified.
 */
export function compare(expected: ValueTree, actual: unknown, options: CompareOptions = {}): ComparisonOutcome {
  const ctx: CompareContext = {
    strict: options.strict ?? false,
    ignoredKeys: new Set(options.ignoredKeys ?? []),
  };
  const assertions = compareNode(expected, actual, options.rootName ?? 'root', ctx, []);
  return { ok: assertions.length === 0, assertions };
}
