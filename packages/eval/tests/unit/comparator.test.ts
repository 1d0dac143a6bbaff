import { describe, it, expect } from 'vitest';
import type { ResultsSchema } from '@webgrade/sdk';
import { compare } from '../../src/comparator.js';
import { CurrencyValue, StringValue } from '../../src/data-types/index.js';
import { CircularReferenceError, ConfigurationFault } from '../../src/errors.js';
import { buildExpectedTree, describeTree, leaf, list, nullValue } from '../../src/value-tree.js';

describe('value tree [unit]', () => {
  it('should infer kinds from JSON types without a schema', () => {
    const tree = buildExpectedTree({ name: 'Mug', price: 5, tags: ['a', 'b'], note: null });
    expect(tree.kind).toBe('map');
    expect(describeTree(tree)).toEqual({ name: 'mug', price: 5, tags: ['a', 'b'], note: null });
  });

  it('should read a raw array under a scalar schema as alternatives', () => {
    const tree = buildExpectedTree(['$5', '5.50'], { schema: { type: 'string', format: 'currency' } });
    expect(tree.kind).toBe('leaf');
    if (tree.kind !== 'leaf') return;
    expect(tree.value).toBeInstanceOf(CurrencyValue);
    expect(tree.value.alternatives).toEqual([5, 5.5]);
  });

  it('should let the schema ordering win over the builder option', () => {
    const schema: ResultsSchema = { type: 'array', items: { type: 'number' }, ordered: true };
    const tree = buildExpectedTree([1, 2], { schema, ordered: false });
    expect(tree.kind === 'list' && tree.ordered).toBe(true);
  });

  it('should reject values that contradict the schema', () => {
    expect(() => buildExpectedTree('x', { schema: { type: 'array' } }, 'retrieved_data')).toThrow(
      new ConfigurationFault("Expected value at 'retrieved_data' must be an array per results schema")
    );
    expect(() => buildExpectedTree(1, { schema: { type: 'null' } })).toThrow('must be null per results schema');
  });

  it('should build the null node for null input', () => {
    expect(buildExpectedTree(null, { schema: { type: 'string' } })).toBe(nullValue);
  });
});

describe('compare [unit]', () => {
  it('should pass equal structures', () => {
    const outcome = compare(buildExpectedTree({ a: 'Blue', b: [1, 2] }), { a: 'blue', b: [2, 1] });
    expect(outcome).toEqual({ ok: true, assertions: [] });
  });

  it('should address nested mismatches by path', () => {
    const expected = buildExpectedTree({ a: [1, 2, { b: 'x' }] }, { ordered: true });
    const outcome = compare(expected, { a: [1, 2, { b: 'y' }] });
    expect(outcome.ok).toBe(false);
    expect(outcome.assertions).toEqual([
      {
        assertionName: 'root.a[2].b_mismatch',
        kind: 'mismatch',
        path: 'root.a[2].b',
        expected: 'x',
        actual: 'y',
        messages: ['Expected "x", got "y"'],
      },
    ]);
  });

  it('should use the given root name', () => {
    const outcome = compare(buildExpectedTree(5), 6, { rootName: 'retrieved_data' });
    expect(outcome.assertions[0].assertionName).toBe('retrieved_data_mismatch');
  });

  it('should report null on one side', () => {
    expect(compare(nullValue, 5).assertions[0]).toMatchObject({
      assertionName: 'root_none_mismatch',
      kind: 'none_mismatch',
      messages: ['Expected null, got number'],
    });
    expect(compare(buildExpectedTree('x'), null).assertions[0]).toMatchObject({
      kind: 'none_mismatch',
      expected: 'x',
      actual: null,
    });
  });

  it('should report unparsable actual leaves as type mismatches', () => {
    expect(compare(buildExpectedTree(5), 'abc').assertions).toEqual([
      {
        assertionName: 'root_type_mismatch',
        kind: 'type_mismatch',
        path: 'root',
        expected: 5,
        actual: 'abc',
        messages: ["Cannot parse 'abc' as a number"],
      },
    ]);
  });

  it('should report a container where a leaf is expected', () => {
    expect(compare(leaf(new StringValue('a')), ['a']).assertions[0]).toMatchObject({
      kind: 'mismatch',
      messages: ['Expected a single string value, got array'],
    });
  });

  it('should report shape mismatches as invalid format', () => {
    expect(compare(list([]), 'x').assertions[0]).toMatchObject({
      assertionName: 'root_invalid_format',
      messages: ['Expected an array, got string'],
    });
    expect(compare(buildExpectedTree({ a: 1 }), [1]).assertions[0]).toMatchObject({
      kind: 'invalid_format',
      messages: ['Expected an object, got array'],
    });
  });

  describe('maps', () => {
    it('should compare a key named __proto__ like any other', () => {
      const expected = buildExpectedTree(JSON.parse('{"__proto__":"x","a":1}'));
      expect(expected.kind === 'map' ? Object.keys(expected.entries) : []).toEqual(['__proto__', 'a']);

      const outcome = compare(expected, JSON.parse('{"__proto__":"y","a":1}'));
      expect(outcome.ok).toBe(false);
      expect(outcome.assertions).toEqual([
        {
          assertionName: 'root.__proto___mismatch',
          kind: 'mismatch',
          path: 'root.__proto__',
          expected: 'x',
          actual: 'y',
          messages: ['Expected "x", got "y"'],
        },
      ]);
      expect(compare(expected, JSON.parse('{"__proto__":"x","a":1}')).ok).toBe(true);
    });

    it('should report missing keys', () => {
      expect(compare(buildExpectedTree({ a: 1, b: 2 }), { a: 1 }).assertions).toEqual([
        {
          assertionName: 'root_keys_mismatch',
          kind: 'missing_key',
          path: 'root',
          expected: ['a', 'b'],
          actual: ['a'],
          messages: ['Missing key(s): b'],
        },
      ]);
    });

    it('should ignore extra keys unless strict', () => {
      const expected = buildExpectedTree({ a: 1 });
      expect(compare(expected, { a: 1, z: 2 }).ok).toBe(true);
      expect(compare(expected, { a: 1, z: 2 }, { strict: true }).assertions[0]).toMatchObject({
        assertionName: 'root_keys_mismatch',
        kind: 'extra_keys',
        messages: ['Unexpected key(s): z'],
      });
    });

    it('should skip ignored keys on both sides', () => {
      const outcome = compare(buildExpectedTree({ a: 1, id: 5 }), { a: 1, id: 9, extra: true }, {
        strict: true,
        ignoredKeys: ['id', 'extra'],
      });
      expect(outcome.ok).toBe(true);
    });
  });

  describe('ordered lists', () => {
    it('should report length differences', () => {
      const outcome = compare(buildExpectedTree([1, 2], { ordered: true }), [1]);
      expect(outcome.assertions[0]).toMatchObject({
        assertionName: 'root_array_values_mismatch',
        messages: ['Expected 2 element(s) in order, got 1'],
      });
    });

    it('should compare element-wise', () => {
      const outcome = compare(buildExpectedTree([1, 2], { ordered: true }), [2, 1]);
      expect(outcome.assertions.map((a) => a.path)).toEqual(['root[0]', 'root[1]']);
    });
  });

  describe('unordered lists', () => {
    it('should report extra elements', () => {
      const outcome = compare(buildExpectedTree([1, 2, 3]), [3, 2, 1, 4, 5]);
      expect(outcome.assertions).toHaveLength(1);
      expect(outcome.assertions[0].messages).toEqual([
        'Actual contains all expected elements (3/3) but has 2 extra element(s)',
      ]);
    });

    it('should report missing elements', () => {
      const outcome = compare(buildExpectedTree([1, 2, 3, 4, 5]), [1, 2, 3]);
      expect(outcome.assertions[0].messages).toEqual(['Matched (3/5): missing 2 expected element(s)']);
    });

    it('should report missing and extra elements together', () => {
      const outcome = compare(buildExpectedTree([1, 2, 3]), [1, 8, 9]);
      expect(outcome.assertions[0].messages).toEqual(['Matched (1/3). Missing: 2, Extra: 2']);
    });

    it('should find a full matching when a greedy pairing would fail', () => {
      expect(compare(buildExpectedTree(['^a.*$', 'apple']), ['apple', 'avocado']).ok).toBe(true);
    });

    it('should explain a single leftover pair', () => {
      const expected = buildExpectedTree([
        { id: 1, name: 'a' },
        { id: 2, name: 'b' },
      ]);
      const outcome = compare(expected, [
        { id: 1, name: 'a' },
        { id: 2, name: 'c' },
      ]);
      expect(outcome.assertions.map((a) => [a.path, a.messages[0]])).toEqual([
        ['root', 'Matched (1/2). Missing: 1, Extra: 1'],
        ['root[1].name', 'Expected "b", got "c"'],
      ]);
    });
  });

  it('should detect cycles in actual data', () => {
    const actual: Record<string, unknown> = {};
    actual.self = actual;
    const expected = buildExpectedTree({ self: { self: 1 } });
    expect(() => compare(expected, actual)).toThrow(CircularReferenceError);
    expect(() => compare(expected, actual)).toThrow("Circular reference detected at path 'root.self'");
  });

  it('should not modify its inputs', () => {
    const actual = { items: [{ name: 'B' }, { name: 'A' }] };
    const snapshot = JSON.parse(JSON.stringify(actual));
    compare(buildExpectedTree({ items: [{ name: 'a' }, { name: 'b' }] }), actual);
    expect(actual).toEqual(snapshot);
  });
});
