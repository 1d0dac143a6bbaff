import { isRecord, type ResultsSchema } from '@webgrade/sdk';
import { ConfigurationFault } from './errors.js';
import { createValue, isValueKind, type NormalizedValue, type ValueKind, type ValueOptions } from './data-types/index.js';

export type ValueTree = ValueLeaf | ValueList | ValueMap | ValueNull;

export interface ValueLeaf {
  kind: 'leaf';
  value: NormalizedValue<unknown>;
}

export interface ValueList {
  kind: 'list';
  ordered: boolean;
  items: readonly ValueTree[];
}

export interface ValueMap {
  kind: 'map';
  entries: Readonly<Record<string, ValueTree>>;
}

export interface ValueNull {
  kind: 'null';
}

export const nullValue: ValueNull = Object.freeze({ kind: 'null' });

export function leaf(value: NormalizedValue<unknown>): ValueLeaf {
  return { kind: 'leaf', value };
}

export function list(items: readonly ValueTree[], ordered = false): ValueList {
  return { kind: 'list', ordered, items };
}

export function map(entries: Record<string, ValueTree>): ValueMap {
  return { kind: 'map', entries };
}

export interface BuildTreeOptions extends ValueOptions {
  schema?: ResultsSchema;
  /** Ordering for lists whose schema does not set one. */
  ordered?: boolean;
}

function kindFromSchema(schema: ResultsSchema): ValueKind {
  if (schema.format !== undefined && isValueKind(schema.format)) return schema.format;
  if (schema.type === 'integer' || schema.type === 'number') return 'number';
  if (schema.type === 'boolean') return 'boolean';
  return 'string';
}

function kindFromJson(raw: unknown): ValueKind | null {
  if (typeof raw === 'string') return 'string';
  if (typeof raw === 'number') return 'number';
  if (typeof raw === 'boolean') return 'boolean';
  return null;
}

function buildFromSchema(raw: unknown, schema: ResultsSchema, options: BuildTreeOptions, path: string): ValueTree {
  if (raw === null || raw === undefined) return nullValue;
  switch (schema.type) {
    case 'null':
      throw new ConfigurationFault(`Expected value at '${path}' must be null per results schema`);
    case 'array': {
      if (!Array.isArray(raw)) {
        throw new ConfigurationFault(`Expected value at '${path}' must be an array per results schema`);
      }
      const itemSchema = schema.items;
      const items = raw.map((item, index) =>
        itemSchema ? buildFromSchema(item, itemSchema, options, `${path}[${index}]`) : buildInferred(item, options, `${path}[${index}]`)
      );
      return list(items, schema.ordered ?? options.ordered ?? false);
    }
    case 'object': {
      if (!isRecord(raw)) {
        throw new ConfigurationFault(`Expected value at '${path}' must be an object per results schema`);
      }
      return map(
        Object.fromEntries(
          Object.entries(raw).map(([key, value]): [string, ValueTree] => {
            const properties = schema.properties;
            const propertySchema = properties && Object.hasOwn(properties, key) ? properties[key] : undefined;
            const child = propertySchema
              ? buildFromSchema(value, propertySchema, options, `${path}.${key}`)
              : buildInferred(value, options, `${path}.${key}`);
            return [key, child];
          })
        )
      );
    }
    default:
      // A raw array under a scalar schema lists acceptable alternatives.
      return leaf(createValue(kindFromSchema(schema), raw, options));
  }
}

function buildInferred(raw: unknown, options: BuildTreeOptions, path: string): ValueTree {
  if (raw === null || raw === undefined) return nullValue;
  if (Array.isArray(raw)) {
    return list(
      raw.map((item, index) => buildInferred(item, options, `${path}[${index}]`)),
      options.ordered ?? false
    );
  }
  if (isRecord(raw)) {
    // fromEntries defines own keys, so `__proto__` stays an ordinary entry.
    return map(
      Object.fromEntries(
        Object.entries(raw).map(([key, value]): [string, ValueTree] => [key, buildInferred(value, options, `${path}.${key}`)])
      )
    );
  }
  const kind = kindFromJson(raw);
  if (kind === null) {
    throw new ConfigurationFault(`Unsupported expected value at '${path}': ${typeof raw}`);
  }
  return leaf(createValue(kind, raw, options));
}

/**
 * Build an expected value tree from task configuration. The results schema, when given, picks
 * leaf kinds and list ordering; otherwise JSON types decide.
 */
export function buildExpectedTree(raw: unknown, options: BuildTreeOptions = {}, rootName = 'root'): ValueTree {
  return options.schema ? buildFromSchema(raw, options.schema, options, rootName) : buildInferred(raw, options, rootName);
}

/** Plain JSON view of an expected tree, used in diagnostics. */
export function describeTree(tree: ValueTree): unknown {
  switch (tree.kind) {
    case 'null':
      return null;
    case 'leaf':
      return tree.value.toJSON();
    case 'list':
      return tree.items.map(describeTree);
    case 'map':
      return Object.fromEntries(Object.entries(tree.entries).map(([key, value]) => [key, describeTree(value)]));
  }
}
