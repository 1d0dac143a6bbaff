import type { NormalizedValue, ValueKind, ValueOptions } from './base.js';
import { Base64Value } from './base64-string.js';
import { BooleanValue } from './boolean.js';
import { CurrencyValue } from './currency.js';
import { DateValue } from './date.js';
import { DistanceValue } from './distance.js';
import { DurationValue } from './duration.js';
import { JsonStringValue } from './json-string.js';
import { MarkdownValue } from './markdown-string.js';
import { NumberValue } from './number.js';
import { StringValue } from './string.js';
import { UrlValue } from './url.js';

type ValueClass = new (raw: unknown, options?: ValueOptions) => NormalizedValue<unknown>;

const VALUE_CLASSES = {
  string: StringValue,
  number: NumberValue,
  boolean: BooleanValue,
  date: DateValue,
  currency: CurrencyValue,
  distance: DistanceValue,
  duration: DurationValue,
  url: UrlValue,
  base64: Base64Value,
  json: JsonStringValue,
  markdown: MarkdownValue,
} satisfies Record<ValueKind, ValueClass>;

export function isValueKind(name: string): name is ValueKind {
  return Object.hasOwn(VALUE_CLASSES, name);
}

/**
 * Build a value of the given kind. Throws `ValidationError` for unparsable input or an
 * alternatives array with fewer than two items.
 */
export function createValue(kind: ValueKind, raw: unknown, options?: ValueOptions): NormalizedValue<unknown> {
  const ValueClass: ValueClass = VALUE_CLASSES[kind];
  return new ValueClass(raw, options);
}

export { NormalizedValue, describeRaw, type ValueKind, type ValueOptions } from './base.js';
export { StringValue, normalizeText } from './string.js';
export { NumberValue, parseNumber } from './number.js';
export { BooleanValue } from './boolean.js';
export { DateValue, parseDate } from './date.js';
export { CurrencyValue, parseCurrency } from './currency.js';
export { DistanceValue, parseDistance } from './distance.js';
export { DurationValue, parseDuration } from './duration.js';
export { UrlValue } from './url.js';
export { Base64Value } from './base64-string.js';
export { JsonStringValue, canonicalJson } from './json-string.js';
export { MarkdownValue, normalizeMarkdown } from './markdown-string.js';
