import {
  isRecord,
  networkExpectationSchema,
  type AssertionResult,
  type EvaluatorResult,
  type NetworkEventEvalConfig,
  type NetworkExpectation,
} from '@webgrade/sdk';
import { compare, makeAssertion } from '../comparator.js';
import { UrlValue, createValue } from '../data-types/index.js';
import { ConfigurationFault, ParseFault, SiteConfigError, ValidationError } from '../errors.js';
import { deserializeNestedJson, isJsonPathKey, jsonPathMatches } from '../jsonpath.js';
import type { NetworkEvent } from '../network/event.js';
import type { NetworkTrace } from '../network/trace.js';
import { compileFullMatch, isPattern } from '../patterns.js';
import { normalizeQuery } from '../url-utils.js';
import { leaf, map, type ValueTree } from '../value-tree.js';
import { buildExpected, runEvaluator, urlRenderer, type EvaluationContext } from './base.js';

const NAME = 'NetworkEventEvaluator';

type EventCheck = (event: NetworkEvent) => AssertionResult[];

function parseExpectation(raw: unknown): NetworkExpectation {
  const parsed = networkExpectationSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'expected'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationFault(`Invalid network event expectation: ${details}`, NAME);
  }
  return parsed.data;
}

function expectedUrl(expectation: NetworkExpectation, ctx: EvaluationContext): UrlValue {
  const renderUrl = urlRenderer(ctx);
  const templates = Array.isArray(expectation.url) ? expectation.url : [expectation.url];
  if (!renderUrl && templates.some((template) => /__[A-Z][A-Z0-9_]*__/.test(template))) {
    throw new ConfigurationFault('URL template has a site placeholder but no site config was provided', NAME);
  }
  const raw = templates.map((template) => ({ base_url: template, query_params: expectation.query_params }));
  try {
    return new UrlValue(raw.length === 1 ? raw[0] : raw, { renderUrl });
  } catch (err) {
    if (err instanceof ValidationError || err instanceof SiteConfigError) {
      throw new ConfigurationFault(`Invalid expected URL: ${err.message}`, NAME);
    }
    throw err;
  }
}

function expectedHeaders(headers: Record<string, string | string[]>): ValueTree {
  return map(
    Object.fromEntries(
      Object.entries(headers).map(([name, value]) => [name.toLowerCase(), leaf(createValue('string', value))])
    )
  );
}

/**
 * Decode a request body: JSON (with nested JSON strings decoded), else a form-encoded body
 * where single values are unwrapped. Returns null when the body is absent or neither.
 */
export function parseRequestBody(postData: string | null): { body: unknown } | null {
  if (postData === null || postData.trim() === '') return null;
  try {
    return { body: deserializeNestedJson(JSON.parse(postData)) };
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
  }
  if (!postData.includes('=')) return null;
  const form = Object.entries(normalizeQuery(postData)).map(([key, values]) => [
    key,
    values.length === 1 ? values[0] : values,
  ]);
  return { body: Object.fromEntries(form) };
}

type BodyLookup = { found: true; value: unknown } | { found: false };

const NOT_FOUND: BodyLookup = { found: false };

function found(values: readonly unknown[]): BodyLookup {
  if (values.length === 0) return NOT_FOUND;
  return { found: true, value: values.length === 1 ? values[0] : values };
}

function lookupBodyValue(body: unknown, key: string): BodyLookup {
  if (!isJsonPathKey(key)) {
    return isRecord(body) && Object.hasOwn(body, key) ? { found: true, value: body[key] } : NOT_FOUND;
  }
  if (!isPattern(key)) return found(jsonPathMatches(body, key) ?? []);
  if (!isRecord(body)) return NOT_FOUND;
  const pattern = compileFullMatch(key);
  return found(
    Object.keys(body)
      .filter((name) => (pattern ? pattern.test(name) : name === key))
      .map((name) => body[name])
  );
}

function postDataCheck(postData: Record<string, unknown>, ordered: boolean | undefined): EventCheck {
  const expectations = Object.entries(postData).map(([key, raw]) => ({
    key,
    tree: buildExpected(NAME, raw, { ordered }, `post_data.${key}`),
  }));
  return (event) => {
    const decoded = parseRequestBody(event.postData);
    if (decoded === null) {
      return [
        makeAssertion('post_data', 'none_mismatch', postData, event.postData, [
          'Expected a request body, got none that could be decoded',
        ]),
      ];
    }
    return expectations.flatMap(({ key, tree }) => {
      const lookup = lookupBodyValue(decoded.body, key);
      if (!lookup.found) {
        const present = isRecord(decoded.body) ? Object.keys(decoded.body) : [];
        return [makeAssertion(`post_data.${key}`, 'missing_key', key, present, [`Missing body field: ${key}`])];
      }
      return compare(tree, lookup.value, { rootName: `post_data.${key}` }).assertions;
    });
  };
}

function buildChecks(
  expectation: NetworkExpectation,
  ordered: boolean | undefined,
  ctx: EvaluationContext
): EventCheck[] {
  const url = expectedUrl(expectation, ctx);
  const checks: EventCheck[] = [(event) => compare(leaf(url), event.url, { rootName: 'url' }).assertions];

  const method = expectation.method?.toUpperCase();
  if (method) {
    checks.push((event) =>
      event.method === method
        ? []
        : [makeAssertion('method', 'mismatch', method, event.method, [`Expected method ${method}, got ${event.method}`])]
    );
  }

  const status = expectation.response_status;
  checks.push((event) =>
    event.responseStatus === status
      ? []
      : [
          makeAssertion('response_status', 'mismatch', status, event.responseStatus, [
            `Expected response status ${status}, got ${event.responseStatus}`,
          ]),
        ]
  );

  if (expectation.headers) {
    const headers = expectedHeaders(expectation.headers);
    checks.push((event) => compare(headers, event.requestHeaders, { rootName: 'headers' }).assertions);
  }

  if (expectation.post_data) checks.push(postDataCheck(expectation.post_data, ordered));
  return checks;
}

/**
 * Succeed when at least one evaluation event in the trace satisfies every expected constraint.
 * On failure the diagnostics of the closest event are reported.
 */
export function evaluateNetworkEvents(
  config: NetworkEventEvalConfig,
  trace: NetworkTrace | null,
  ctx: EvaluationContext
): EvaluatorResult {
  return runEvaluator(NAME, ctx, () => {
    const expectation = parseExpectation(config.expected);
    const checks = buildChecks(expectation, config.ordered, ctx);
    if (!trace) throw new ParseFault('Network trace is required', 'network_trace');

    let closest: { event: NetworkEvent; failures: AssertionResult[] } | null = null;
    for (const event of trace.evaluationEvents) {
      const failures = checks.flatMap((check) => check(event));
      if (failures.length === 0) return [];
      if (closest === null || failures.length < closest.failures.length) closest = { event, failures };
    }

    const examined = trace.evaluationEvents.length;
    return [
      makeAssertion('network_event', 'not_found', config.expected, closest?.event.url ?? null, [
        `No evaluation event matched the expectation (${examined} examined)`,
      ]),
      ...(closest?.failures ?? []),
    ];
  });
}
