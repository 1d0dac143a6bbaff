import {
  agentResponseSchema,
  isErrorStatus,
  isRecord,
  type AgentResponse,
  type AgentResponseEvalConfig,
  type AssertionResult,
  type EvaluatorResult,
} from '@webgrade/sdk';
import { compare, makeAssertion } from '../comparator.js';
import { ConfigurationFault } from '../errors.js';
import { readAgentResponse } from '../response.js';
import { buildExpected, runEvaluator, urlRenderer, type EvaluationContext } from './base.js';

const NAME = 'AgentResponseEvaluator';

function isEmptyData(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}

function parseExpected(raw: unknown): AgentResponse {
  const parsed = agentResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationFault(`Invalid expected agent response: ${details}`, NAME);
  }
  return parsed.data;
}

/**
 * Compare the agent's final response against the expected task type, status and data.
 */
export function evaluateAgentResponse(
  config: AgentResponseEvalConfig,
  rawResponse: unknown,
  ctx: EvaluationContext
): EvaluatorResult {
  return runEvaluator(NAME, ctx, () => {
    const expected = parseExpected(config.expected);
    const isRetrieve = expected.task_type === 'RETRIEVE';
    let expectedData = expected.retrieved_data ?? null;
    if (isErrorStatus(expected.status) && isEmptyData(expectedData)) expectedData = null;
    if (isRetrieve && !isErrorStatus(expected.status) && expectedData === null) {
      throw new ConfigurationFault('Expected retrieved_data must be set in config for retrieve tasks', NAME);
    }

    const decoded = readAgentResponse(rawResponse);
    const parsed = agentResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      return [
        makeAssertion(
          'agent_response',
          'invalid_format',
          config.expected,
          decoded,
          parsed.error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`)
        ),
      ];
    }
    const actual = parsed.data;

    const assertions: AssertionResult[] = [];
    if (actual.task_type !== expected.task_type) {
      assertions.push(
        makeAssertion('task_type', 'mismatch', expected.task_type, actual.task_type, [
          `Expected task_type ${expected.task_type}, got ${actual.task_type}`,
        ])
      );
    }
    if (actual.status !== expected.status) {
      assertions.push(
        makeAssertion('status', 'mismatch', expected.status, actual.status, [
          `Expected status ${expected.status}, got ${actual.status}`,
        ])
      );
    }

    if (isRetrieve || expectedData !== null) {
      const tree = buildExpected(
        NAME,
        expectedData,
        { schema: config.results_schema, ordered: config.ordered, renderUrl: urlRenderer(ctx) },
        'retrieved_data'
      );
      const actualData = expectedData === null && isEmptyData(actual.retrieved_data) ? null : actual.retrieved_data;
      assertions.push(...compare(tree, actualData, { rootName: 'retrieved_data' }).assertions);
    }
    return assertions;
  });
}
