import type { AssertionResult, EvaluatorName, EvaluatorResult, Logger, SiteId, Task } from '@webgrade/sdk';
import { CircularReferenceError, ConfigurationFault, ParseFault, SiteConfigError, ValidationError, errorMessage } from '../errors.js';
import type { SiteUrls } from '../sites.js';
import { buildExpectedTree, type BuildTreeOptions, type ValueTree } from '../value-tree.js';

export interface EvaluationContext {
  task: Task;
  sites?: SiteUrls;
  logger?: Logger;
}

export function evaluatorResult(evaluatorName: EvaluatorName, assertions: AssertionResult[]): EvaluatorResult {
  const passed = assertions.length === 0;
  return {
    evaluatorName,
    status: passed ? 'success' : 'failure',
    score: passed ? 1 : 0,
    errorMsg: null,
    assertions,
  };
}

export function errorResult(evaluatorName: EvaluatorName, message: string): EvaluatorResult {
  return { evaluatorName, status: 'error', score: 0, errorMsg: message, assertions: [] };
}

/**
 * Run one evaluator body. Configuration and structural parse faults become an ERROR result;
 * nothing thrown here reaches the other evaluators of the task.
 */
export function runEvaluator(
  evaluatorName: EvaluatorName,
  ctx: EvaluationContext,
  body: () => AssertionResult[]
): EvaluatorResult {
  const logMeta = { taskId: ctx.task.task_id, evaluator: evaluatorName };
  try {
    const result = evaluatorResult(evaluatorName, body());
    ctx.logger?.debug({ ...logMeta, status: result.status, assertions: result.assertions.length }, 'Evaluator finished');
    return result;
  } catch (err) {
    if (err instanceof ConfigurationFault) {
      ctx.logger?.warn({ ...logMeta, err: err.message }, 'Eval config fault');
      return errorResult(evaluatorName, err.message);
    }
    if (err instanceof ParseFault || err instanceof CircularReferenceError) {
      ctx.logger?.warn({ ...logMeta, err: err.message }, 'Unparsable evaluator input');
      return errorResult(evaluatorName, err.message);
    }
    ctx.logger?.error({ ...logMeta, err: errorMessage(err) }, 'Evaluator crashed');
    return errorResult(evaluatorName, `Unexpected error: ${errorMessage(err)}`);
  }
}

/** Site-relative URL renderer for the task, or undefined when no site config is loaded. */
export function urlRenderer(ctx: EvaluationContext): ((template: string) => string) | undefined {
  const sites = ctx.sites;
  if (!sites) return undefined;
  const taskSites: SiteId[] = ctx.task.sites;
  return (template) => sites.renderUrl(template, taskSites);
}

/**
 * Build an expected tree from eval config, reporting bad expectations as configuration faults.
 */
export function buildExpected(
  evaluatorName: EvaluatorName,
  raw: unknown,
  options: BuildTreeOptions,
  rootName: string
): ValueTree {
  try {
    return buildExpectedTree(raw, options, rootName);
  } catch (err) {
    if (err instanceof ValidationError || err instanceof SiteConfigError) {
      throw new ConfigurationFault(`Invalid expected value: ${err.message}`, evaluatorName);
    }
    if (err instanceof ConfigurationFault) {
      throw new ConfigurationFault(err.message, evaluatorName);
    }
    throw err;
  }
}
