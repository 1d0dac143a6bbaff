import type {
  EvalStatus,
  EvaluatorResult,
  Logger,
  ScoringMode,
  SerializedTaskEvalResult,
  Task,
  TaskEvalResult,
} from '@webgrade/sdk';
import { evaluateAgentResponse } from './evaluators/agent-response.js';
import type { EvaluationContext } from './evaluators/base.js';
import { evaluateNetworkEvents } from './evaluators/network-event.js';
import type { NetworkTrace } from './network/trace.js';
import type { SiteUrls } from './sites.js';
import type { TaskReader } from './tasks.js';

export interface TaskEvalContext {
  sites?: SiteUrls;
  logger?: Logger;
  scoring?: ScoringMode;
}

export interface TaskEvaluatorOptions extends TaskEvalContext {
  tasks: TaskReader;
}

const STATUS_RANK: Record<EvalStatus, number> = { success: 0, failure: 1, error: 2 };

function combineStatus(results: readonly EvaluatorResult[]): EvalStatus {
  return results.reduce<EvalStatus>(
    (worst, result) => (STATUS_RANK[result.status] > STATUS_RANK[worst] ? result.status : worst),
    'success'
  );
}

function combineScore(results: readonly EvaluatorResult[], scoring: ScoringMode): number {
  if (scoring === 'average') {
    return results.reduce((sum, result) => sum + result.score, 0) / results.length;
  }
  return results.every((result) => result.status === 'success') ? 1 : 0;
}

/**
 * Run every eval config entry of a task and fold the outcomes into one result.
 */
export function evaluateTaskConfig(
  task: Task,
  agentResponseRaw: unknown,
  networkTrace: NetworkTrace | null,
  context: TaskEvalContext = {}
): TaskEvalResult {
  const { logger, scoring = 'all' } = context;

  if (task.eval.length === 0) {
    logger?.warn({ taskId: task.task_id }, 'Task has no eval config entries');
    return { taskId: task.task_id, status: 'error', score: 0, evaluatorsResults: [] };
  }

  const ctx: EvaluationContext = { task, sites: context.sites, logger };
  const evaluatorsResults = task.eval.map((entry) =>
    entry.evaluator === 'AgentResponseEvaluator'
      ? evaluateAgentResponse(entry, agentResponseRaw, ctx)
      : evaluateNetworkEvents(entry, networkTrace, ctx)
  );

  const status = combineStatus(evaluatorsResults);
  const result: TaskEvalResult = {
    taskId: task.task_id,
    status,
    score: combineScore(evaluatorsResults, scoring),
    evaluatorsResults,
  };
  logger?.info({ taskId: task.task_id, status, score: result.score }, 'Task evaluated');
  return result;
}

/**
 * Grades agent runs against a task dataset.
 */
export class TaskEvaluator {
  private _tasks: TaskReader;
  private _context: TaskEvalContext;

  constructor(options: TaskEvaluatorOptions) {
    this._tasks = options.tasks;
    this._context = { sites: options.sites, logger: options.logger, scoring: options.scoring };
  }

  /** Throws `TaskNotFoundError` for an unknown id; every other failure is reported in the result. */
  evaluateTask(taskId: number, agentResponseRaw: unknown, networkTrace: NetworkTrace | null): TaskEvalResult {
    const task = this._tasks.getTaskById(taskId);
    return evaluateTaskConfig(task, agentResponseRaw, networkTrace, this._context);
  }
}

export function serializeTaskEvalResult(result: TaskEvalResult): SerializedTaskEvalResult {
  return {
    task_id: result.taskId,
    status: result.status,
    score: result.score,
    evaluators_results: result.evaluatorsResults.map((evaluator) => ({
      evaluator_name: evaluator.evaluatorName,
      status: evaluator.status,
      score: evaluator.score,
      error_msg: evaluator.errorMsg,
      assertions: evaluator.assertions.map((assertion) => ({
        assertion_name: assertion.assertionName,
        kind: assertion.kind,
        path: assertion.path,
        expected: assertion.expected,
        actual: assertion.actual,
        messages: assertion.messages,
      })),
    })),
  };
}
