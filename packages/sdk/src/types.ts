// Logging
type LogFn = {
  (msg: string, meta?: object): void;
  (obj: object, msg?: string): void;
};

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

// Agent response
export type TaskType = 'RETRIEVE' | 'NAVIGATE' | 'MUTATE';

export type AgentStatus =
  | 'SUCCESS'
  | 'ACTION_NOT_ALLOWED_ERROR'
  | 'PERMISSION_DENIED_ERROR'
  | 'NOT_FOUND_ERROR'
  | 'DATA_VALIDATION_ERROR'
  | 'UNKNOWN_ERROR';

export function isErrorStatus(status: AgentStatus): boolean {
  return status !== 'SUCCESS';
}

// Evaluation results
export type EvalStatus = 'success' | 'failure' | 'error';

export type EvaluatorName = 'AgentResponseEvaluator' | 'NetworkEventEvaluator';

export type DiagnosticKind =
  | 'mismatch'
  | 'type_mismatch'
  | 'none_mismatch'
  | 'invalid_format'
  | 'missing_key'
  | 'extra_keys'
  | 'array_values_mismatch'
  | 'not_found';

export interface AssertionResult {
  assertionName: string;
  kind: DiagnosticKind;
  path: string;
  expected: unknown;
  actual: unknown;
  messages: string[];
}

export interface EvaluatorResult {
  evaluatorName: EvaluatorName;
  status: EvalStatus;
  score: number;
  errorMsg: string | null;
  assertions: AssertionResult[];
}

export interface TaskEvalResult {
  taskId: number;
  status: EvalStatus;
  score: number;
  evaluatorsResults: EvaluatorResult[];
}

export type ScoringMode = 'all' | 'average';

// Wire form of a task result, as printed by the grader
export interface SerializedAssertion {
  assertion_name: string;
  kind: DiagnosticKind;
  path: string;
  expected: unknown;
  actual: unknown;
  messages: string[];
}

export interface SerializedEvaluatorResult {
  evaluator_name: EvaluatorName;
  status: EvalStatus;
  score: number;
  error_msg: string | null;
  assertions: SerializedAssertion[];
}

export interface SerializedTaskEvalResult {
  task_id: number;
  status: EvalStatus;
  score: number;
  evaluators_results: SerializedEvaluatorResult[];
}

// Sites
export type SiteId = string;

/**
 * Placeholder a URL template uses for a site, e.g. `shopping_admin` -> `__SHOPPING_ADMIN__`.
 */
export function sitePlaceholder(site: SiteId): string {
  return `__${site.toUpperCase()}__`;
}

export function formatSiteList(sites: readonly SiteId[]): string {
  return `[${sites.join(', ')}]`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
