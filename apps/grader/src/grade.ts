import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Logger, SerializedTaskEvalResult } from '@webgrade/sdk';
import {
  NetworkTrace,
  SiteUrls,
  TaskEvaluator,
  TaskReader,
  parseJsonText,
  serializeTaskEvalResult,
} from '@webgrade/eval';

export const gradeOptionsSchema = z.object({
  datasetPath: z.string().min(1, 'GRADER_DATASET_PATH is required'),
  sitesPath: z.string().default(''),
  taskId: z.number().int('GRADER_TASK_ID must be an integer').nonnegative(),
  responsePath: z.string().default(''),
  tracePath: z.string().default(''),
  scoring: z.enum(['all', 'average']).default('all'),
});

export type GradeOptions = z.input<typeof gradeOptionsSchema>;

/**
 * Grade one agent run. Empty response or trace paths grade against a missing response or trace.
 */
export function gradeTask(input: GradeOptions, logger: Logger): SerializedTaskEvalResult {
  const options = gradeOptionsSchema.parse(input);

  const tasks = TaskReader.fromFile(options.datasetPath);
  const sites = options.sitesPath
    ? SiteUrls.fromJson(parseJsonText(readFileSync(options.sitesPath, 'utf-8'), options.sitesPath))
    : undefined;
  const response = options.responsePath ? readFileSync(options.responsePath, 'utf-8') : null;
  const trace = options.tracePath ? NetworkTrace.fromCapture(options.tracePath) : null;

  logger.info(
    { taskId: options.taskId, tasks: tasks.tasks.length, events: trace?.events.length ?? 0 },
    'Grading task'
  );

  const evaluator = new TaskEvaluator({ tasks, sites, logger, scoring: options.scoring });
  return serializeTaskEvalResult(evaluator.evaluateTask(options.taskId, response, trace));
}
