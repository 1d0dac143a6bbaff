import type { TaskEvalResult } from '@webgrade/sdk';

export interface EvalReport {
  timestamp: string;
  totalTasks: number;
  succeeded: number;
  failed: number;
  errored: number;
  averageScore: number;
  results: TaskEvalResult[];
}

const STATUS_LABELS = { success: 'PASS', failure: 'FAIL', error: 'ERROR' } as const;

/**
 * Summarize task results.
 */
export function generateReport(results: TaskEvalResult[], timestamp = new Date().toISOString()): EvalReport {
  const totalScore = results.reduce((sum, result) => sum + result.score, 0);
  return {
    timestamp,
    totalTasks: results.length,
    succeeded: results.filter((r) => r.status === 'success').length,
    failed: results.filter((r) => r.status === 'failure').length,
    errored: results.filter((r) => r.status === 'error').length,
    averageScore: results.length ? totalScore / results.length : 0,
    results,
  };
}

/**
 * Format a report as a human-readable string.
 */
export function formatReport(report: EvalReport): string {
  const lines: string[] = [
    `Evaluation Report - ${report.timestamp}`,
    `Total: ${report.totalTasks} | Passed: ${report.succeeded} | Failed: ${report.failed} | Errors: ${report.errored} | Average score: ${report.averageScore.toFixed(2)}`,
    '',
  ];

  for (const result of report.results) {
    lines.push(`[${STATUS_LABELS[result.status]}] task ${result.taskId} (score ${result.score})`);
    if (result.status === 'success') continue;
    for (const evaluator of result.evaluatorsResults) {
      if (evaluator.status === 'success') continue;
      if (evaluator.errorMsg) lines.push(`  - ${evaluator.evaluatorName}: ${evaluator.errorMsg}`);
      for (const assertion of evaluator.assertions) {
        lines.push(`  - ${evaluator.evaluatorName}: ${assertion.assertionName}`);
        for (const message of assertion.messages) {
          lines.push(`      ${message}`);
        }
      }
    }
  }

  return lines.join('\n');
}
