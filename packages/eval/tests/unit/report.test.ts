import { describe, it, expect } from 'vitest';
import type { TaskEvalResult } from '@webgrade/sdk';
import { formatReport, generateReport } from '../../src/report.js';

const results: TaskEvalResult[] = [
  { taskId: 1, status: 'success', score: 1, evaluatorsResults: [] },
  {
    taskId: 2,
    status: 'failure',
    score: 0,
    evaluatorsResults: [
      {
        evaluatorName: 'AgentResponseEvaluator',
        status: 'failure',
        score: 0,
        errorMsg: null,
        assertions: [
          {
            assertionName: 'status_mismatch',
            kind: 'mismatch',
            path: 'status',
            expected: 'SUCCESS',
            actual: 'UNKNOWN_ERROR',
            messages: ['Expected status SUCCESS, got UNKNOWN_ERROR'],
          },
        ],
      },
    ],
  },
  {
    taskId: 3,
    status: 'error',
    score: 0,
    evaluatorsResults: [
      {
        evaluatorName: 'NetworkEventEvaluator',
        status: 'error',
        score: 0,
        errorMsg: 'Network trace is required',
        assertions: [],
      },
    ],
  },
];

describe('report [unit]', () => {
  it('should count outcomes and average scores', () => {
    const report = generateReport(results, '2026-01-01T00:00:00.000Z');
    expect(report).toMatchObject({
      timestamp: '2026-01-01T00:00:00.000Z',
      totalTasks: 3,
      succeeded: 1,
      failed: 1,
      errored: 1,
    });
    expect(report.averageScore).toBeCloseTo(1 / 3);
  });

  it('should report a zero average for no results', () => {
    expect(generateReport([], 'now').averageScore).toBe(0);
  });

  it('should format pass, fail and error lines', () => {
    const text = formatReport(generateReport(results, '2026-01-01T00:00:00.000Z'));
    expect(text.split('\n')).toEqual([
      'Evaluation Report - 2026-01-01T00:00:00.000Z',
      'Total: 3 | Passed: 1 | Failed: 1 | Errors: 1 | Average score: 0.33',
      '',
      '[PASS] task 1 (score 1)',
      '[FAIL] task 2 (score 0)',
      '  - AgentResponseEvaluator: status_mismatch',
      '      Expected status SUCCESS, got UNKNOWN_ERROR',
      '[ERROR] task 3 (score 0)',
      '  - NetworkEventEvaluator: Network trace is required',
    ]);
  });
});
