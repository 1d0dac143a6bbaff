import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from '@webgrade/sdk';
import { TaskNotFoundError } from '@webgrade/eval';
import { gradeTask } from '../src/grade.js';

function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const dataset = [
  {
    task_id: 4,
    sites: ['shopping'],
    intent: 'Add the blue mug to the cart and report its price',
    eval: [
      {
        evaluator: 'AgentResponseEvaluator',
        results_schema: { type: 'array', items: { type: 'string', format: 'currency' } },
        expected: { task_type: 'RETRIEVE', status: 'SUCCESS', retrieved_data: ['$12.50'] },
      },
      {
        evaluator: 'NetworkEventEvaluator',
        expected: { url: '__SHOPPING__/checkout/cart/add', method: 'POST', post_data: { sku: 'MUG-1' } },
      },
    ],
  },
];

const har = {
  log: {
    version: '1.2',
    entries: [
      {
        request: { url: 'http://localhost:7770/static/site.css', method: 'GET', headers: [] },
        response: { status: 200, headers: [] },
      },
      {
        request: {
          url: 'http://localhost:7770/checkout/cart/add/',
          method: 'POST',
          headers: [{ name: 'Content-Type', value: 'application/x-www-form-urlencoded' }],
          postData: { mimeType: 'application/x-www-form-urlencoded', text: 'sku=MUG-1&qty=1' },
        },
        response: { status: 200, headers: [] },
      },
    ],
  },
};

describe('gradeTask', () => {
  let dir: string;
  let logger: Logger;

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'webgrade-grader-'));
    logger = createMockLogger();
  });

  function inputs(response: string) {
    return {
      datasetPath: write('tasks.json', JSON.stringify(dataset)),
      sitesPath: write('sites.json', JSON.stringify({ environments: { shopping: { urls: ['http://localhost:7770'] } } })),
      taskId: 4,
      responsePath: write('response.txt', response),
      tracePath: write('trace.har', JSON.stringify(har)),
    };
  }

  it('should grade a successful run', () => {
    const response = 'Done.\n```json\n{"task_type": "retrieve", "status": "SUCCESS", "retrieved_data": ["12.50 USD"]}\n```';
    const result = gradeTask(inputs(response), logger);
    expect(result.task_id).toBe(4);
    expect(result.status).toBe('success');
    expect(result.score).toBe(1);
    expect(result.evaluators_results.map((r) => r.status)).toEqual(['success', 'success']);
    expect(logger.info).toHaveBeenCalled();
  });

  it('should report a wrong answer as a failure', () => {
    const response = '{"task_type": "RETRIEVE", "status": "SUCCESS", "retrieved_data": ["$13"]}';
    const result = gradeTask(inputs(response), logger);
    expect(result.status).toBe('failure');
    expect(result.evaluators_results[0].assertions.map((a) => a.assertion_name)).toEqual([
      'retrieved_data_array_values_mismatch',
      'retrieved_data[0]_mismatch',
    ]);
  });

  it('should average scores when asked', () => {
    const response = '{"task_type": "RETRIEVE", "status": "SUCCESS", "retrieved_data": ["$13"]}';
    expect(gradeTask({ ...inputs(response), scoring: 'average' }, logger).score).toBe(0.5);
  });

  it('should grade without a trace as an evaluator error', () => {
    const response = '{"task_type": "RETRIEVE", "status": "SUCCESS", "retrieved_data": ["$12.50"]}';
    const result = gradeTask({ ...inputs(response), tracePath: '' }, logger);
    expect(result.status).toBe('error');
    expect(result.evaluators_results[1].error_msg).toBe('Network trace is required');
  });

  it('should reject a missing task id', () => {
    expect(() => gradeTask({ ...inputs('{}'), taskId: NaN }, logger)).toThrow();
  });

  it('should propagate unknown task ids', () => {
    expect(() => gradeTask({ ...inputs('{}'), taskId: 5 }, logger)).toThrow(TaskNotFoundError);
  });
});
