import { z } from 'zod';

export type ResultsSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'null';

export interface ResultsSchema {
  type: ResultsSchemaType;
  format?: string;
  items?: ResultsSchema;
  properties?: Record<string, ResultsSchema>;
  ordered?: boolean;
}

export const resultsSchemaSchema: z.ZodType<ResultsSchema> = z.lazy(() =>
  z.object({
    type: z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object', 'null']),
    format: z.string().optional().describe('Value kind for scalar leaves, e.g. currency or date'),
    items: resultsSchemaSchema.optional(),
    properties: z.record(resultsSchemaSchema).optional(),
    ordered: z.boolean().optional(),
  })
);

// Eval config entries. `expected` is validated by the evaluator that consumes it, so a bad
// expectation surfaces as an evaluator-level error instead of a dataset load failure.
export const agentResponseEvalSchema = z.object({
  evaluator: z.literal('AgentResponseEvaluator'),
  ordered: z.boolean().optional(),
  results_schema: resultsSchemaSchema.optional(),
  expected: z.record(z.unknown()),
});

export const networkEventEvalSchema = z.object({
  evaluator: z.literal('NetworkEventEvaluator'),
  ordered: z.boolean().optional(),
  expected: z.record(z.unknown()),
});

export const evalConfigEntrySchema = z.discriminatedUnion('evaluator', [
  agentResponseEvalSchema,
  networkEventEvalSchema,
]);

export type AgentResponseEvalConfig = z.infer<typeof agentResponseEvalSchema>;
export type NetworkEventEvalConfig = z.infer<typeof networkEventEvalSchema>;
export type EvalConfigEntry = z.infer<typeof evalConfigEntrySchema>;

const stringOrAlternatives = z.union([z.string(), z.array(z.string()).min(2)]);

export const networkExpectationSchema = z
  .object({
    url: stringOrAlternatives.describe('URL template, or 2+ acceptable templates'),
    method: z.string().optional(),
    query_params: z.record(z.union([z.string(), z.array(z.string())])).optional(),
    headers: z.record(stringOrAlternatives).optional(),
    response_status: z.number().int().default(200),
    post_data: z.record(z.unknown()).optional(),
  })
  .strict();

export type NetworkExpectation = z.infer<typeof networkExpectationSchema>;

// Task
export const taskSchema = z.object({
  task_id: z.number().int().nonnegative(),
  sites: z.array(z.string().min(1)).min(1),
  intent: z.string(),
  start_urls: z.array(z.string()).default([]),
  intent_template_id: z.number().int().optional(),
  intent_template: z.string().optional(),
  instantiation_dict: z.record(z.unknown()).optional(),
  eval: z.array(evalConfigEntrySchema),
  revision: z.number().int().optional(),
});

export type Task = z.infer<typeof taskSchema>;
