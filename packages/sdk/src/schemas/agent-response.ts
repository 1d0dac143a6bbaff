import { z } from 'zod';
import { isRecord } from '../types.js';

const upperCase = (value: unknown) => (typeof value === 'string' ? value.trim().toUpperCase() : value);

export const taskTypeSchema = z.preprocess(upperCase, z.enum(['RETRIEVE', 'NAVIGATE', 'MUTATE']));

export const agentStatusSchema = z.preprocess(
  upperCase,
  z.enum([
    'SUCCESS',
    'ACTION_NOT_ALLOWED_ERROR',
    'PERMISSION_DENIED_ERROR',
    'NOT_FOUND_ERROR',
    'DATA_VALIDATION_ERROR',
    'UNKNOWN_ERROR',
  ])
);

/**
 * Older agents report the task type as `performed_operation`.
 */
function applyLegacyAliases(value: unknown): unknown {
  if (!isRecord(value)) return value;
  if (value.task_type === undefined && value.performed_operation !== undefined) {
    const { performed_operation: taskType, ...rest } = value;
    return { ...rest, task_type: taskType };
  }
  return value;
}

// Final Agent Response
export const agentResponseSchema = z.preprocess(
  applyLegacyAliases,
  z.object({
    task_type: taskTypeSchema.describe('Kind of task the agent believes it performed'),
    status: agentStatusSchema.describe('Outcome reported by the agent'),
    retrieved_data: z.unknown().optional().describe('Data returned for retrieval tasks'),
    error_details: z.string().nullable().optional().describe('Free-form explanation of an error status'),
  })
);

export type AgentResponse = z.infer<typeof agentResponseSchema>;
