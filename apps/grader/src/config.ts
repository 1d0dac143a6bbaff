import { config as loadEnv } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import type { ScoringMode } from '@webgrade/sdk';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

loadEnv({ path: resolve(__dirname, '../../../.env') });

const scoring: ScoringMode = process.env.GRADER_SCORING === 'average' ? 'average' : 'all';

export const config = {
  datasetPath: process.env.GRADER_DATASET_PATH || '',
  sitesPath: process.env.GRADER_SITES_PATH || '',
  taskId: parseInt(process.env.GRADER_TASK_ID || '', 10),
  responsePath: process.env.GRADER_RESPONSE_PATH || '',
  tracePath: process.env.GRADER_TRACE_PATH || '',
  scoring,
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
};
