import pino from 'pino';
import { config } from './config.js';
import { gradeTask } from './grade.js';

// stdout carries the result
const logger = pino({ level: config.logLevel }, pino.destination(2));

try {
  const result = gradeTask(
    {
      datasetPath: config.datasetPath,
      sitesPath: config.sitesPath,
      taskId: config.taskId,
      responsePath: config.responsePath,
      tracePath: config.tracePath,
      scoring: config.scoring,
    },
    logger
  );
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  if (result.status !== 'success') process.exitCode = 1;
} catch (err) {
  logger.error({ err }, 'Grading failed');
  process.exitCode = 2;
}
