import type { EvaluatorName } from '@webgrade/sdk';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationFault extends Error {
  evaluatorName?: EvaluatorName;

  constructor(message: string, evaluatorName?: EvaluatorName) {
    super(message);
    this.name = 'ConfigurationFault';
    this.evaluatorName = evaluatorName;
  }
}

export class ParseFault extends Error {
  source?: string;

  constructor(message: string, source?: string) {
    super(message);
    this.name = 'ParseFault';
    this.source = source;
  }
}

export class CircularReferenceError extends Error {
  path: string;

  constructor(path: string) {
    super(`Circular reference detected at path '${path}'`);
    this.name = 'CircularReferenceError';
    this.path = path;
  }
}

export class SiteConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SiteConfigError';
  }
}

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetError';
  }
}

export class TaskNotFoundError extends Error {
  taskId: number;

  constructor(taskId: number) {
    super(`Task ${taskId} not found in dataset`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
