import { readFileSync } from 'fs';
import { isRecord, taskSchema, type SiteId, type Task, type TaskType } from '@webgrade/sdk';
import { DatasetError, TaskNotFoundError } from './errors.js';
import { parseJsonText } from './network/har.js';

export interface TaskFilter {
  sites?: readonly SiteId[];
  templateId?: number;
  taskType?: TaskType;
}

function recordId(record: unknown, index: number): string {
  return isRecord(record) && typeof record.task_id === 'number' ? String(record.task_id) : `#${index}`;
}

/** Task type an entry's agent response expectation declares, if any. */
export function taskTypeOf(task: Task): TaskType | null {
  for (const entry of task.eval) {
    if (entry.evaluator !== 'AgentResponseEvaluator') continue;
    const taskType = entry.expected.task_type ?? entry.expected.performed_operation;
    if (typeof taskType === 'string') {
      const upper = taskType.toUpperCase();
      if (upper === 'RETRIEVE' || upper === 'NAVIGATE' || upper === 'MUTATE') return upper;
    }
  }
  return null;
}

/**
 * In-memory task dataset, validated on load.
 */
export class TaskReader {
  private _tasks: Task[];
  private _byId: Map<number, Task>;

  constructor(records: readonly unknown[]) {
    this._tasks = [];
    this._byId = new Map();
    records.forEach((record, index) => {
      const parsed = taskSchema.safeParse(record);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new DatasetError(
          `Failed to parse task with id ${recordId(record, index)}: ${issue.path.join('.')}: ${issue.message}`
        );
      }
      const task = parsed.data;
      if (this._byId.has(task.task_id)) {
        throw new DatasetError(`Duplicate task_id found: ${task.task_id}`);
      }
      this._byId.set(task.task_id, task);
      this._tasks.push(task);
    });
  }

  /** Read a JSON array of tasks. */
  static fromFile(path: string): TaskReader {
    const data = parseJsonText(readFileSync(path, 'utf-8'), path);
    if (!Array.isArray(data)) throw new DatasetError(`Task dataset ${path} must be a JSON array`);
    return new TaskReader(data);
  }

  get tasks(): readonly Task[] {
    return this._tasks;
  }

  getTaskById(taskId: number): Task {
    const task = this._byId.get(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  filter(filter: TaskFilter = {}): Task[] {
    return this._tasks.filter((task) => {
      if (filter.sites && !filter.sites.every((site) => task.sites.includes(site))) return false;
      if (filter.templateId !== undefined && task.intent_template_id !== filter.templateId) return false;
      if (filter.taskType && taskTypeOf(task) !== filter.taskType) return false;
      return true;
    });
  }
}
