import { Task } from '../../types';
import { NotFoundError } from '../../domain/common/Errors';

/**
 * A running pipeline. `done` settles once the pipeline has stopped and its
 * final status is recorded; it never rejects.
 */
export interface RunHandle {
  controller: AbortController;
  done: Promise<void>;
  pauseRequested: boolean;
}

export interface TaskEntry {
  task: Task;
  stageOutputs: Record<string, string>;
  run: RunHandle | null;
}

/**
 * In-memory index of known tasks by id and by client key.
 */
export class TaskRegistry {
  private entries = new Map<string, TaskEntry>();
  private clientKeys = new Map<string, string>();

  add(task: Task, stageOutputs: Record<string, string> = {}): TaskEntry {
    const entry: TaskEntry = { task, stageOutputs, run: null };
    this.entries.set(task.id, entry);
    this.indexClientKey(entry);
    return entry;
  }

  /**
   * @throws {NotFoundError} if the task is unknown
   */
  get(taskId: string): TaskEntry {
    const entry = this.entries.get(taskId);
    if (!entry) {
      throw new NotFoundError('Task', taskId);
    }
    return entry;
  }

  find(taskId: string): TaskEntry | undefined {
    return this.entries.get(taskId);
  }

  /**
   * @throws {NotFoundError} if no task was created with the key
   */
  getByClientKey(clientKey: string): TaskEntry {
    const taskId = this.clientKeys.get(clientKey);
    const entry = taskId ? this.entries.get(taskId) : undefined;
    if (!entry) {
      throw new NotFoundError('Task for client key', clientKey);
    }
    return entry;
  }

  list(): TaskEntry[] {
    return Array.from(this.entries.values()).sort((a, b) => a.task.createdAt - b.task.createdAt);
  }

  running(): TaskEntry[] {
    return Array.from(this.entries.values()).filter(e => e.run !== null);
  }

  remove(taskId: string): void {
    const entry = this.entries.get(taskId);
    if (!entry) return;
    this.entries.delete(taskId);

    if (this.clientKeys.get(entry.task.clientKey) === taskId) {
      this.clientKeys.delete(entry.task.clientKey);
      const newest = this.list().filter(e => e.task.clientKey === entry.task.clientKey).pop();
      if (newest) this.clientKeys.set(newest.task.clientKey, newest.task.id);
    }
  }

  clear(): void {
    this.entries.clear();
    this.clientKeys.clear();
  }

  // A client key points at the most recently created task that used it
  private indexClientKey(entry: TaskEntry): void {
    const currentId = this.clientKeys.get(entry.task.clientKey);
    const current = currentId ? this.entries.get(currentId) : undefined;
    if (!current || current.task.createdAt <= entry.task.createdAt) {
      this.clientKeys.set(entry.task.clientKey, entry.task.id);
    }
  }
}
