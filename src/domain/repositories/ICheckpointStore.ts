import { Checkpoint } from '../../types';

/**
 * Durable per-task progress records.
 */
export interface ICheckpointStore {
  /**
   * Load persisted checkpoints. Safe to call more than once.
   */
  initialize(): Promise<void>;

  /**
   * Replace the task's checkpoint atomically. The returned promise resolves
   * once the new record is durable. Writes for one task apply in call order.
   */
  write(taskId: string, checkpoint: Checkpoint): Promise<void>;

  /**
   * @throws {NotFoundError} if the task has no checkpoint
   */
  read(taskId: string): Promise<Checkpoint>;

  tryRead(taskId: string): Promise<Checkpoint | null>;

  list(): Promise<Checkpoint[]>;

  /**
   * @throws {NotFoundError} if the task has no checkpoint
   */
  delete(taskId: string): Promise<void>;
}
