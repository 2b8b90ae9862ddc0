import { Checkpoint } from '../../types';
import { ICheckpointStore } from '../../domain/repositories/ICheckpointStore';
import { NotFoundError } from '../../domain/common/Errors';

/**
 * Process-local checkpoint store. Used by tests and STORAGE_TYPE=memory.
 */
export class InMemoryCheckpointStore implements ICheckpointStore {
  private checkpoints = new Map<string, Checkpoint>();

  async initialize(): Promise<void> {}

  async write(taskId: string, checkpoint: Checkpoint): Promise<void> {
    this.checkpoints.set(taskId, structuredClone(checkpoint));
  }

  async read(taskId: string): Promise<Checkpoint> {
    const checkpoint = this.checkpoints.get(taskId);
    if (!checkpoint) {
      throw new NotFoundError('Checkpoint', taskId);
    }
    return structuredClone(checkpoint);
  }

  async tryRead(taskId: string): Promise<Checkpoint | null> {
    const checkpoint = this.checkpoints.get(taskId);
    return checkpoint ? structuredClone(checkpoint) : null;
  }

  async list(): Promise<Checkpoint[]> {
    return Array.from(this.checkpoints.values())
      .map(c => structuredClone(c))
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async delete(taskId: string): Promise<void> {
    if (!this.checkpoints.delete(taskId)) {
      throw new NotFoundError('Checkpoint', taskId);
    }
  }
}
