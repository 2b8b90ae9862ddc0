import * as fs from 'fs/promises';
import * as path from 'path';
import { Checkpoint } from '../../types';
import { ICheckpointStore } from '../../domain/repositories/ICheckpointStore';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, toErrorMessage } from '../../domain/common/Errors';
import { parseCheckpoint } from '../../domain/common/schemas';

/**
 * File system based implementation of ICheckpointStore.
 * One JSON file per task in {dataDir}/checkpoints/, replaced through a
 * temp file and rename so a crash leaves either the old or the new record.
 */
export class FileSystemCheckpointStore implements ICheckpointStore {
  private checkpointDir: string;
  private checkpoints: Map<string, Checkpoint>;
  private pending: Map<string, Promise<void>>;
  private initialized: boolean = false;

  constructor(
    private dataDir: string,
    private logger: ILogger
  ) {
    this.checkpointDir = path.join(dataDir, 'checkpoints');
    this.checkpoints = new Map();
    this.pending = new Map();
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await fs.mkdir(this.checkpointDir, { recursive: true });

      const files = await fs.readdir(this.checkpointDir);
      const checkpointFiles = files.filter(f => f.endsWith('.json'));

      for (const file of checkpointFiles) {
        try {
          const data = await fs.readFile(path.join(this.checkpointDir, file), 'utf-8');
          const checkpoint = parseCheckpoint(JSON.parse(data));
          this.checkpoints.set(checkpoint.taskId, checkpoint);
        } catch (err) {
          this.logger.warn(`Failed to load checkpoint file: ${file}`, { error: toErrorMessage(err) });
        }
      }

      this.logger.info(`Loaded ${this.checkpoints.size} checkpoints`);
      this.initialized = true;
    } catch (err) {
      this.logger.error('Failed to initialize checkpoint store:', err instanceof Error ? err : undefined);
      throw err;
    }
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }

  private filePath(taskId: string): string {
    return path.join(this.checkpointDir, `${taskId}.json`);
  }

  /**
   * Chain an operation behind whatever is already queued for the task.
   */
  private enqueue(taskId: string, op: () => Promise<void>): Promise<void> {
    const previous = this.pending.get(taskId) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(op);
    this.pending.set(taskId, next);
    const cleanup = () => {
      if (this.pending.get(taskId) === next) {
        this.pending.delete(taskId);
      }
    };
    void next.then(cleanup, cleanup);
    return next;
  }

  private async writeAtomic(taskId: string, checkpoint: Checkpoint): Promise<void> {
    const target = this.filePath(taskId);
    const temp = `${target}.${process.pid}.tmp`;

    const handle = await fs.open(temp, 'w');
    try {
      await handle.writeFile(JSON.stringify(checkpoint, null, 2));
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(temp, target);
    await this.syncDirectory();
  }

  private async syncDirectory(): Promise<void> {
    let dir: fs.FileHandle;
    try {
      dir = await fs.open(this.checkpointDir, 'r');
    } catch (err) {
      // Some platforms cannot open directories for reading
      this.logger.debug('Skipped checkpoint directory sync', { error: toErrorMessage(err) });
      return;
    }
    try {
      await dir.sync();
    } catch (err) {
      this.logger.debug('Checkpoint directory sync not supported', { error: toErrorMessage(err) });
    } finally {
      await dir.close();
    }
  }

  async write(taskId: string, checkpoint: Checkpoint): Promise<void> {
    const snapshot = structuredClone(checkpoint);
    await this.ensureInitialized();

    await this.enqueue(taskId, async () => {
      await this.writeAtomic(taskId, snapshot);
      this.checkpoints.set(taskId, snapshot);
    });

    this.logger.debug(`Checkpoint written: ${taskId} (stage ${snapshot.currentStage}, ${snapshot.status})`);
  }

  async read(taskId: string): Promise<Checkpoint> {
    const checkpoint = await this.tryRead(taskId);
    if (!checkpoint) {
      throw new NotFoundError('Checkpoint', taskId);
    }
    return checkpoint;
  }

  async tryRead(taskId: string): Promise<Checkpoint | null> {
    await this.ensureInitialized();
    await this.pending.get(taskId)?.catch(() => undefined);

    const checkpoint = this.checkpoints.get(taskId);
    return checkpoint ? structuredClone(checkpoint) : null;
  }

  async list(): Promise<Checkpoint[]> {
    await this.ensureInitialized();
    await Promise.all(Array.from(this.pending.values()).map(p => p.catch(() => undefined)));

    return Array.from(this.checkpoints.values())
      .map(c => structuredClone(c))
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async delete(taskId: string): Promise<void> {
    await this.ensureInitialized();
    await this.pending.get(taskId)?.catch(() => undefined);

    if (!this.checkpoints.has(taskId)) {
      throw new NotFoundError('Checkpoint', taskId);
    }

    await this.enqueue(taskId, async () => {
      await fs.rm(this.filePath(taskId), { force: true });
      this.checkpoints.delete(taskId);
    });

    this.logger.debug(`Checkpoint deleted: ${taskId}`);
  }
}
