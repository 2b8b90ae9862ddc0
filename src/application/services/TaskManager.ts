import {
  CancelResult,
  Checkpoint,
  GenerationRequest,
  Task,
  TaskStatus,
  TaskStatusView,
  TranscriptView,
  isTerminalStatus
} from '../../types';
import { ICheckpointStore } from '../../domain/repositories/ICheckpointStore';
import { ITaskEventBus } from '../../domain/events/ITaskEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import {
  CancelledError,
  InvalidStateError,
  ValidationError,
  toErrorMessage
} from '../../domain/common/Errors';
import { parseGenerationRequest } from '../../domain/common/schemas';
import { RunHandle, TaskEntry, TaskRegistry } from './TaskRegistry';
import { PipelineOutcome, StagePipeline } from './StagePipeline';

const CLIENT_KEY_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;

export const RESTART_PAUSE_REASON = 'Interrupted by server restart';
export const SHUTDOWN_PAUSE_REASON = 'Server shutting down';
export const REQUESTED_PAUSE_REASON = 'Paused by request';

function toCheckpoint(entry: TaskEntry): Checkpoint {
  const { task } = entry;
  return {
    version: 1,
    taskId: task.id,
    clientKey: task.clientKey,
    request: task.request,
    status: task.status,
    currentStage: task.currentStage,
    stageOutputs: entry.stageOutputs,
    error: task.error,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt
  };
}

function fromCheckpoint(checkpoint: Checkpoint): Task {
  return {
    id: checkpoint.taskId,
    clientKey: checkpoint.clientKey,
    request: checkpoint.request,
    status: checkpoint.status,
    currentStage: checkpoint.currentStage,
    totalStages: checkpoint.request.episodes + 1,
    error: checkpoint.error,
    createdAt: checkpoint.createdAt,
    updatedAt: checkpoint.updatedAt
  };
}

function orderedStages(stageOutputs: Record<string, string>): number[] {
  return Object.keys(stageOutputs)
    .map(k => Number(k))
    .filter(n => Number.isInteger(n))
    .sort((a, b) => a - b);
}

/**
 * Application service for generation tasks.
 *
 * Owns every task's status. All status changes go through `transition`,
 * which checks and sets in one synchronous step, so concurrent calls on the
 * same task cannot both succeed.
 */
export class TaskManager {
  constructor(
    private registry: TaskRegistry,
    private checkpoints: ICheckpointStore,
    private eventBus: ITaskEventBus,
    private pipeline: StagePipeline,
    private idGenerator: IIdGenerator,
    private logger: ILogger
  ) {}

  /**
   * Load persisted tasks. Tasks that were running when the process stopped
   * come back paused. Non-terminal tasks get an event channel replaying
   * their completed stages.
   */
  async initialize(): Promise<void> {
    await this.checkpoints.initialize();
    const stored = await this.checkpoints.list();

    let interrupted = 0;
    for (const checkpoint of stored) {
      if (this.registry.find(checkpoint.taskId)) continue;

      const entry = this.registry.add(fromCheckpoint(checkpoint), { ...checkpoint.stageOutputs });
      let reason = REQUESTED_PAUSE_REASON;

      if (this.transition(entry, ['running'], 'paused')) {
        reason = RESTART_PAUSE_REASON;
        interrupted++;
        await this.persist(entry);
      }

      if (!isTerminalStatus(entry.task.status)) {
        this.seedChannel(entry, reason);
      }
    }

    this.logger.info(`Restored ${stored.length} tasks (${interrupted} interrupted)`);
  }

  /**
   * Stop every running pipeline and record it as paused so it can be
   * resumed after a restart.
   */
  async shutdown(): Promise<void> {
    const running = this.registry.running();
    for (const entry of running) {
      const handle = entry.run;
      if (!handle) continue;

      if (this.transition(entry, ['running'], 'paused')) {
        handle.controller.abort();
        this.eventBus.publish(entry.task.id, {
          type: 'task:paused',
          data: { stage: entry.task.currentStage, reason: SHUTDOWN_PAUSE_REASON }
        });
        await this.persistQuietly(entry);
      }
    }

    await Promise.all(running.map(e => e.run?.done));
    if (running.length > 0) {
      this.logger.info(`Paused ${running.length} running tasks for shutdown`);
    }
  }

  /**
   * Validate the request and create a pending task.
   * @throws {ValidationError} on an invalid request or client key; nothing is created
   */
  async createTask(input: GenerationRequest, clientKey?: string): Promise<Task> {
    const request = parseGenerationRequest(input);
    if (clientKey !== undefined && !CLIENT_KEY_PATTERN.test(clientKey)) {
      throw new ValidationError('client_key must be 1-128 letters, digits, hyphens or underscores');
    }

    const id = this.idGenerator.generate('task');
    const now = Date.now();
    const task: Task = {
      id,
      clientKey: clientKey ?? id,
      request,
      status: 'pending',
      currentStage: -1,
      totalStages: request.episodes + 1,
      error: null,
      createdAt: now,
      updatedAt: now
    };

    const entry: TaskEntry = { task, stageOutputs: {}, run: null };
    await this.checkpoints.write(id, toCheckpoint(entry));

    this.registry.add(task);
    this.eventBus.open(id);
    this.eventBus.publish(id, { type: 'task:created', data: { taskId: id } });

    this.logger.info(`Task created: ${id}`, {
      clientKey: task.clientKey,
      genre: request.genre,
      episodes: request.episodes
    });
    return { ...task };
  }

  /**
   * Start a pending task. Starting a running task is a no-op.
   * @throws {InvalidStateError} if the task is paused or finished
   */
  async start(taskId: string): Promise<TaskStatusView> {
    const entry = this.registry.get(taskId);
    if (entry.task.status === 'running') {
      return this.toView(entry);
    }
    if (!this.transition(entry, ['pending'], 'running')) {
      throw new InvalidStateError(
        entry.task.status === 'paused'
          ? `Task '${taskId}' is paused; resume it instead`
          : `Task '${taskId}' cannot be started from status '${entry.task.status}'`,
        { status: entry.task.status }
      );
    }

    this.launch(entry);
    return this.toView(entry);
  }

  /**
   * Cancel a task that has not finished. Returns without waiting for the
   * pipeline to stop. Cancelling a finished task changes nothing.
   * @throws {NotFoundError} if the task is unknown
   */
  async cancel(taskId: string): Promise<CancelResult> {
    const entry = this.registry.get(taskId);
    if (!this.transition(entry, ['pending', 'running', 'paused'], 'cancelled')) {
      return { taskId, cancelled: false, status: entry.task.status };
    }

    entry.run?.controller.abort();
    this.eventBus.open(taskId);
    this.eventBus.publish(taskId, { type: 'task:cancelled', data: {} });
    this.logger.info(`Task cancelled: ${taskId}`, { stage: entry.task.currentStage });

    await this.persist(entry);
    return { taskId, cancelled: true, status: entry.task.status };
  }

  /**
   * Ask a running task to stop after the stage in flight is checkpointed.
   * @throws {InvalidStateError} unless the task is running or paused
   */
  async pause(taskId: string): Promise<TaskStatusView> {
    const entry = this.registry.get(taskId);
    if (entry.task.status === 'paused') {
      return this.toView(entry);
    }
    if (entry.task.status !== 'running' || !entry.run) {
      throw new InvalidStateError(`Task '${taskId}' cannot be paused from status '${entry.task.status}'`, {
        status: entry.task.status
      });
    }

    entry.run.pauseRequested = true;
    this.logger.info(`Pause requested: ${taskId}`);
    return this.toView(entry);
  }

  /**
   * Continue a paused or failed task from the stage after its checkpoint.
   * @throws {InvalidStateError} for any other status
   */
  async resume(taskId: string): Promise<TaskStatusView> {
    const entry = this.registry.get(taskId);

    // A pipeline that was just paused may still be recording its final state
    if (entry.run && entry.task.status !== 'running') {
      await entry.run.done;
    }

    if (entry.run || !this.transition(entry, ['paused', 'failed'], 'running')) {
      throw new InvalidStateError(`Task '${taskId}' cannot be resumed from status '${entry.task.status}'`, {
        status: entry.task.status
      });
    }

    entry.task.error = null;
    this.logger.info(`Task resumed: ${taskId}`, { fromStage: entry.task.currentStage + 1 });
    this.launch(entry);
    return this.toView(entry);
  }

  getTask(taskId: string): Task {
    return { ...this.registry.get(taskId).task };
  }

  getStatus(taskId: string): TaskStatusView {
    return this.toView(this.registry.get(taskId));
  }

  getStatusByClientKey(clientKey: string): TaskStatusView {
    return this.toView(this.registry.getByClientKey(clientKey));
  }

  /**
   * Every checkpointed stage text in stage order, separated by a blank line.
   */
  getFullTranscript(taskId: string): TranscriptView {
    return this.toTranscript(this.registry.get(taskId));
  }

  getTranscriptByClientKey(clientKey: string): TranscriptView {
    return this.toTranscript(this.registry.getByClientKey(clientKey));
  }

  /**
   * @throws {NotFoundError} if the task has no checkpoint
   */
  async getCheckpoint(taskId: string): Promise<Checkpoint> {
    return this.checkpoints.read(taskId);
  }

  listTasks(): TaskStatusView[] {
    return this.registry.list().map(e => this.toView(e));
  }

  /**
   * Remove a task that is not running, with its checkpoint and event log.
   * @throws {InvalidStateError} while the task is running
   */
  async deleteTask(taskId: string): Promise<void> {
    const entry = this.registry.get(taskId);
    if (entry.run || entry.task.status === 'running') {
      throw new InvalidStateError(`Task '${taskId}' is running; cancel it first`);
    }

    await this.checkpoints.delete(taskId);
    this.registry.remove(taskId);
    this.eventBus.discard(taskId);
    this.logger.info(`Task deleted: ${taskId}`);
  }

  /**
   * Resolves once the task has no pipeline running.
   */
  async whenSettled(taskId: string): Promise<void> {
    await this.registry.find(taskId)?.run?.done;
  }

  /**
   * Compare-and-set on the task's status.
   */
  private transition(entry: TaskEntry, allowedFrom: readonly TaskStatus[], to: TaskStatus): boolean {
    if (!allowedFrom.includes(entry.task.status)) return false;
    this.logger.debug(`Task ${entry.task.id}: ${entry.task.status} -> ${to}`);
    entry.task.status = to;
    entry.task.updatedAt = Date.now();
    return true;
  }

  private launch(entry: TaskEntry): void {
    const handle: RunHandle = {
      controller: new AbortController(),
      done: Promise.resolve(),
      pauseRequested: false
    };
    entry.run = handle;
    // A failed task restored after a restart, or one whose log was
    // discarded, has no channel yet.
    if (this.eventBus.has(entry.task.id)) {
      this.eventBus.open(entry.task.id);
    } else {
      this.seedChannel(entry);
    }
    handle.done = this.execute(entry, handle);
  }

  private async execute(entry: TaskEntry, handle: RunHandle): Promise<void> {
    const { task } = entry;
    const logger = this.logger.child({ taskId: task.id });

    try {
      await this.persist(entry);
      const outcome = await this.pipeline.run({
        taskId: task.id,
        request: task.request,
        currentStage: task.currentStage,
        stageOutputs: { ...entry.stageOutputs },
        signal: handle.controller.signal,
        logger,
        commitStage: (stage, text) => this.commitStage(entry, handle, stage, text),
        pauseRequested: () => handle.pauseRequested
      });
      await this.settle(entry, outcome, logger);
    } catch (err) {
      logger.error('Task run failed unexpectedly', err instanceof Error ? err : undefined);
      await this.markFailed(entry, toErrorMessage(err), logger);
    } finally {
      if (entry.run === handle) {
        entry.run = null;
      }
    }
  }

  private async commitStage(entry: TaskEntry, handle: RunHandle, stage: number, text: string): Promise<void> {
    if (handle.controller.signal.aborted) {
      throw new CancelledError(entry.task.id);
    }
    entry.stageOutputs[String(stage)] = text;
    entry.task.currentStage = stage;
    entry.task.updatedAt = Date.now();
    await this.persist(entry);
  }

  private async settle(entry: TaskEntry, outcome: PipelineOutcome, logger: ILogger): Promise<void> {
    const taskId = entry.task.id;

    switch (outcome.kind) {
      case 'completed':
        if (this.transition(entry, ['running'], 'completed')) {
          await this.persistQuietly(entry);
          this.eventBus.publish(taskId, { type: 'task:completed', data: {} });
          logger.info('Task completed', { stages: entry.task.totalStages });
        }
        return;

      case 'paused':
        if (this.transition(entry, ['running'], 'paused')) {
          await this.persistQuietly(entry);
          this.eventBus.publish(taskId, {
            type: 'task:paused',
            data: { stage: outcome.stage, reason: REQUESTED_PAUSE_REASON }
          });
          logger.info('Task paused', { stage: outcome.stage });
        }
        return;

      case 'failed':
        await this.markFailed(entry, outcome.reason, logger);
        return;

      case 'cancelled':
        // cancel() or shutdown() already recorded the final status
        logger.debug('Pipeline stopped after abort');
        return;
    }
  }

  private async markFailed(entry: TaskEntry, reason: string, logger: ILogger): Promise<void> {
    if (!this.transition(entry, ['running'], 'failed')) return;

    entry.task.error = reason;
    await this.persistQuietly(entry);
    this.eventBus.publish(entry.task.id, { type: 'task:failed', data: { reason } });
    logger.warn('Task failed', { stage: entry.task.currentStage + 1, reason });
  }

  private async persist(entry: TaskEntry): Promise<void> {
    await this.checkpoints.write(entry.task.id, toCheckpoint(entry));
  }

  private async persistQuietly(entry: TaskEntry): Promise<void> {
    try {
      await this.persist(entry);
    } catch (err) {
      this.logger.error(`Failed to write checkpoint for ${entry.task.id}`, err instanceof Error ? err : undefined);
    }
  }

  /**
   * Rebuild a live channel for a task from its checkpoint. A paused task
   * also gets its pause event when a reason is given.
   */
  private seedChannel(entry: TaskEntry, pauseReason?: string): void {
    const taskId = entry.task.id;
    this.eventBus.open(taskId);
    this.eventBus.publish(taskId, { type: 'task:created', data: { taskId } });

    for (const stage of orderedStages(entry.stageOutputs)) {
      this.eventBus.publish(taskId, {
        type: 'stage:completed',
        data: { stage, fullText: entry.stageOutputs[String(stage)] }
      });
    }

    if (pauseReason !== undefined && entry.task.status === 'paused') {
      this.eventBus.publish(taskId, {
        type: 'task:paused',
        data: { stage: entry.task.currentStage, reason: pauseReason }
      });
    }
  }

  private toView(entry: TaskEntry): TaskStatusView {
    const { task } = entry;
    return {
      taskId: task.id,
      clientKey: task.clientKey,
      status: task.status,
      currentStage: task.currentStage,
      totalStages: task.totalStages,
      episodesCompleted: Math.max(0, task.currentStage),
      totalEpisodes: task.request.episodes,
      progress: (task.currentStage + 1) / task.totalStages,
      error: task.error,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt
    };
  }

  private toTranscript(entry: TaskEntry): TranscriptView {
    const { task, stageOutputs } = entry;
    return {
      taskId: task.id,
      status: task.status,
      currentStage: task.currentStage,
      episodesCompleted: Math.max(0, task.currentStage),
      totalEpisodes: task.request.episodes,
      transcript: orderedStages(stageOutputs).map(s => stageOutputs[String(s)]).join('\n\n')
    };
  }
}
