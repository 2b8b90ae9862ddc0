import { AnyTaskEvent, TaskEventPayload } from './TaskEvents';

/**
 * Live view of one task's events. Iterating yields every event with
 * `sequence >= fromSequence` in order, then waits for new ones. Iteration
 * ends after a paused or terminal event that is the latest in the log, or
 * after `close()`.
 */
export interface TaskSubscription extends AsyncIterable<AnyTaskEvent> {
  readonly taskId: string;
  readonly fromSequence: number;
  close(): void;
}

/**
 * Per-task broadcast channel with replay.
 */
export interface ITaskEventBus {
  /**
   * Create the task's channel, or reopen one closed by a terminal event.
   * A reopened channel keeps its log and sequence numbering.
   */
  open(taskId: string): void;

  /**
   * Append an event to the task's log and deliver it to subscribers.
   * Returns null when the channel is missing or already closed by a terminal event.
   */
  publish(taskId: string, payload: TaskEventPayload): AnyTaskEvent | null;

  /**
   * Subscribe from `fromSequence` (inclusive).
   * @throws {NotFoundError} if the task has no channel
   */
  subscribe(taskId: string, fromSequence?: number): TaskSubscription;

  /**
   * Events logged so far with `sequence >= fromSequence`.
   */
  history(taskId: string, fromSequence?: number): AnyTaskEvent[];

  has(taskId: string): boolean;

  /**
   * Sequence number the next event will get.
   */
  nextSequence(taskId: string): number;

  /**
   * Drop the task's log and end its subscriptions.
   */
  discard(taskId: string): void;

  /**
   * End every subscription and drop every log.
   */
  clear(): void;
}
