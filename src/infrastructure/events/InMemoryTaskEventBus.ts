import { EventEmitter } from 'events';
import { ITaskEventBus, TaskSubscription } from '../../domain/events/ITaskEventBus';
import { AnyTaskEvent, TaskEventPayload, endsStream, isTerminalEvent } from '../../domain/events/TaskEvents';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';

interface TaskChannel {
  log: AnyTaskEvent[];
  emitter: EventEmitter;
  closed: boolean;
  discardTimer: NodeJS.Timeout | null;
}

export interface EventBusOptions {
  /** How long a task's log is kept after its terminal event. */
  retentionMs: number;
}

/**
 * Subscription over one channel. The backlog snapshot and the live listener
 * are taken in the same synchronous step, so nothing published in between
 * is missed or delivered twice.
 */
class ChannelSubscription implements TaskSubscription {
  private queue: AnyTaskEvent[] = [];
  private waiting: ((result: IteratorResult<AnyTaskEvent>) => void) | null = null;
  private done = false;
  private readonly onEvent = (event: AnyTaskEvent) => this.push(event);
  private readonly onDiscard = () => this.close();

  constructor(
    readonly taskId: string,
    readonly fromSequence: number,
    private channel: TaskChannel
  ) {
    for (const event of channel.log) {
      if (event.sequence >= fromSequence) {
        this.queue.push(event);
      }
    }

    // Nothing more will be published; a reconnect past the end gets the
    // terminal event again.
    const last = channel.log[channel.log.length - 1];
    if (channel.closed && this.queue.length === 0 && last !== undefined) {
      this.queue.push(last);
    }
    channel.emitter.on('event', this.onEvent);
    channel.emitter.once('discard', this.onDiscard);
  }

  /**
   * Paused and terminal events end the stream only while nothing has
   * followed them; a resumed task keeps the same channel.
   */
  private endsHere(event: AnyTaskEvent): boolean {
    if (!endsStream(event)) return false;
    const last = this.channel.log[this.channel.log.length - 1];
    return last !== undefined && last.sequence === event.sequence;
  }

  private push(event: AnyTaskEvent): void {
    if (this.done || event.sequence < this.fromSequence) return;

    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      if (this.endsHere(event)) this.finish();
      waiting({ value: event, done: false });
      return;
    }
    this.queue.push(event);
  }

  private finish(): void {
    this.done = true;
    this.queue = [];
    this.channel.emitter.off('event', this.onEvent);
    this.channel.emitter.off('discard', this.onDiscard);
  }

  next(): Promise<IteratorResult<AnyTaskEvent>> {
    const event = this.queue.shift();
    if (event) {
      if (this.endsHere(event)) this.finish();
      return Promise.resolve<IteratorResult<AnyTaskEvent>>({ value: event, done: false });
    }
    if (this.done) {
      return Promise.resolve<IteratorResult<AnyTaskEvent>>({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.done) this.finish();
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<AnyTaskEvent> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve<IteratorResult<AnyTaskEvent>>({ value: undefined, done: true });
      }
    };
  }
}

/**
 * In-memory, per-task event bus. Each task gets an ordered log plus an
 * EventEmitter that fans new events out to its subscribers.
 */
export class InMemoryTaskEventBus implements ITaskEventBus {
  private channels = new Map<string, TaskChannel>();

  constructor(
    private logger: ILogger,
    private options: EventBusOptions
  ) {}

  open(taskId: string): void {
    const existing = this.channels.get(taskId);
    if (existing) {
      if (existing.closed) {
        if (existing.discardTimer) clearTimeout(existing.discardTimer);
        existing.discardTimer = null;
        existing.closed = false;
        this.logger.debug(`Event channel reopened: ${taskId}`);
      }
      return;
    }

    const emitter = new EventEmitter();
    emitter.setMaxListeners(100);
    this.channels.set(taskId, { log: [], emitter, closed: false, discardTimer: null });
    this.logger.debug(`Event channel opened: ${taskId}`);
  }

  publish(taskId: string, payload: TaskEventPayload): AnyTaskEvent | null {
    const channel = this.channels.get(taskId);
    if (!channel) {
      this.logger.warn(`Dropped ${payload.type} for unknown task channel`, { taskId });
      return null;
    }
    if (channel.closed) {
      this.logger.warn(`Dropped ${payload.type} after terminal event`, { taskId });
      return null;
    }

    const event: AnyTaskEvent = {
      taskId,
      sequence: channel.log.length,
      timestamp: Date.now(),
      ...payload
    };
    channel.log.push(event);

    if (event.type !== 'stage:chunk') {
      this.logger.debug(`Event published: ${event.type}`, { taskId, sequence: event.sequence });
    }

    if (isTerminalEvent(event)) {
      channel.closed = true;
      this.scheduleDiscard(taskId, channel);
    }

    channel.emitter.emit('event', event);
    return event;
  }

  subscribe(taskId: string, fromSequence: number = 0): TaskSubscription {
    const channel = this.channels.get(taskId);
    if (!channel) {
      throw new NotFoundError('Event stream for task', taskId);
    }
    return new ChannelSubscription(taskId, Math.max(0, fromSequence), channel);
  }

  history(taskId: string, fromSequence: number = 0): AnyTaskEvent[] {
    const channel = this.channels.get(taskId);
    if (!channel) return [];
    return channel.log.filter(e => e.sequence >= fromSequence);
  }

  has(taskId: string): boolean {
    return this.channels.has(taskId);
  }

  nextSequence(taskId: string): number {
    return this.channels.get(taskId)?.log.length ?? 0;
  }

  discard(taskId: string): void {
    const channel = this.channels.get(taskId);
    if (!channel) return;

    if (channel.discardTimer) clearTimeout(channel.discardTimer);
    this.channels.delete(taskId);
    channel.emitter.emit('discard');
    channel.emitter.removeAllListeners();
    this.logger.debug(`Event channel discarded: ${taskId}`);
  }

  clear(): void {
    for (const taskId of Array.from(this.channels.keys())) {
      this.discard(taskId);
    }
  }

  private scheduleDiscard(taskId: string, channel: TaskChannel): void {
    const timer = setTimeout(() => this.discard(taskId), this.options.retentionMs);
    timer.unref();
    channel.discardTimer = timer;
  }
}
