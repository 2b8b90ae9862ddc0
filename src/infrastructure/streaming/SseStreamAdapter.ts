import { Response } from 'express';
import { ITaskEventBus } from '../../domain/events/ITaskEventBus';
import { ICheckpointStore } from '../../domain/repositories/ICheckpointStore';
import { ILogger } from '../../domain/common/ILogger';
import { WireEvent, formatSseFrame, replayFromCheckpoint, toWireEvent } from './wireEvents';

export interface SseOptions {
  heartbeatMs: number;
}

// At most 15 digits, so n + 1 stays an exact integer.
const SEQUENCE_PATTERN = /^\d{1,15}$/;

/**
 * Parse a resume position. `Last-Event-ID: n` resumes after n; `?from=s`
 * resumes at s. Anything unparseable starts from the beginning.
 */
export function resolveFromSequence(lastEventId: string | undefined, from: unknown): number {
  if (lastEventId !== undefined && SEQUENCE_PATTERN.test(lastEventId.trim())) {
    return parseInt(lastEventId, 10) + 1;
  }
  if (typeof from === 'string' && SEQUENCE_PATTERN.test(from)) {
    return parseInt(from, 10);
  }
  return 0;
}

/**
 * Writes one task's events to an HTTP response as Server-Sent Events.
 *
 * Live tasks are followed through the event bus. Tasks whose event log is
 * gone are replayed from their checkpoint.
 */
export class SseStreamAdapter {
  constructor(
    private eventBus: ITaskEventBus,
    private checkpoints: ICheckpointStore,
    private logger: ILogger,
    private options: SseOptions
  ) {}

  async stream(res: Response, taskId: string, fromSequence: number = 0): Promise<void> {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    try {
      if (this.eventBus.has(taskId)) {
        await this.follow(res, taskId, fromSequence);
      } else {
        await this.replay(res, taskId);
      }
    } catch (err) {
      this.logger.error(`SSE stream failed for ${taskId}`, err instanceof Error ? err : undefined);
    } finally {
      if (!res.writableEnded) {
        res.end();
      }
    }
  }

  private async follow(res: Response, taskId: string, fromSequence: number): Promise<void> {
    const subscription = this.eventBus.subscribe(taskId, fromSequence);
    const onClose = () => {
      subscription.close();
      this.logger.debug(`SSE client disconnected: ${taskId}`);
    };
    res.on('close', onClose);

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) {
        res.write(': heartbeat\n\n');
      }
    }, this.options.heartbeatMs);

    try {
      for await (const event of subscription) {
        const wire = toWireEvent(event);
        if (wire) {
          this.write(res, wire);
        }
      }
    } finally {
      clearInterval(heartbeat);
      res.off('close', onClose);
      subscription.close();
    }
  }

  private async replay(res: Response, taskId: string): Promise<void> {
    const checkpoint = await this.checkpoints.tryRead(taskId);
    if (!checkpoint) {
      this.write(res, { id: null, event: 'error', data: { message: `Task '${taskId}' not found` } });
      return;
    }

    this.logger.debug(`Replaying ${taskId} from checkpoint`, { stage: checkpoint.currentStage });
    for (const event of replayFromCheckpoint(checkpoint)) {
      this.write(res, event);
    }
  }

  private write(res: Response, event: WireEvent): void {
    if (res.writableEnded || res.destroyed) return;
    res.write(formatSseFrame(event));
  }
}
