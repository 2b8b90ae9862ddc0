import { WebSocketServer, WebSocket, RawData } from 'ws';
import { z } from 'zod';
import { ITaskEventBus, TaskSubscription } from '../../domain/events/ITaskEventBus';
import { ICheckpointStore } from '../../domain/repositories/ICheckpointStore';
import { ILogger } from '../../domain/common/ILogger';
import { toErrorMessage } from '../../domain/common/Errors';
import { WireEvent, replayFromCheckpoint, toWireEvent } from '../streaming/wireEvents';

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('subscribe'),
    taskId: z.string().min(1),
    fromSequence: z.number().int().min(0).optional()
  }),
  z.object({ type: z.literal('unsubscribe'), taskId: z.string().min(1) }),
  z.object({ type: z.literal('ping') })
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

/**
 * Bridges task event streams to WebSocket clients.
 *
 * A client sends `{ type: "subscribe", taskId, fromSequence }` per task and
 * receives the same events an SSE client would, as JSON frames of the form
 * `{ type: "event", taskId, id, event, data }`.
 */
export class WebSocketBridge {
  private subscriptions = new Map<WebSocket, Map<string, TaskSubscription>>();

  constructor(
    private wss: WebSocketServer,
    private eventBus: ITaskEventBus,
    private checkpoints: ICheckpointStore,
    private logger: ILogger
  ) {
    this.setupConnectionHandlers();
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      this.subscriptions.set(ws, new Map());

      ws.on('close', () => {
        this.closeAll(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket client error:', error);
      });

      ws.on('message', (data) => {
        const message = this.parse(data);
        if (!message) {
          this.logger.warn('Failed to parse WebSocket message');
          this.send(ws, { type: 'error', message: 'Invalid message' });
          return;
        }
        this.handleClientMessage(ws, message).catch((err: unknown) => {
          this.logger.error('WebSocket message handling failed', err instanceof Error ? err : undefined);
          this.send(ws, { type: 'error', message: toErrorMessage(err) });
        });
      });
    });
  }

  private parse(data: RawData): ClientMessage | null {
    try {
      const result = clientMessageSchema.safeParse(JSON.parse(data.toString()));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }

  private async handleClientMessage(ws: WebSocket, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'ping':
        this.send(ws, { type: 'pong', timestamp: Date.now() });
        return;

      case 'unsubscribe':
        this.subscriptions.get(ws)?.get(message.taskId)?.close();
        this.subscriptions.get(ws)?.delete(message.taskId);
        this.send(ws, { type: 'unsubscribed', taskId: message.taskId });
        return;

      case 'subscribe':
        await this.subscribe(ws, message.taskId, message.fromSequence ?? 0);
        return;
    }
  }

  private async subscribe(ws: WebSocket, taskId: string, fromSequence: number): Promise<void> {
    const clientSubs = this.subscriptions.get(ws);
    if (!clientSubs) return;

    clientSubs.get(taskId)?.close();
    clientSubs.delete(taskId);

    if (!this.eventBus.has(taskId)) {
      const checkpoint = await this.checkpoints.tryRead(taskId);
      if (!checkpoint) {
        this.send(ws, { type: 'error', taskId, message: `Task '${taskId}' not found` });
        return;
      }
      this.send(ws, { type: 'subscribed', taskId, fromSequence: null });
      for (const event of replayFromCheckpoint(checkpoint)) {
        this.sendEvent(ws, taskId, event);
      }
      return;
    }

    const subscription = this.eventBus.subscribe(taskId, fromSequence);
    clientSubs.set(taskId, subscription);
    this.send(ws, { type: 'subscribed', taskId, fromSequence });
    this.logger.debug(`WebSocket client subscribed to ${taskId}`, { fromSequence });

    void this.pump(ws, taskId, subscription);
  }

  private async pump(ws: WebSocket, taskId: string, subscription: TaskSubscription): Promise<void> {
    try {
      for await (const event of subscription) {
        const wire = toWireEvent(event);
        if (wire) {
          this.sendEvent(ws, taskId, wire);
        }
      }
    } catch (err) {
      this.logger.error(`WebSocket stream failed for ${taskId}`, err instanceof Error ? err : undefined);
    } finally {
      const clientSubs = this.subscriptions.get(ws);
      if (clientSubs?.get(taskId) === subscription) {
        clientSubs.delete(taskId);
      }
    }
  }

  private sendEvent(ws: WebSocket, taskId: string, event: WireEvent): void {
    this.send(ws, { type: 'event', taskId, id: event.id, event: event.event, data: event.data });
  }

  private send(ws: WebSocket, message: Record<string, unknown>): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    ws.send(JSON.stringify(message));
  }

  private closeAll(ws: WebSocket): void {
    const clientSubs = this.subscriptions.get(ws);
    if (clientSubs) {
      for (const subscription of clientSubs.values()) {
        subscription.close();
      }
    }
    this.subscriptions.delete(ws);
  }

  /**
   * End every client subscription. Connections stay open.
   */
  close(): void {
    for (const ws of Array.from(this.subscriptions.keys())) {
      this.closeAll(ws);
    }
  }
}
