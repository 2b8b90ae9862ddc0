import { Checkpoint } from '../../types';
import { AnyTaskEvent } from '../../domain/events/TaskEvents';

/**
 * Events as clients see them. `id` is the bus sequence number, or null for
 * events rebuilt from a checkpoint.
 */
export type WireEvent = { id: number | null } & (
  | { event: 'task_id'; data: { task_id: string } }
  | { event: 'status'; data: { message: string } }
  | { event: 'progress'; data: { current: number; total: number } }
  | { event: 'initial_content'; data: { content: string } }
  | { event: 'episode_content_chunk'; data: { episode: number; attempt: number; content: string; is_complete: boolean } }
  | { event: 'episode_content'; data: { episode: number; content: string } }
  | { event: 'stage_retry'; data: { episode: number; attempt: number; max_attempts: number; message: string } }
  | { event: 'paused'; data: { message: string; stage: number } }
  | { event: 'complete'; data: Record<string, never> }
  | { event: 'error'; data: { message: string } }
  | { event: 'cancelled'; data: { message: string } }
);

export const CANCELLED_MESSAGE = 'Generation cancelled';

/**
 * Map a bus event to its wire form. Outline chunks and stage starts have no
 * wire form and map to null.
 */
export function toWireEvent(event: AnyTaskEvent): WireEvent | null {
  const id = event.sequence;

  switch (event.type) {
    case 'task:created':
      return { id, event: 'task_id', data: { task_id: event.data.taskId } };
    case 'task:status':
      return { id, event: 'status', data: { message: event.data.message } };
    case 'task:progress':
      return { id, event: 'progress', data: { current: event.data.current, total: event.data.total } };
    case 'stage:started':
      return null;
    case 'stage:chunk':
      if (event.data.stage === 0) return null;
      return {
        id,
        event: 'episode_content_chunk',
        data: {
          episode: event.data.stage,
          attempt: event.data.attempt,
          content: event.data.text,
          is_complete: event.data.isFinal
        }
      };
    case 'stage:completed':
      if (event.data.stage === 0) {
        return { id, event: 'initial_content', data: { content: event.data.fullText } };
      }
      return { id, event: 'episode_content', data: { episode: event.data.stage, content: event.data.fullText } };
    case 'stage:retrying':
      return {
        id,
        event: 'stage_retry',
        data: {
          episode: event.data.stage,
          attempt: event.data.attempt,
          max_attempts: event.data.maxAttempts,
          message: event.data.reason
        }
      };
    case 'task:paused':
      return { id, event: 'paused', data: { message: event.data.reason, stage: event.data.stage } };
    case 'task:completed':
      return { id, event: 'complete', data: {} };
    case 'task:failed':
      return { id, event: 'error', data: { message: event.data.reason } };
    case 'task:cancelled':
      return { id, event: 'cancelled', data: { message: CANCELLED_MESSAGE } };
  }
}

/**
 * Rebuild a task's stream from its checkpoint: the task id, the outline,
 * each finished episode, then the event matching the recorded status.
 */
export function replayFromCheckpoint(checkpoint: Checkpoint): WireEvent[] {
  const events: WireEvent[] = [{ id: null, event: 'task_id', data: { task_id: checkpoint.taskId } }];

  const stages = Object.keys(checkpoint.stageOutputs)
    .map(Number)
    .filter(Number.isInteger)
    .sort((a, b) => a - b);

  for (const stage of stages) {
    const content = checkpoint.stageOutputs[String(stage)];
    events.push(stage === 0
      ? { id: null, event: 'initial_content', data: { content } }
      : { id: null, event: 'episode_content', data: { episode: stage, content } });
  }

  switch (checkpoint.status) {
    case 'completed':
      events.push({ id: null, event: 'complete', data: {} });
      break;
    case 'failed':
      events.push({ id: null, event: 'error', data: { message: checkpoint.error ?? 'Generation failed' } });
      break;
    case 'cancelled':
      events.push({ id: null, event: 'cancelled', data: { message: CANCELLED_MESSAGE } });
      break;
    case 'paused':
      events.push({
        id: null,
        event: 'paused',
        data: { message: checkpoint.error ?? 'Task is paused', stage: checkpoint.currentStage }
      });
      break;
    case 'pending':
    case 'running':
      break;
  }

  return events;
}

/**
 * Serialize one event as an SSE frame.
 */
export function formatSseFrame(event: WireEvent): string {
  const idLine = event.id === null ? '' : `id: ${event.id}\n`;
  return `${idLine}event: ${event.event}\ndata: ${JSON.stringify(event.data)}\n\n`;
}
