/**
 * Type-safe task event definitions.
 * Every event published for a task carries a per-task sequence number,
 * starting at 0 and increasing by one with no gaps.
 */

/**
 * Maps event name strings to their payload types.
 */
export interface TypedEventMap {
  'task:created': { taskId: string };
  'task:status': { message: string };
  'task:progress': { current: number; total: number };
  'stage:started': { stage: number; attempt: number };
  'stage:chunk': { stage: number; attempt: number; text: string; isFinal: boolean };
  'stage:completed': { stage: number; fullText: string };
  'stage:retrying': { stage: number; attempt: number; maxAttempts: number; reason: string };
  'task:paused': { stage: number; reason: string };
  'task:cancelled': Record<string, never>;
  'task:failed': { reason: string };
  'task:completed': Record<string, never>;
}

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

/**
 * Event type plus payload, discriminated on `type`.
 */
export type TaskEventPayload = { [K in EventName]: { type: K; data: TypedEventMap[K] } }[EventName];

export interface TaskEventEnvelope {
  taskId: string;
  sequence: number;
  timestamp: number;
}

/**
 * A published event.
 */
export type AnyTaskEvent = TaskEventEnvelope & TaskEventPayload;

export const TERMINAL_EVENTS: readonly EventName[] = ['task:cancelled', 'task:failed', 'task:completed'];

export function isTerminalEvent(event: AnyTaskEvent): boolean {
  return TERMINAL_EVENTS.includes(event.type);
}

/**
 * Terminal events plus `task:paused`: a live stream has nothing more to
 * deliver until the task is resumed.
 */
export function endsStream(event: AnyTaskEvent): boolean {
  return isTerminalEvent(event) || event.type === 'task:paused';
}
