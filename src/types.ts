// Generation request types
export type Genre =
  | 'urban'
  | 'romance'
  | 'revenge'
  | 'fantasy'
  | 'historical'
  | 'suspense'
  | 'comedy'
  | 'family'
  | 'workplace'
  | 'sci-fi';

export type EpisodeDuration = '1' | '2' | '3' | '5' | '10';

export interface GenerationRequest {
  genre: Genre;
  duration: EpisodeDuration;
  episodes: number;
  characters: string[];  // "name,gender,age"
}

export interface CharacterProfile {
  name: string;
  gender: string;
  age: number;
}

// Task lifecycle
export type TaskStatus = 'pending' | 'running' | 'paused' | 'cancelled' | 'failed' | 'completed';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['cancelled', 'failed', 'completed'];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface Task {
  id: string;
  clientKey: string;
  request: GenerationRequest;
  status: TaskStatus;
  currentStage: number;  // last completed stage; -1 before the outline stage finishes
  totalStages: number;   // outline + one per episode
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

// Persisted snapshot of a task. The layout is read back after restarts, so
// fields are only ever added.
export interface Checkpoint {
  version: 1;
  taskId: string;
  clientKey: string;
  request: GenerationRequest;
  status: TaskStatus;
  currentStage: number;
  stageOutputs: Record<string, string>;  // stage index -> full stage text
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

// Output of one stage attempt. `complete` is false when the stream was cut
// short by cancellation.
export interface StageResult {
  stage: number;
  text: string;
  complete: boolean;
}

// Stage 0 is the cast/outline stage; stage e is episode e.
export type StageKind = 'outline' | 'episode';

export interface StageRequest {
  taskId: string;
  stage: number;
  kind: StageKind;
  prompt: string;
  maxTokens: number;
}

export interface TaskStatusView {
  taskId: string;
  clientKey: string;
  status: TaskStatus;
  currentStage: number;
  totalStages: number;
  episodesCompleted: number;
  totalEpisodes: number;
  progress: number;  // 0..1
  error: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface TranscriptView {
  taskId: string;
  status: TaskStatus;
  currentStage: number;
  episodesCompleted: number;
  totalEpisodes: number;
  transcript: string;
}

export interface CancelResult {
  taskId: string;
  cancelled: boolean;
  status: TaskStatus;
}
