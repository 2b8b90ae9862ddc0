import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { GenerationRequest, StageRequest } from '../src/types';
import { IChunkGenerator } from '../src/domain/services/IChunkGenerator';
import { ILogger } from '../src/domain/common/ILogger';
import { CancelledError } from '../src/domain/common/Errors';
import { AnyTaskEvent } from '../src/domain/events/TaskEvents';
import { TaskSubscription } from '../src/domain/events/ITaskEventBus';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Use a unique test directory for each test
    this.testDir = path.join(os.tmpdir(), `scriptstream-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 10
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for condition after ${timeout}ms`);
}

/**
 * Logger whose methods are jest mocks.
 */
export function createTestLogger(): jest.Mocked<ILogger> {
  const logger: jest.Mocked<ILogger> = {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/**
 * Create a valid generation request
 */
export function createTestRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    genre: 'romance',
    duration: '2',
    episodes: 3,
    characters: ['Lin,female,24', 'Chen,male,27', 'Mei,female,52', 'Zhou,male,30'],
    ...overrides
  };
}

/**
 * Drain a subscription into an array.
 */
export async function collect(subscription: TaskSubscription): Promise<AnyTaskEvent[]> {
  const events: AnyTaskEvent[] = [];
  for await (const event of subscription) {
    events.push(event);
  }
  return events;
}

export interface Hold {
  /** Resolves once the generator is parked after its first chunk. */
  reached: Promise<void>;
  release(): void;
}

function split(text: string, parts: number): string[] {
  const size = Math.ceil(text.length / parts);
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

/**
 * Deterministic generator. Each stage streams its text in three chunks
 * unless told otherwise.
 */
export class ScriptedChunkGenerator implements IChunkGenerator {
  readonly name = 'scripted';
  readonly requests: StageRequest[] = [];
  private chunks = new Map<number, string[]>();
  private failures = new Map<number, Error[]>();
  private midStreamFailures = new Map<number, Error>();
  private holds = new Map<number, { reached: () => void; released: Promise<void> }>();

  static textFor(stage: number): string {
    return stage === 0
      ? 'Title: Night Market Hearts\n| Name | Role |\n| Lin | Lead |'
      : `Episode ${stage}: Lin faces the rival stall owner at dawn.`;
  }

  static chunksFor(stage: number): string[] {
    return split(ScriptedChunkGenerator.textFor(stage), 3);
  }

  setChunks(stage: number, chunks: string[]): this {
    this.chunks.set(stage, chunks);
    return this;
  }

  /**
   * Make the next calls for the stage throw, one error per call.
   */
  failNext(stage: number, ...errors: Error[]): this {
    this.failures.set(stage, [...(this.failures.get(stage) ?? []), ...errors]);
    return this;
  }

  /**
   * Make the next call for the stage throw right after its first chunk.
   */
  failAfterFirstChunk(stage: number, error: Error): this {
    this.midStreamFailures.set(stage, error);
    return this;
  }

  /**
   * Park the next call for the stage after its first chunk until released
   * or aborted.
   */
  holdAfterFirstChunk(stage: number): Hold {
    let reached: () => void = () => undefined;
    let release: () => void = () => undefined;
    const reachedPromise = new Promise<void>(resolve => { reached = resolve; });
    const released = new Promise<void>(resolve => { release = resolve; });
    this.holds.set(stage, { reached, released });
    return { reached: reachedPromise, release };
  }

  callsFor(stage: number): number {
    return this.requests.filter(r => r.stage === stage).length;
  }

  async *generate(request: StageRequest, signal: AbortSignal): AsyncIterable<string> {
    this.requests.push(request);

    const failure = this.failures.get(request.stage)?.shift();
    if (failure) {
      throw failure;
    }

    const chunks = this.chunks.get(request.stage) ?? ScriptedChunkGenerator.chunksFor(request.stage);
    for (let i = 0; i < chunks.length; i++) {
      if (signal.aborted) throw new CancelledError(request.taskId);
      yield chunks[i];

      const midStream = i === 0 ? this.midStreamFailures.get(request.stage) : undefined;
      if (midStream) {
        this.midStreamFailures.delete(request.stage);
        throw midStream;
      }

      const hold = i === 0 ? this.holds.get(request.stage) : undefined;
      if (hold) {
        this.holds.delete(request.stage);
        hold.reached();
        await untilReleasedOrAborted(hold.released, signal);
        if (signal.aborted) throw new CancelledError(request.taskId);
      }
    }
  }
}

function untilReleasedOrAborted(released: Promise<void>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise(resolve => {
    const onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    void released.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}
