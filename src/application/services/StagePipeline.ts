import { GenerationRequest, StageRequest, StageResult } from '../../types';
import { IChunkGenerator } from '../../domain/services/IChunkGenerator';
import { ITaskEventBus } from '../../domain/events/ITaskEventBus';
import { TaskEventPayload } from '../../domain/events/TaskEvents';
import { ILogger } from '../../domain/common/ILogger';
import {
  CancelledError,
  OutputValidationError,
  TransientGenerationError,
  toErrorMessage
} from '../../domain/common/Errors';
import { StagePromptBuilder } from './StagePromptBuilder';

export interface PipelineOptions {
  maxStageAttempts: number;
  retryDelayMs: number;
  minEpisodeChars: number;
}

/**
 * What the task manager hands the pipeline for one run. The pipeline never
 * writes task status itself.
 */
export interface StageRunContext {
  taskId: string;
  request: GenerationRequest;
  /** Last completed stage; the run starts at the one after it. */
  currentStage: number;
  stageOutputs: Readonly<Record<string, string>>;
  signal: AbortSignal;
  logger: ILogger;
  /** Record a validated stage durably. Resolves once the checkpoint is written. */
  commitStage(stage: number, text: string): Promise<void>;
  /** True once a pause was requested; checked between stages. */
  pauseRequested(): boolean;
}

export type PipelineOutcome =
  | { kind: 'completed' }
  | { kind: 'paused'; stage: number }
  | { kind: 'cancelled' }
  | { kind: 'failed'; stage: number; reason: string };

type StageOutcome =
  | { kind: 'done'; text: string }
  | { kind: 'cancelled' }
  | { kind: 'failed'; reason: string };

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('Cancelled'));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      reject(new Error('Cancelled'));
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Drives a task's remaining stages: the outline (stage 0), then one stage
 * per episode. Every chunk goes to the event bus as it arrives; a stage's
 * text is checkpointed only once it is complete and valid.
 */
export class StagePipeline {
  constructor(
    private generator: IChunkGenerator,
    private prompts: StagePromptBuilder,
    private eventBus: ITaskEventBus,
    private options: PipelineOptions
  ) {}

  async run(ctx: StageRunContext): Promise<PipelineOutcome> {
    const totalStages = ctx.request.episodes + 1;
    const outputs: Record<string, string> = { ...ctx.stageOutputs };

    for (let stage = ctx.currentStage + 1; stage < totalStages; stage++) {
      if (ctx.signal.aborted) return { kind: 'cancelled' };
      if (ctx.pauseRequested()) return { kind: 'paused', stage: stage - 1 };

      if (stage === 0) {
        this.publish(ctx, { type: 'task:status', data: { message: 'Generating cast and outline...' } });
      } else {
        this.publish(ctx, { type: 'task:status', data: { message: `Generating episode ${stage}...` } });
        this.publish(ctx, { type: 'task:progress', data: { current: stage, total: ctx.request.episodes } });
      }

      const request = this.prompts.build(ctx.taskId, stage, ctx.request, outputs);
      const outcome = await this.runStage(ctx, request);

      if (outcome.kind === 'cancelled') return outcome;
      if (outcome.kind === 'failed') return { kind: 'failed', stage, reason: outcome.reason };

      outputs[String(stage)] = outcome.text;
    }

    if (ctx.signal.aborted) return { kind: 'cancelled' };
    return { kind: 'completed' };
  }

  /**
   * Publish unless the run was aborted. Nothing is awaited between the check
   * and the publish, so no event follows the manager's cancellation event.
   */
  private publish(ctx: StageRunContext, payload: TaskEventPayload): boolean {
    if (ctx.signal.aborted) return false;
    this.eventBus.publish(ctx.taskId, payload);
    return true;
  }

  private async runStage(ctx: StageRunContext, request: StageRequest): Promise<StageOutcome> {
    const { stage } = request;
    const maxAttempts = this.options.maxStageAttempts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (!this.publish(ctx, { type: 'stage:started', data: { stage, attempt } })) {
        return { kind: 'cancelled' };
      }
      ctx.logger.info(`Stage ${stage} started (attempt ${attempt}/${maxAttempts})`);

      try {
        const result = await this.collect(ctx, request, attempt);
        if (!result.complete) return { kind: 'cancelled' };

        const { text } = result;
        this.validate(request, text);
        await ctx.commitStage(stage, text);

        if (!this.publish(ctx, { type: 'stage:chunk', data: { stage, attempt, text: '', isFinal: true } })) {
          return { kind: 'cancelled' };
        }
        this.publish(ctx, { type: 'stage:completed', data: { stage, fullText: text } });
        ctx.logger.info(`Stage ${stage} completed`, { chars: text.length });
        return { kind: 'done', text };
      } catch (err) {
        if (ctx.signal.aborted || err instanceof CancelledError) {
          return { kind: 'cancelled' };
        }

        const reason = toErrorMessage(err);
        if (!(err instanceof TransientGenerationError) || attempt === maxAttempts) {
          ctx.logger.error(`Stage ${stage} failed`, err instanceof Error ? err : undefined, { attempt });
          return { kind: 'failed', reason };
        }

        ctx.logger.warn(`Stage ${stage} attempt ${attempt} failed, retrying`, { reason });
        this.publish(ctx, {
          type: 'stage:retrying',
          data: { stage, attempt, maxAttempts, reason }
        });

        try {
          await wait(this.options.retryDelayMs, ctx.signal);
        } catch {
          return { kind: 'cancelled' };
        }
      }
    }

    // maxStageAttempts is at least 1, so the loop always returns
    return { kind: 'failed', reason: `Stage ${stage} exhausted its attempts` };
  }

  /**
   * Stream one attempt, publishing each chunk as it arrives. Chunks carry
   * their attempt so a client can drop text from an attempt that was retried.
   */
  private async collect(ctx: StageRunContext, request: StageRequest, attempt: number): Promise<StageResult> {
    const { stage } = request;
    let buffer = '';
    for await (const text of this.generator.generate(request, ctx.signal)) {
      if (ctx.signal.aborted) return { stage, text: buffer, complete: false };
      if (!text) continue;
      this.publish(ctx, { type: 'stage:chunk', data: { stage, attempt, text, isFinal: false } });
      buffer += text;
    }
    return { stage, text: buffer, complete: !ctx.signal.aborted };
  }

  /**
   * @throws {OutputValidationError} on empty or truncated stage text
   */
  private validate(request: StageRequest, text: string): void {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      throw new OutputValidationError(request.stage, `Stage ${request.stage} produced no text`);
    }
    if (request.kind === 'episode' && trimmed.length < this.options.minEpisodeChars) {
      throw new OutputValidationError(
        request.stage,
        `Episode ${request.stage} is too short (${trimmed.length} < ${this.options.minEpisodeChars} characters)`
      );
    }
  }
}
