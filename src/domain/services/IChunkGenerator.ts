import { StageRequest } from '../../types';

/**
 * Streaming text generator for one stage.
 *
 * Implementations yield text fragments in order and stop when `signal`
 * aborts. Failures are reported as:
 * - `TransientGenerationError` for rate limits, 5xx responses and dropped
 *   connections (the caller may retry the stage)
 * - `GenerationError` for anything a retry will not fix
 * - `CancelledError` when the abort signal fired mid-stream
 */
export interface IChunkGenerator {
  readonly name: string;
  generate(request: StageRequest, signal: AbortSignal): AsyncIterable<string>;
}
