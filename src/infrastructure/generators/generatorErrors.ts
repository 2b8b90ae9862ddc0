import {
  AppError,
  CancelledError,
  GenerationError,
  TransientGenerationError,
  toErrorMessage
} from '../../domain/common/Errors';

/**
 * What a provider SDK tells us about a failed call.
 */
export interface ProviderFailure {
  status?: number;
  aborted: boolean;
  connection: boolean;
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

/**
 * Map a provider failure onto the generator error contract.
 */
export function toGeneratorError(
  provider: string,
  taskId: string,
  err: unknown,
  failure: ProviderFailure
): AppError {
  if (err instanceof AppError) return err;
  if (failure.aborted) return new CancelledError(taskId);

  const message = `${provider}: ${toErrorMessage(err)}`;
  if (failure.connection) {
    return new TransientGenerationError(message, { provider });
  }
  if (failure.status !== undefined && isRetryableStatus(failure.status)) {
    return new TransientGenerationError(message, { provider, status: failure.status });
  }
  return new GenerationError(message, { provider, status: failure.status });
}
