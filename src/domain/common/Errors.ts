/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Operation not allowed for the task's current status (409).
 */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, 'INVALID_STATE', message, details);
  }
}

/**
 * Recoverable generator failure (503). The pipeline restarts the stage.
 */
export class TransientGenerationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(503, 'TRANSIENT_GENERATION_ERROR', message, details);
  }
}

/**
 * Generator failure that a retry will not fix (502).
 */
export class GenerationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(502, 'GENERATION_ERROR', message, details);
  }
}

/**
 * Stage output was empty or malformed (422). Never retried.
 */
export class OutputValidationError extends AppError {
  constructor(stage: number, message: string) {
    super(422, 'OUTPUT_VALIDATION_ERROR', message, { stage });
  }
}

/**
 * Raised inside the pipeline when a task is cancelled or interrupted.
 * Reported through the `task:cancelled` event, never as an error.
 */
export class CancelledError extends AppError {
  constructor(taskId: string) {
    super(499, 'CANCELLED', `Task '${taskId}' was cancelled`);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
