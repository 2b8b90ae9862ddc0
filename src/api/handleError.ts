import { Response } from 'express';
import { AppError, toErrorMessage } from '../domain/common/Errors';

/**
 * Send an error as JSON. Errors that already streamed headers are only
 * ended.
 */
export function handleError(err: unknown, res: Response): void {
  if (res.headersSent) {
    if (!res.writableEnded) res.end();
    return;
  }
  if (err instanceof AppError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }
  res.status(500).json({
    error: true,
    message: toErrorMessage(err),
    code: 'INTERNAL_ERROR'
  });
}
