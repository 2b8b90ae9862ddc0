import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { generationRequestSchema } from '../domain/common/schemas';

// --- Reusable patterns ---

// Safe ID: alphanumeric, hyphens, underscores
const safeId = z.string().regex(/^[a-zA-Z0-9_-]+$/, 'ID must be alphanumeric with hyphens/underscores only');

const clientKey = safeId.max(128);

// --- Param schemas ---

export const idParamSchema = z.object({
  id: safeId,
});

export const clientKeyParamSchema = z.object({
  clientKey,
});

// --- Generation schemas ---

export const generateScriptSchema = generationRequestSchema.extend({
  client_key: clientKey.optional(),
});

export type GenerateScriptBody = z.infer<typeof generateScriptSchema>;

export const eventsQuerySchema = z.object({
  from: z.string().regex(/^\d{1,15}$/, 'from must be a non-negative integer of at most 15 digits').optional(),
});

// --- Middleware factories ---

function issues(error: z.ZodError) {
  return error.issues.map(i => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

/**
 * Validate request body against a Zod schema.
 */
export function validateBody(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: issues(result.error),
      });
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validate request params against a Zod schema.
 */
export function validateParams(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid URL parameters',
        details: issues(result.error),
      });
    }
    next();
  };
}

/**
 * Validate request query against a Zod schema.
 */
export function validateQuery(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid query parameters',
        details: issues(result.error),
      });
    }
    next();
  };
}
