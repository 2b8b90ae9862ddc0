import { z } from 'zod';
import { CharacterProfile, Checkpoint, EpisodeDuration, GenerationRequest, Genre, TaskStatus } from '../../types';
import { ValidationError } from './Errors';

export const GENRES = [
  'urban', 'romance', 'revenge', 'fantasy', 'historical',
  'suspense', 'comedy', 'family', 'workplace', 'sci-fi'
] as const satisfies readonly Genre[];

export const EPISODE_DURATIONS = ['1', '2', '3', '5', '10'] as const satisfies readonly EpisodeDuration[];

export const MIN_CHARACTERS = 4;
export const MAX_EPISODES = 100;

const TASK_STATUSES = [
  'pending', 'running', 'paused', 'cancelled', 'failed', 'completed'
] as const satisfies readonly TaskStatus[];

// "name,gender,age" with a non-negative integer age
const CHARACTER_PATTERN = /^([^,]+),([^,]+),(\d+)$/;

export const characterSchema = z.string()
  .max(200)
  .refine(s => CHARACTER_PATTERN.test(s.trim()), 'Character must be "name,gender,age" with an integer age');

export const generationRequestSchema = z.object({
  genre: z.enum(GENRES),
  duration: z.enum(EPISODE_DURATIONS),
  episodes: z.number().int().min(1).max(MAX_EPISODES),
  characters: z.array(characterSchema)
    .min(MIN_CHARACTERS, `At least ${MIN_CHARACTERS} characters are required`)
    .max(50)
});

export const checkpointSchema = z.object({
  version: z.literal(1),
  taskId: z.string().min(1),
  clientKey: z.string().min(1),
  request: generationRequestSchema,
  status: z.enum(TASK_STATUSES),
  currentStage: z.number().int().min(-1),
  stageOutputs: z.record(z.string()),
  error: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number()
});

/**
 * @throws {ValidationError} listing every failed field
 */
export function parseGenerationRequest(input: unknown): GenerationRequest {
  const result = generationRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid generation request', result.error.issues.map(i => ({
      path: i.path.join('.'),
      message: i.message
    })));
  }
  return {
    ...result.data,
    characters: result.data.characters.map(c => c.trim())
  };
}

/**
 * Parse a stored checkpoint record. Throws a ZodError on malformed input.
 */
export function parseCheckpoint(input: unknown): Checkpoint {
  return checkpointSchema.parse(input);
}

export function parseCharacter(entry: string): CharacterProfile {
  const match = CHARACTER_PATTERN.exec(entry.trim());
  if (!match) {
    throw new ValidationError(`Invalid character entry: ${entry}`);
  }
  return { name: match[1].trim(), gender: match[2].trim(), age: parseInt(match[3], 10) };
}
