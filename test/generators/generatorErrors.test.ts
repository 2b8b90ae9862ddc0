import { isRetryableStatus, toGeneratorError } from '../../src/infrastructure/generators/generatorErrors';
import { createChunkGenerator } from '../../src/infrastructure/generators/createChunkGenerator';
import {
  CancelledError,
  ConfigError,
  GenerationError,
  OutputValidationError,
  TransientGenerationError
} from '../../src/domain/common/Errors';
import { GeneratorConfig } from '../../src/infrastructure/config/Config';
import { createTestLogger } from '../helpers';

describe('isRetryableStatus', () => {
  it.each([408, 409, 429, 500, 503])('should retry %i', status => {
    expect(isRetryableStatus(status)).toBe(true);
  });

  it.each([400, 401, 403, 404, 422])('should not retry %i', status => {
    expect(isRetryableStatus(status)).toBe(false);
  });
});

describe('toGeneratorError', () => {
  const none = { aborted: false, connection: false };

  it('should treat an abort as cancellation', () => {
    const err = toGeneratorError('openai', 'task_1', new Error('Request was aborted.'), { ...none, aborted: true });
    expect(err).toBeInstanceOf(CancelledError);
  });

  it('should retry connection failures', () => {
    const err = toGeneratorError('openai', 'task_1', new Error('socket hang up'), { ...none, connection: true });

    expect(err).toBeInstanceOf(TransientGenerationError);
    expect(err.message).toBe('openai: socket hang up');
  });

  it('should retry rate limits', () => {
    const err = toGeneratorError('anthropic', 'task_1', new Error('rate_limit_error'), { ...none, status: 429 });

    expect(err).toBeInstanceOf(TransientGenerationError);
    expect(err.details).toEqual({ provider: 'anthropic', status: 429 });
  });

  it('should not retry a rejected request', () => {
    const err = toGeneratorError('openai', 'task_1', new Error('invalid model'), { ...none, status: 400 });

    expect(err).toBeInstanceOf(GenerationError);
    expect(err.message).toBe('openai: invalid model');
  });

  it('should pass application errors through', () => {
    const original = new OutputValidationError(1, 'Episode 1 is too short');
    expect(toGeneratorError('openai', 'task_1', original, none)).toBe(original);
  });
});

describe('createChunkGenerator', () => {
  const config: GeneratorConfig = {
    provider: 'openai',
    apiKey: 'test-key',
    model: 'test-model',
    timeoutMs: 1000,
    temperature: 0.7,
    outlineMaxTokens: 5000,
    episodeMaxTokens: 20000
  };

  it('should require an API key', () => {
    expect(() => createChunkGenerator({ ...config, apiKey: '' }, createTestLogger())).toThrow(ConfigError);
  });

  it('should build the configured provider', () => {
    expect(createChunkGenerator(config, createTestLogger()).name).toBe('openai');
    expect(createChunkGenerator({ ...config, provider: 'anthropic' }, createTestLogger()).name).toBe('anthropic');
  });
});
