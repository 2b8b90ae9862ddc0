import * as os from 'os';
import * as path from 'path';
import { Config } from '../../src/infrastructure/config/Config';
import { ConfigError } from '../../src/domain/common/Errors';

const VARS = [
  'PORT',
  'DATA_DIR',
  'STORAGE_TYPE',
  'GENERATOR_PROVIDER',
  'LLM_API_KEY',
  'LLM_MODEL',
  'LLM_TEMPERATURE',
  'STAGE_MAX_ATTEMPTS',
  'STAGE_RETRY_DELAY_MS',
  'LOG_LEVEL',
  'LOG_FORMAT'
];

describe('Config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it('should apply defaults', () => {
    const config = new Config();

    expect(config.port).toBe(3000);
    expect(config.dataDir).toBe(path.join(os.homedir(), '.scriptstream/data'));
    expect(config.storageType).toBe('filesystem');
    expect(config.generator).toMatchObject({
      provider: 'openai',
      model: 'gpt-4o',
      temperature: 0.7,
      outlineMaxTokens: 5000,
      episodeMaxTokens: 20000
    });
    expect(config.pipeline).toEqual({ maxStageAttempts: 3, retryDelayMs: 2000, minEpisodeChars: 20 });
    expect(config.stream.heartbeatMs).toBe(15000);
    expect(config.log).toEqual({ level: 'info', format: 'text' });
  });

  it('should read the environment', () => {
    process.env.PORT = '8080';
    process.env.GENERATOR_PROVIDER = 'anthropic';
    process.env.STAGE_MAX_ATTEMPTS = '5';
    process.env.LOG_LEVEL = 'debug';
    process.env.LOG_FORMAT = 'json';

    const config = new Config();

    expect(config.port).toBe(8080);
    expect(config.generator.provider).toBe('anthropic');
    expect(config.generator.model).toBe('claude-3-7-sonnet-latest');
    expect(config.pipeline.maxStageAttempts).toBe(5);
    expect(config.log).toEqual({ level: 'debug', format: 'json' });
  });

  it('should reject a non-numeric port', () => {
    process.env.PORT = 'eighty';
    expect(() => new Config()).toThrow(new ConfigError('PORT must be an integer, got "eighty"'));
  });

  it('should reject an unknown provider', () => {
    process.env.GENERATOR_PROVIDER = 'local';
    expect(() => new Config()).toThrow('GENERATOR_PROVIDER must be one of "openai", "anthropic"');
  });

  it('should reject an out-of-range temperature', () => {
    process.env.LLM_TEMPERATURE = '3';
    expect(() => new Config()).toThrow(ConfigError);
  });

  it('should validate overrides from fromObject', () => {
    expect(() => Config.fromObject({
      pipeline: { maxStageAttempts: 0, retryDelayMs: 0, minEpisodeChars: 0 }
    })).toThrow('STAGE_MAX_ATTEMPTS must be at least 1');
  });

  it('should keep the API key out of its summary', () => {
    process.env.LLM_API_KEY = 'test-secret';
    expect(new Config().toString()).not.toContain('test-secret');
  });
});
