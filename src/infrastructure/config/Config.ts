import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';

export type StorageType = 'filesystem' | 'memory';
export type GeneratorProvider = 'openai' | 'anthropic';

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials?: boolean;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  format: 'text' | 'json';
}

/**
 * LLM backend used for every stage.
 */
export interface GeneratorConfig {
  provider: GeneratorProvider;
  apiKey: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  outlineMaxTokens: number;
  episodeMaxTokens: number;
}

/**
 * Stage execution policy.
 */
export interface PipelineConfig {
  maxStageAttempts: number;
  retryDelayMs: number;
  minEpisodeChars: number;
}

export interface EventsConfig {
  retentionMs: number;
}

export interface StreamConfig {
  heartbeatMs: number;
}

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;

  // Storage
  dataDir: string;
  storageType: StorageType;

  // Generation
  generator: GeneratorConfig;
  pipeline: PipelineConfig;
  events: EventsConfig;
  stream: StreamConfig;

  cors: CorsConfig;
  log: LogConfig;

  // Environment
  nodeEnv: 'development' | 'production' | 'test';
}

const DEFAULT_MODELS: Record<GeneratorProvider, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-7-sonnet-latest'
};

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find(a => a === raw);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of ${allowed.map(a => `"${a}"`).join(', ')}`);
  }
  return match;
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor() {
    this.config = this.loadFromEnvironment();
    this.validate();
  }

  private loadFromEnvironment(): ConfigOptions {
    const provider = oneOf<GeneratorProvider>('GENERATOR_PROVIDER', ['openai', 'anthropic'], 'openai');

    return {
      // Server
      port: intFromEnv('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',

      // Storage
      dataDir: expandPath(process.env.DATA_DIR || '~/.scriptstream/data'),
      storageType: oneOf<StorageType>('STORAGE_TYPE', ['filesystem', 'memory'], 'filesystem'),

      // Generation
      generator: {
        provider,
        apiKey: process.env.LLM_API_KEY || '',
        baseUrl: process.env.LLM_BASE_URL || undefined,
        model: process.env.LLM_MODEL || DEFAULT_MODELS[provider],
        timeoutMs: intFromEnv('LLM_TIMEOUT_MS', 600000),
        temperature: floatFromEnv('LLM_TEMPERATURE', 0.7),
        outlineMaxTokens: intFromEnv('OUTLINE_MAX_TOKENS', 5000),
        episodeMaxTokens: intFromEnv('EPISODE_MAX_TOKENS', 20000)
      },
      pipeline: {
        maxStageAttempts: intFromEnv('STAGE_MAX_ATTEMPTS', 3),
        retryDelayMs: intFromEnv('STAGE_RETRY_DELAY_MS', 2000),
        minEpisodeChars: intFromEnv('MIN_EPISODE_CHARS', 20)
      },
      events: {
        retentionMs: intFromEnv('EVENT_RETENTION_MS', 600000)
      },
      stream: {
        heartbeatMs: intFromEnv('STREAM_HEARTBEAT_MS', 15000)
      },

      // CORS
      cors: {
        enabled: process.env.CORS_ENABLED !== 'false',
        origins: process.env.CORS_ORIGINS?.split(',').map(s => s.trim()) || ['*'],
        credentials: process.env.CORS_CREDENTIALS === 'true'
      },

      log: {
        level: oneOf<LogConfig['level']>('LOG_LEVEL', ['error', 'warn', 'info', 'debug'], 'info'),
        format: oneOf<LogConfig['format']>('LOG_FORMAT', ['text', 'json'], 'text')
      },

      // Environment
      nodeEnv: oneOf<ConfigOptions['nodeEnv']>('NODE_ENV', ['development', 'production', 'test'], 'development')
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (this.config.port < 0 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 0 and 65535');
    }

    const { generator, pipeline, events, stream } = this.config;

    if (generator.temperature < 0 || generator.temperature > 2) {
      throw new ConfigError('LLM_TEMPERATURE must be between 0 and 2');
    }
    if (generator.outlineMaxTokens < 1 || generator.episodeMaxTokens < 1) {
      throw new ConfigError('OUTLINE_MAX_TOKENS and EPISODE_MAX_TOKENS must be positive');
    }
    if (generator.timeoutMs < 1) {
      throw new ConfigError('LLM_TIMEOUT_MS must be positive');
    }
    if (pipeline.maxStageAttempts < 1) {
      throw new ConfigError('STAGE_MAX_ATTEMPTS must be at least 1');
    }
    if (pipeline.retryDelayMs < 0 || pipeline.minEpisodeChars < 0) {
      throw new ConfigError('STAGE_RETRY_DELAY_MS and MIN_EPISODE_CHARS must not be negative');
    }
    if (events.retentionMs < 0) {
      throw new ConfigError('EVENT_RETENTION_MS must not be negative');
    }
    if (stream.heartbeatMs < 1) {
      throw new ConfigError('STREAM_HEARTBEAT_MS must be positive');
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get dataDir(): string { return this.config.dataDir; }
  get storageType(): StorageType { return this.config.storageType; }
  get generator(): GeneratorConfig { return this.config.generator; }
  get pipeline(): PipelineConfig { return this.config.pipeline; }
  get events(): EventsConfig { return this.config.events; }
  get stream(): StreamConfig { return this.config.stream; }
  get cors(): CorsConfig { return this.config.cors; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  /**
   * Create a Config instance from an object (useful for testing).
   */
  static fromObject(overrides: Partial<ConfigOptions>): Config {
    const config = new Config();
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }

  /**
   * Get a summary string for logging. The API key is never included.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  dataDir: ${this.dataDir}`,
      `  storageType: ${this.storageType}`,
      `  generator: ${this.generator.provider} (${this.generator.model})`,
      `  pipeline.maxStageAttempts: ${this.pipeline.maxStageAttempts}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
