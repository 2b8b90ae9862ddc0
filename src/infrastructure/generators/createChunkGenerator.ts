import { IChunkGenerator } from '../../domain/services/IChunkGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { ConfigError } from '../../domain/common/Errors';
import { GeneratorConfig } from '../config/Config';
import { OpenAIChunkGenerator } from './OpenAIChunkGenerator';
import { AnthropicChunkGenerator } from './AnthropicChunkGenerator';

/**
 * Build the configured generator backend.
 * @throws {ConfigError} if no API key is configured
 */
export function createChunkGenerator(config: GeneratorConfig, logger: ILogger): IChunkGenerator {
  if (!config.apiKey) {
    throw new ConfigError('LLM_API_KEY is required to generate scripts');
  }

  const options = {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs
  };

  switch (config.provider) {
    case 'openai':
      return new OpenAIChunkGenerator(options, logger.child({ generator: 'openai' }));
    case 'anthropic':
      return new AnthropicChunkGenerator(options, logger.child({ generator: 'anthropic' }));
  }
}
