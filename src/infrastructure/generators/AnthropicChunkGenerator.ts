import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsStreaming, RawMessageStreamEvent } from '@anthropic-ai/sdk/resources/messages';
import { StageRequest } from '../../types';
import { IChunkGenerator } from '../../domain/services/IChunkGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { GeneratorOptions } from './OpenAIChunkGenerator';
import { toGeneratorError } from './generatorErrors';

export type MessageStreamer = (
  params: MessageCreateParamsStreaming,
  options: { signal: AbortSignal }
) => Promise<AsyncIterable<RawMessageStreamEvent>>;

/**
 * Streams text deltas from the Anthropic Messages API.
 */
export class AnthropicChunkGenerator implements IChunkGenerator {
  readonly name = 'anthropic';
  private openStream: MessageStreamer;

  constructor(
    private options: GeneratorOptions,
    private logger: ILogger,
    openStream?: MessageStreamer
  ) {
    if (openStream) {
      this.openStream = openStream;
    } else {
      const client = new Anthropic({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0
      });
      this.openStream = (params, requestOptions) => client.messages.create(params, requestOptions);
    }
  }

  async *generate(request: StageRequest, signal: AbortSignal): AsyncIterable<string> {
    this.logger.debug(`Requesting ${request.kind} stage ${request.stage}`, {
      taskId: request.taskId,
      model: this.options.model,
      maxTokens: request.maxTokens
    });

    try {
      const stream = await this.openStream(
        {
          model: this.options.model,
          max_tokens: request.maxTokens,
          temperature: this.options.temperature,
          messages: [{ role: 'user', content: request.prompt }],
          stream: true
        },
        { signal }
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    } catch (err) {
      throw toGeneratorError(this.name, request.taskId, err, {
        status: err instanceof Anthropic.APIError ? err.status : undefined,
        aborted: err instanceof Anthropic.APIUserAbortError || signal.aborted,
        connection: err instanceof Anthropic.APIConnectionError
      });
    }
  }
}
