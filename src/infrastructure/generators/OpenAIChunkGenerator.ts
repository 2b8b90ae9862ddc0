import OpenAI from 'openai';
import type { ChatCompletionChunk, ChatCompletionCreateParamsStreaming } from 'openai/resources/chat/completions';
import { StageRequest } from '../../types';
import { IChunkGenerator } from '../../domain/services/IChunkGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { toGeneratorError } from './generatorErrors';

export interface GeneratorOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

/**
 * Opens one streaming chat completion.
 */
export type ChatCompletionStreamer = (
  params: ChatCompletionCreateParamsStreaming,
  options: { signal: AbortSignal }
) => Promise<AsyncIterable<ChatCompletionChunk>>;

/**
 * Streams chat completions from an OpenAI-compatible endpoint.
 */
export class OpenAIChunkGenerator implements IChunkGenerator {
  readonly name = 'openai';
  private openStream: ChatCompletionStreamer;

  constructor(
    private options: GeneratorOptions,
    private logger: ILogger,
    openStream?: ChatCompletionStreamer
  ) {
    if (openStream) {
      this.openStream = openStream;
    } else {
      const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0
      });
      this.openStream = (params, requestOptions) => client.chat.completions.create(params, requestOptions);
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
          messages: [{ role: 'user', content: request.prompt }],
          max_tokens: request.maxTokens,
          temperature: this.options.temperature,
          stream: true
        },
        { signal }
      );

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) {
          yield text;
        }
      }
    } catch (err) {
      throw toGeneratorError(this.name, request.taskId, err, {
        status: err instanceof OpenAI.APIError ? err.status : undefined,
        aborted: err instanceof OpenAI.APIUserAbortError || signal.aborted,
        connection: err instanceof OpenAI.APIConnectionError
      });
    }
  }
}
