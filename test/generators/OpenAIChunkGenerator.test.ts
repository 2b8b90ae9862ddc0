import OpenAI from 'openai';
import type { ChatCompletionChunk, ChatCompletionCreateParamsStreaming } from 'openai/resources/chat/completions';
import { OpenAIChunkGenerator } from '../../src/infrastructure/generators/OpenAIChunkGenerator';
import { CancelledError, GenerationError, TransientGenerationError } from '../../src/domain/common/Errors';
import { StageRequest } from '../../src/types';
import { createTestLogger } from '../helpers';

const options = { apiKey: 'test-secret', model: 'gpt-4o', temperature: 0.7, timeoutMs: 1000 };

const request: StageRequest = {
  taskId: 'task_1',
  stage: 1,
  kind: 'episode',
  prompt: 'Write episode 1',
  maxTokens: 20000
};

function chunk(content: string | null, choices = true): ChatCompletionChunk {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'gpt-4o',
    choices: choices ? [{ index: 0, delta: { content }, finish_reason: null }] : []
  };
}

function streamOf(chunks: ChatCompletionChunk[], failure?: Error): Promise<AsyncIterable<ChatCompletionChunk>> {
  async function* iterate() {
    for (const item of chunks) {
      yield item;
    }
    if (failure) throw failure;
  }
  return Promise.resolve(iterate());
}

async function drain(iterable: AsyncIterable<string>): Promise<string[]> {
  const texts: string[] = [];
  for await (const text of iterable) {
    texts.push(text);
  }
  return texts;
}

describe('OpenAIChunkGenerator', () => {
  it('should yield each non-empty delta in order', async () => {
    const openStream = jest.fn((_params: ChatCompletionCreateParamsStreaming, _options: { signal: AbortSignal }) =>
      streamOf([chunk('Lin '), chunk(''), chunk(null), chunk('', false), chunk('opens her stall.')])
    );
    const generator = new OpenAIChunkGenerator(options, createTestLogger(), openStream);
    const signal = new AbortController().signal;

    expect(await drain(generator.generate(request, signal))).toEqual(['Lin ', 'opens her stall.']);
    expect(openStream).toHaveBeenCalledWith(
      {
        model: 'gpt-4o',
        messages: [{ role: 'user', content: 'Write episode 1' }],
        max_tokens: 20000,
        temperature: 0.7,
        stream: true
      },
      { signal }
    );
  });

  it('should map a rate limit to a transient error', async () => {
    const generator = new OpenAIChunkGenerator(options, createTestLogger(), () =>
      Promise.reject(new OpenAI.APIError(429, undefined, 'Rate limit reached', undefined))
    );

    const err = await drain(generator.generate(request, new AbortController().signal)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientGenerationError);
    expect(err).toMatchObject({ details: { provider: 'openai', status: 429 } });
  });

  it('should map a server error raised mid-stream to a transient error', async () => {
    const generator = new OpenAIChunkGenerator(options, createTestLogger(), () =>
      streamOf([chunk('Lin ')], new OpenAI.APIError(502, undefined, 'Bad gateway', undefined))
    );

    await expect(drain(generator.generate(request, new AbortController().signal)))
      .rejects.toBeInstanceOf(TransientGenerationError);
  });

  it('should map a bad request to a permanent error', async () => {
    const generator = new OpenAIChunkGenerator(options, createTestLogger(), () =>
      Promise.reject(new OpenAI.APIError(400, undefined, 'Invalid max_tokens', undefined))
    );

    const err = await drain(generator.generate(request, new AbortController().signal)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err).not.toBeInstanceOf(TransientGenerationError);
  });

  it('should treat a dropped connection as transient', async () => {
    const generator = new OpenAIChunkGenerator(options, createTestLogger(), () =>
      Promise.reject(new OpenAI.APIConnectionError({ message: 'Connection error.' }))
    );

    await expect(drain(generator.generate(request, new AbortController().signal)))
      .rejects.toBeInstanceOf(TransientGenerationError);
  });

  it('should report an aborted request as cancellation', async () => {
    const controller = new AbortController();
    const generator = new OpenAIChunkGenerator(options, createTestLogger(), () => {
      controller.abort();
      return streamOf([], new OpenAI.APIUserAbortError());
    });

    await expect(drain(generator.generate(request, controller.signal))).rejects.toBeInstanceOf(CancelledError);
  });
});
