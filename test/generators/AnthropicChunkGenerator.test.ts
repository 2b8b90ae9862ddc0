import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsStreaming, RawMessageStreamEvent } from '@anthropic-ai/sdk/resources/messages';
import { AnthropicChunkGenerator } from '../../src/infrastructure/generators/AnthropicChunkGenerator';
import { CancelledError, GenerationError, TransientGenerationError } from '../../src/domain/common/Errors';
import { StageRequest } from '../../src/types';
import { createTestLogger } from '../helpers';

const options = { apiKey: 'test-secret', model: 'claude-3-7-sonnet-latest', temperature: 0.7, timeoutMs: 1000 };

const request: StageRequest = {
  taskId: 'task_1',
  stage: 0,
  kind: 'outline',
  prompt: 'Write the outline',
  maxTokens: 5000
};

function textDelta(text: string): RawMessageStreamEvent {
  return { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } };
}

function streamOf(events: RawMessageStreamEvent[], failure?: Error): Promise<AsyncIterable<RawMessageStreamEvent>> {
  async function* iterate() {
    for (const event of events) {
      yield event;
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

describe('AnthropicChunkGenerator', () => {
  it('should yield only text deltas', async () => {
    const openStream = jest.fn((_params: MessageCreateParamsStreaming, _options: { signal: AbortSignal }) =>
      streamOf([
        textDelta('Title: '),
        { type: 'content_block_delta', index: 0, delta: { type: 'input_json_delta', partial_json: '{"cast"' } },
        textDelta('Night Market Hearts'),
        { type: 'content_block_stop', index: 0 },
        { type: 'message_stop' }
      ])
    );
    const generator = new AnthropicChunkGenerator(options, createTestLogger(), openStream);
    const signal = new AbortController().signal;

    expect(await drain(generator.generate(request, signal))).toEqual(['Title: ', 'Night Market Hearts']);
    expect(openStream).toHaveBeenCalledWith(
      {
        model: 'claude-3-7-sonnet-latest',
        max_tokens: 5000,
        temperature: 0.7,
        messages: [{ role: 'user', content: 'Write the outline' }],
        stream: true
      },
      { signal }
    );
  });

  it('should map an overloaded API to a transient error', async () => {
    const generator = new AnthropicChunkGenerator(options, createTestLogger(), () =>
      Promise.reject(new Anthropic.APIError(529, undefined, 'Overloaded', undefined))
    );

    const err = await drain(generator.generate(request, new AbortController().signal)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientGenerationError);
    expect(err).toMatchObject({ details: { provider: 'anthropic', status: 529 } });
  });

  it('should map a rate limit raised mid-stream to a transient error', async () => {
    const generator = new AnthropicChunkGenerator(options, createTestLogger(), () =>
      streamOf([textDelta('Title: ')], new Anthropic.APIError(429, undefined, 'Rate limited', undefined))
    );

    await expect(drain(generator.generate(request, new AbortController().signal)))
      .rejects.toBeInstanceOf(TransientGenerationError);
  });

  it('should map an authentication failure to a permanent error', async () => {
    const generator = new AnthropicChunkGenerator(options, createTestLogger(), () =>
      Promise.reject(new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined))
    );

    const err = await drain(generator.generate(request, new AbortController().signal)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({ details: { provider: 'anthropic', status: 401 } });
  });

  it('should report an aborted request as cancellation', async () => {
    const controller = new AbortController();
    const generator = new AnthropicChunkGenerator(options, createTestLogger(), () => {
      controller.abort();
      return Promise.reject(new Anthropic.APIUserAbortError());
    });

    await expect(drain(generator.generate(request, controller.signal))).rejects.toBeInstanceOf(CancelledError);
  });
});
