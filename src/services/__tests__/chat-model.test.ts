import { describe, it, expect } from 'vitest';
import { simulateReadableStream } from 'ai';
import { MockLanguageModelV2 } from 'ai/test';
import type { LanguageModelV2StreamPart } from '@ai-sdk/provider';
import { AiSdkChatModel, toModelMessages } from '../chat-model.js';
import { TimeoutError, UpstreamError } from '../../types/errors.js';
import type { ChatMessage } from '../../types/models.js';

const MESSAGES: ChatMessage[] = [
  { role: 'system', content: 'be brief' },
  { role: 'user', content: 'hi' },
  { role: 'assistant', content: 'hello' },
  { role: 'user', content: 'count rows' },
];

const OPTIONS = { maxTokens: 64, temperature: 0.7, timeoutMs: 1000 };
const USAGE = { inputTokens: 3, outputTokens: 2, totalTokens: 5 };

function streamingModel(chunks: LanguageModelV2StreamPart[]): MockLanguageModelV2 {
  return new MockLanguageModelV2({
    doStream: async () => ({ stream: simulateReadableStream({ chunks }) }),
  });
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const parts: string[] = [];
  for await (const part of stream) {
    parts.push(part);
  }
  return parts;
}

describe('toModelMessages', () => {
  it('keeps roles and content', () => {
    expect(toModelMessages(MESSAGES)).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'user', content: 'count rows' },
    ]);
  });
});

describe('AiSdkChatModel', () => {
  it('generates a complete answer', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => ({
        content: [{ type: 'text', text: 'There are 4 rows.' }],
        finishReason: 'stop',
        usage: USAGE,
        warnings: [],
      }),
    });

    const chat = new AiSdkChatModel(model, 'test-model');
    await expect(chat.generate(MESSAGES, OPTIONS)).resolves.toBe('There are 4 rows.');
    expect(chat.modelId).toBe('test-model');
    expect(model.doGenerateCalls[0].maxOutputTokens).toBe(64);
    expect(model.doGenerateCalls[0].temperature).toBe(0.7);
  });

  it('maps a timeout on generate', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: ({ abortSignal }) =>
        new Promise((_resolve, reject) => {
          abortSignal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });

    await expect(
      new AiSdkChatModel(model, 'm').generate(MESSAGES, { ...OPTIONS, timeoutMs: 20 })
    ).rejects.toThrow(TimeoutError);
  });

  it('streams text deltas in order', async () => {
    const model = streamingModel([
      { type: 'text-start', id: 't1' },
      { type: 'text-delta', id: 't1', delta: 'There are ' },
      { type: 'text-delta', id: 't1', delta: '4 rows.' },
      { type: 'text-end', id: 't1' },
      { type: 'finish', finishReason: 'stop', usage: USAGE },
    ]);

    await expect(collect(new AiSdkChatModel(model, 'm').stream(MESSAGES, OPTIONS))).resolves.toEqual([
      'There are ',
      '4 rows.',
    ]);
  });

  it('throws UpstreamError for a stream error part', async () => {
    const model = streamingModel([
      { type: 'text-start', id: 't1' },
      { type: 'text-delta', id: 't1', delta: 'partial' },
      { type: 'error', error: new Error('model crashed') },
    ]);

    const seen: string[] = [];
    const failure = await (async () => {
      for await (const part of new AiSdkChatModel(model, 'm').stream(MESSAGES, OPTIONS)) {
        seen.push(part);
      }
    })().catch((e: unknown) => e);

    expect(seen).toEqual(['partial']);
    expect(failure).toBeInstanceOf(UpstreamError);
  });
});
