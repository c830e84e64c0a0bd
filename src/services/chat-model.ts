/**
 * Answering model for the chat endpoints, on the same OpenAI-compatible
 * endpoint as the classification gateway.
 */

import { generateText, streamText, APICallError } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import { logger } from '../utils/logger.js';
import { TimeoutError, UpstreamError } from '../types/errors.js';
import type { ChatMessage } from '../types/models.js';

export interface ChatOptions {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  /** Aborts the answer early; a stream then ends without error. */
  signal?: AbortSignal;
}

export interface ChatModel {
  /** Model id reported by the health endpoint. */
  readonly modelId: string;

  /**
   * @throws TimeoutError when the answer does not finish within `timeoutMs`
   * @throws UpstreamError for any other model failure
   */
  generate(messages: readonly ChatMessage[], options: ChatOptions): Promise<string>;

  /**
   * Yield text deltas as they arrive.
   *
   * @throws TimeoutError or UpstreamError, as `generate`
   */
  stream(messages: readonly ChatMessage[], options: ChatOptions): AsyncIterable<string>;
}

export function toModelMessages(messages: readonly ChatMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      default:
        return { role: 'user', content: message.content };
    }
  });
}

export class AiSdkChatModel implements ChatModel {
  constructor(
    private readonly model: LanguageModel,
    readonly modelId: string
  ) {}

  async generate(messages: readonly ChatMessage[], options: ChatOptions): Promise<string> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

    try {
      const result = await generateText({
        model: this.model,
        messages: toModelMessages(messages),
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
        maxRetries: 0,
        abortSignal: signal,
      });
      logger.debug(`Chat answer: ${result.usage.outputTokens} output tokens`);
      return result.text;
    } catch (error) {
      throw toChatError(error, timeout, options.timeoutMs);
    }
  }

  async *stream(
    messages: readonly ChatMessage[],
    options: ChatOptions
  ): AsyncGenerator<string, void, undefined> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;
    const stopped = (): boolean => options.signal?.aborted === true && !timeout.aborted;

    const result = streamText({
      model: this.model,
      messages: toModelMessages(messages),
      maxOutputTokens: options.maxTokens,
      temperature: options.temperature,
      maxRetries: 0,
      abortSignal: signal,
      onError: ({ error }) => {
        logger.debug(`Chat stream error: ${error}`);
      },
    });

    try {
      for await (const part of result.fullStream) {
        if (part.type === 'text-delta') {
          yield part.text;
        } else if (part.type === 'abort') {
          break;
        } else if (part.type === 'error') {
          throw part.error;
        }
      }
    } catch (error) {
      if (stopped()) {
        return;
      }
      throw toChatError(error, timeout, options.timeoutMs);
    }

    if (timeout.aborted) {
      throw new TimeoutError(options.timeoutMs);
    }
  }
}

function toChatError(error: unknown, timeout: AbortSignal, timeoutMs: number): Error {
  if (timeout.aborted) {
    return new TimeoutError(timeoutMs);
  }
  if (APICallError.isInstance(error)) {
    return new UpstreamError(`Chat model rejected the request: ${error.message}`, error.statusCode);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(`Chat model call failed: ${message}`);
}
