/**
 * LLM integration layer using Vercel AI SDK.
 *
 * Every component that asks the model for structured data goes through one
 * `LLMGateway`: a prompt goes out, raw text comes back. `completeJson` turns
 * that text into a validated object. The endpoint is any OpenAI-compatible
 * chat completions server (vLLM, llama.cpp, OpenAI itself).
 */

import { generateText, APICallError } from 'ai';
import type { LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { z } from 'zod';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import {
  JsonExtractionError,
  TimeoutError,
  UpstreamError,
} from '../types/errors.js';
import { isPlainObject } from '../types/utils.js';

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  /** Deadline for this call; there is no retry. */
  timeoutMs: number;
}

/**
 * Single-prompt completion capability shared by every pipeline stage.
 */
export interface LLMGateway {
  /**
   * @throws TimeoutError when no reply arrives within `timeoutMs`
   * @throws UpstreamError for non-2xx replies, network or envelope failures
   */
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/**
 * Build the chat model for the configured OpenAI-compatible endpoint.
 */
export function createLanguageModel(config: Config): LanguageModel {
  logger.info(`Initializing LLM: ${config.LLM_BASE_URL} (${config.LLM_MODEL})`);

  const openai = createOpenAI({
    baseURL: config.LLM_BASE_URL,
    apiKey: config.LLM_API_KEY,
  });
  // chat completions endpoint; OpenAI-compatible servers lack the Responses API
  return openai.chat(config.LLM_MODEL);
}

/**
 * Gateway backed by the AI SDK's `generateText`.
 */
export class AiSdkGateway implements LLMGateway {
  constructor(private readonly model: LanguageModel) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const signal = AbortSignal.timeout(options.timeoutMs);

    try {
      const result = await generateText({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
        maxRetries: 0,
        abortSignal: signal,
      });

      logger.debug(
        `LLM API call successful - ` +
          `Input: ${result.usage.inputTokens}, ` +
          `Output: ${result.usage.outputTokens}`
      );

      return result.text;
    } catch (error) {
      if (signal.aborted) {
        throw new TimeoutError(options.timeoutMs);
      }
      if (APICallError.isInstance(error)) {
        throw new UpstreamError(
          `Completion endpoint rejected the request: ${error.message}`,
          error.statusCode
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`LLM API call failed: ${message}`);
    }
  }
}

/**
 * Remove a surrounding markdown code fence (```json ... ``` or ``` ... ```).
 */
export function stripCodeFences(text: string): string {
  let content = text.trim();
  if (content.startsWith('```json')) {
    content = content.slice(7);
  } else if (content.startsWith('```')) {
    content = content.slice(3);
  }
  if (content.endsWith('```')) {
    content = content.slice(0, -3);
  }
  return content.trim();
}

/**
 * Parse a model reply as exactly one JSON object.
 *
 * @throws JsonExtractionError when the text is not JSON or not an object
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  const content = stripCodeFences(text);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new JsonExtractionError(`LLM output not valid JSON: ${error}`, text);
  }

  if (!isPlainObject(parsed)) {
    throw new JsonExtractionError('LLM output is not a JSON object', text);
  }
  return parsed;
}

/**
 * Complete a prompt and validate the JSON object it returns.
 *
 * Fields the schema cannot read fall back to the schema's own defaults, so
 * only transport failures and non-object replies throw.
 */
export async function completeJson<S extends z.ZodTypeAny>(
  gateway: LLMGateway,
  prompt: string,
  schema: S,
  options: CompletionOptions
): Promise<z.output<S>> {
  const raw = await gateway.complete(prompt, options);
  const data = extractJsonObject(raw);
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new JsonExtractionError(
      `LLM JSON did not match the expected shape: ${result.error.message}`,
      raw
    );
  }
  return result.data;
}
