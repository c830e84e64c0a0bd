/**
 * Chat endpoints: plain, streaming (SSE) and stop.
 */

import { randomUUID } from 'crypto';
import type { FastifyPluginAsync } from 'fastify';
import {
  ChatRequestSchema,
  StopRequestSchema,
  type ChatMessage,
  type ChatRequest,
  type ChatResponse,
} from '../types/models.js';
import { buildSystemPrompt } from '../services/context.js';
import type { Services } from '../services/index.js';
import { logger } from '../utils/logger.js';

export interface RouteOptions {
  services: Services;
}

const chatBodySchema = {
  type: 'object',
  properties: {
    messages: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          role: { type: 'string', enum: ['system', 'user', 'assistant'] },
          content: { type: 'string' },
        },
        required: ['role', 'content'],
      },
    },
    temperature: { type: 'number', default: 0.7 },
    max_tokens: { type: 'integer', default: 4096 },
    use_retrieval: { type: 'boolean' },
    request_id: { type: 'string' },
  },
  required: ['messages'],
} as const;

/**
 * One SSE frame.
 */
export function sseFrame(payload: Record<string, string | boolean>): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export const chatRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  const { config, contextBuilder, chatModel, registry, gate } = services;

  /**
   * System prompt plus the client's conversation, with the last message's
   * content as the retrieval question.
   */
  async function prepareMessages(body: ChatRequest): Promise<ChatMessage[]> {
    const last = body.messages[body.messages.length - 1];
    const { context } = await contextBuilder.build(last.content, body.use_retrieval);
    return [{ role: 'system', content: buildSystemPrompt(context) }, ...body.messages];
  }

  // POST /api/chat - Answer in one response
  fastify.post(
    '/api/chat',
    {
      schema: {
        description: 'Answer the last message, with retrieved rows when relevant',
        body: chatBodySchema,
      },
    },
    async (request, reply) => {
      const body = ChatRequestSchema.parse(request.body);
      if (body.messages.length === 0) {
        return reply.status(400).send({ error: 'BadRequest', message: 'No messages provided' });
      }

      const messages = await prepareMessages(body);
      const message = await chatModel.generate(messages, {
        maxTokens: body.max_tokens,
        temperature: body.temperature,
        timeoutMs: config.CHAT_TIMEOUT_MS,
      });
      const response: ChatResponse = { message, success: true };
      return response;
    }
  );

  // POST /api/chat/stream - Server-sent events
  fastify.post(
    '/api/chat/stream',
    {
      schema: {
        description: 'Stream the answer as server-sent events',
        body: chatBodySchema,
      },
    },
    async (request, reply) => {
      const body = ChatRequestSchema.parse(request.body);
      if (body.messages.length === 0) {
        return reply.status(400).send({ error: 'BadRequest', message: 'No messages provided' });
      }

      const requestId = body.request_id ?? `req_${randomUUID()}`;
      const stopSignal = registry.register(requestId);
      const res = reply.raw;
      const disconnected = new AbortController();
      res.on('close', () => disconnected.abort());
      const signal = AbortSignal.any([stopSignal, disconnected.signal]);

      let messages: ChatMessage[];
      try {
        messages = await prepareMessages(body);
      } catch (error) {
        registry.release(requestId, stopSignal);
        throw error;
      }

      reply.hijack();
      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
        'Access-Control-Allow-Origin': '*',
      });
      const send = (payload: Record<string, string | boolean>): void => {
        if (!res.destroyed) {
          res.write(sseFrame(payload));
        }
      };

      try {
        await gate.run(async () => {
          if (signal.aborted) {
            send({ content: '', stopped: true });
            return;
          }
          const stream = chatModel.stream(messages, {
            maxTokens: body.max_tokens,
            temperature: body.temperature,
            timeoutMs: config.CHAT_TIMEOUT_MS,
            signal,
          });
          for await (const content of stream) {
            if (content.length > 0) {
              send({ content });
            }
          }
          if (signal.aborted) {
            send({ content: '', stopped: true });
          }
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Chat stream ${requestId} failed: ${message}`);
        send({ error: message });
      } finally {
        registry.release(requestId, stopSignal);
        if (disconnected.signal.aborted) {
          logger.info(`Client left chat stream ${requestId}`);
        }
        if (!res.destroyed) {
          res.end();
        }
      }
    }
  );

  // POST /api/chat/stop - Stop a streaming answer
  fastify.post(
    '/api/chat/stop',
    {
      schema: {
        description: 'Stop a streaming answer by request id',
        body: {
          type: 'object',
          properties: { request_id: { type: 'string' } },
          required: ['request_id'],
        },
      },
    },
    async (request) => {
      const { request_id: requestId } = StopRequestSchema.parse(request.body);
      if (registry.stop(requestId)) {
        return { success: true, message: `Request ${requestId} stopped` };
      }
      return { success: false, message: `Request ${requestId} not found` };
    }
  );
};
