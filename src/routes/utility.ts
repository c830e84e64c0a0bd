/**
 * Utility endpoints (health, classify).
 */

import type { FastifyPluginAsync } from 'fastify';
import { ClassifyRequestSchema } from '../types/models.js';
import type { RouteOptions } from './chat.js';

export const utilityRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  // GET /health - Health check
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      model: services.chatModel.modelId,
      database: services.store.path,
      active_streams: services.registry.size,
    };
  });

  // POST /api/classify - Run the three classification layers without answering
  fastify.post(
    '/api/classify',
    {
      schema: {
        description: 'Classify a question and show every layer',
        body: {
          type: 'object',
          properties: { query: { type: 'string', maxLength: 2000 } },
          required: ['query'],
        },
      },
    },
    async (request) => {
      const { query } = ClassifyRequestSchema.parse(request.body);
      const result = await services.classifier.classify(query);
      return {
        query,
        use_retrieval: result.useRetrieval,
        ...result.debugInfo,
      };
    }
  );
};
