/**
 * Fastify application factory.
 */

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { chatRoutes } from './routes/chat.js';
import { utilityRoutes } from './routes/utility.js';
import type { Services } from './services/index.js';
import { TimeoutError, UpstreamError } from './types/errors.js';
import type { ErrorResponse } from './types/models.js';
import { logger } from './utils/logger.js';

export interface BuildAppOptions {
  /** Fastify request logging; off in tests. */
  logger?: FastifyServerOptions['logger'];
  /** Serve OpenAPI docs at /docs. */
  docs?: boolean;
}

export async function buildApp(
  services: Services,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'sqlchat API',
          description: 'Chat over a SQLite table with model-generated SQL',
          version: '1.0.0',
        },
      },
    });
    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  await fastify.register(chatRoutes, { services });
  await fastify.register(utilityRoutes, { services });

  fastify.setErrorHandler<FastifyError>((error, _request, reply) => {
    let status: number;
    let body: ErrorResponse;

    if (error instanceof ZodError) {
      status = 400;
      body = { error: 'ValidationError', message: error.issues.map((i) => i.message).join('; ') };
    } else if (error.validation) {
      status = 400;
      body = { error: 'ValidationError', message: error.message };
    } else if (error instanceof TimeoutError) {
      status = 504;
      body = { error: 'TimeoutError', message: 'Request timeout' };
    } else if (error instanceof UpstreamError) {
      status = 500;
      body = { error: 'UpstreamError', message: `Server Error: ${error.message}` };
    } else {
      status = 500;
      body = {
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      };
    }

    if (status >= 500) {
      logger.error(`${body.error}: ${error.message}`);
    }
    return reply.status(status).send(body);
  });

  fastify.addHook('onClose', async () => {
    logger.info('Shutting down sqlchat server...');
  });

  return fastify;
}
