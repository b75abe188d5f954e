import Fastify, { type FastifyInstance, type FastifyReply, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { logger } from './config/index.js';
import type { ProviderStatus } from './embeddings/service.js';
import {
  RelatedParamsSchema,
  RelatedQuerySchema,
  createErrorResponse,
  validateSearchRequest,
  type SearchRequestBody
} from './schemas/api.js';
import { DocumentNotFoundError, SearchUnavailableError } from './services/errors.js';
import type { SearchService } from './services/search-service.js';

export interface ServerDependencies {
  searchService: SearchService;
  embeddingStatus?: () => Promise<ProviderStatus[]>;
  checkDatabase?: () => Promise<void>;
}

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  frontendOrigin?: string;
  nodeEnv?: 'development' | 'production' | 'test';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function sendError(reply: FastifyReply, error: unknown, route: string) {
  if (error instanceof ZodError) {
    return reply.code(400).send(createErrorResponse('Bad Request', 'Invalid request', 400, { issues: error.issues }));
  }
  if (error instanceof DocumentNotFoundError) {
    return reply.code(404).send(createErrorResponse('Not Found', error.message, 404));
  }
  if (error instanceof SearchUnavailableError) {
    logger.error({ error: error.message, route }, 'Search unavailable');
    return reply.code(503).send(createErrorResponse('Service Unavailable', error.message, 503));
  }
  if (isAbortError(error)) {
    logger.info({ route }, 'Client went away, search aborted');
    return reply.code(499).send(createErrorResponse('Client Closed Request', 'Request aborted', 499));
  }

  logger.error({ error, route }, 'Unhandled error');
  return reply.code(500).send(createErrorResponse('Internal Server Error', 'Internal server error', 500));
}

/**
 * Abort signal that fires when the client disconnects before the reply is sent.
 */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export async function buildServer(deps: ServerDependencies, options: ServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });
  const nodeEnv = options.nodeEnv ?? 'development';
  const allowedOrigins = (options.frontendOrigin ?? '')
    .split(',')
    .map(o => o.trim())
    .filter(Boolean);

  await app.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) return callback(null, true);

      if (nodeEnv === 'development') {
        const isDevelopmentOrigin = origin.includes('localhost') ||
                                   origin.includes('127.0.0.1') ||
                                   allowedOrigins.includes(origin);
        return callback(null, isDevelopmentOrigin);
      }
      callback(null, allowedOrigins.includes(origin));
    },
  });

  app.get('/health', async (_, reply) => {
    const startTime = Date.now();
    try {
      await deps.checkDatabase?.();
      const embeddings = deps.embeddingStatus ? await deps.embeddingStatus() : [];
      return reply.code(200).send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        services: {
          database: 'healthy',
          embeddings,
        },
        responseTime: `${Date.now() - startTime}ms`,
      });
    } catch (error) {
      logger.error({ error }, 'Health check failed');
      return reply.code(503).send({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: 'Database connection failed',
        uptime: process.uptime(),
      });
    }
  });

  const runSearch = async (body: SearchRequestBody, reply: FastifyReply, route: string) => {
    try {
      const response = await deps.searchService.search(body, { signal: disconnectSignal(reply) });
      return reply.send(response);
    } catch (error) {
      return sendError(reply, error, route);
    }
  };

  app.post('/api/search', async (request, reply) => {
    let body: SearchRequestBody;
    try {
      body = validateSearchRequest(request.body);
    } catch (error) {
      return sendError(reply, error, '/api/search');
    }
    return runSearch(body, reply, '/api/search');
  });

  app.post('/api/search/keyword', async (request, reply) => {
    let body: SearchRequestBody;
    try {
      body = { ...validateSearchRequest(request.body), mode: 'keyword' };
    } catch (error) {
      return sendError(reply, error, '/api/search/keyword');
    }
    return runSearch(body, reply, '/api/search/keyword');
  });

  app.get('/api/documents/:id/related', async (request, reply) => {
    try {
      const { id } = RelatedParamsSchema.parse(request.params);
      const { limit } = RelatedQuerySchema.parse(request.query);
      return reply.send(await deps.searchService.findRelated(id, limit));
    } catch (error) {
      return sendError(reply, error, '/api/documents/:id/related');
    }
  });

  return app;
}
