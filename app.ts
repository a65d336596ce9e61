import 'reflect-metadata';
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { bootstrap } from 'fastify-decorators';

import type { Env } from './config.js';
import ChatController from './controllers/ChatController.js';
import HealthController from './controllers/HealthController.js';
import ResourcesController from './controllers/ResourcesController.js';
import type { AnswerPipeline } from './services/answerPipeline.js';
import { describeError } from './services/errors.js';
import type { Logger } from './services/providers.js';

export interface ServiceHealth {
  googleApi: boolean;
  vectorIndex: boolean;
}

declare module 'fastify' {
  interface FastifyInstance {
    /** `null` when startup failed; requests are then refused with 503. */
    answerPipeline: AnswerPipeline | null;
    serviceHealth: ServiceHealth;
  }
}

export interface AppOptions {
  createPipeline: (logger: Logger) => Promise<AnswerPipeline>;
  env?: Env;
  logger?: FastifyServerOptions['logger'];
}

export const INTERNAL_ERROR_RESPONSE =
  'I apologize, but I encountered an error processing your request. Please try again.';

export async function buildApp({ createPipeline, env = process.env, logger = false }: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger, ignoreTrailingSlash: true });

  let pipeline: AnswerPipeline | null = null;
  try {
    pipeline = await createPipeline(app.log);
  } catch (err) {
    app.log.error({ err }, `Failed to initialize RAG system: ${describeError(err)}`);
  }

  app.decorate('answerPipeline', pipeline);
  app.decorate('serviceHealth', {
    googleApi: Boolean(env.GOOGLE_API_KEY),
    vectorIndex: Boolean(env.QDRANT_API_KEY),
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, `Error handling ${request.method} ${request.url}`);
    return reply.code(500).send({ error: 'Internal server error', response: INTERNAL_ERROR_RESPONSE });
  });

  await app.register(bootstrap, {
    controllers: [ChatController, HealthController, ResourcesController],
  });

  return app;
}
