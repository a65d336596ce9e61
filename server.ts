import 'dotenv/config';
import { buildApp } from './app.js';
import { loadServerConfig } from './config.js';
import { initAnswerPipeline } from './ragProviders.js';

const config = loadServerConfig();

const fastify = await buildApp({
  createPipeline: (logger) => initAnswerPipeline(process.env, logger),
  logger: { level: config.logLevel },
});

fastify.listen({ port: config.port, host: config.host }, (err) => {
  if (err) {
    fastify.log.error(err);
    process.exit(1);
  }
});
