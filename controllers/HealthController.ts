import { Controller, GET } from 'fastify-decorators';
import type { FastifyReply, FastifyRequest } from 'fastify';

export const SERVICE_NAME = 'CISNR Research Assistant';
export const SERVICE_VERSION = '1.0.0';

@Controller('/api')
export default class HealthController {
  @GET('/health')
  async health(req: FastifyRequest, reply: FastifyReply) {
    const { answerPipeline, serviceHealth } = req.server;
    const ready = answerPipeline !== null;

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'healthy' : 'degraded',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      dependencies: {
        rag_system: ready,
        google_api: serviceHealth.googleApi,
        vector_index: serviceHealth.vectorIndex,
      },
    });
  }
}
