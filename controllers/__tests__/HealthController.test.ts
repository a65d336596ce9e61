import { afterEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { buildApp } from '../../app.js';
import { InitializationError } from '../../services/errors.js';
import { createStubProviders, createTestPipeline } from '../../services/__tests__/helpers.js';

const ENV = { GOOGLE_API_KEY: 'test-google-key', QDRANT_API_KEY: 'test-qdrant-key' };

describe('GET /api/health', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('is healthy when the pipeline is ready', async () => {
    app = await buildApp({
      createPipeline: async (logger) => createTestPipeline(createStubProviders(), logger),
      env: ENV,
    });

    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'healthy',
      service: 'CISNR Research Assistant',
      timestamp: expect.any(String),
      version: '1.0.0',
      dependencies: { rag_system: true, google_api: true, vector_index: true },
    });
  });

  it('is degraded when the pipeline failed to start', async () => {
    app = await buildApp({
      createPipeline: async () => {
        throw new InitializationError("Vector index collection 'ncai' does not exist");
      },
      env: { GOOGLE_API_KEY: 'test-google-key' },
    });

    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({
      status: 'degraded',
      dependencies: { rag_system: false, google_api: true, vector_index: false },
    });
  });
});
