import type { FastifyInstance } from 'fastify';
import type { RuleStoreRef } from '@ignis/core';

export function registerHealthRoutes(app: FastifyInstance, rules: RuleStoreRef): void {
  app.get('/health', async (_request, reply) => {
    const store = rules.current();
    const rulesStatus: 'ok' | 'empty' = store.size > 0 ? 'ok' : 'empty';

    // An empty rule set classifies everything as NORMAL.
    const status = rulesStatus === 'ok' ? 'ok' : 'degraded';
    const statusCode = rulesStatus === 'ok' ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks: {
        rules: store.size,
        source: store.source,
        loaded_at: store.loadedAt.toISOString(),
      },
    });
  });
}
