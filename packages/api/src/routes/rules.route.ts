import type { FastifyInstance } from 'fastify';
import type { RuleStore, RuleStoreRef } from '@ignis/core';
import { logRuleSet } from '../rule-log.js';

function serializeStore(store: RuleStore) {
  return {
    source: store.source,
    loaded_at: store.loadedAt.toISOString(),
    count: store.size,
    rules: store.rules.map((rule) => ({
      id: rule.id,
      priority: rule.priority,
      description: rule.description,
      conditions: rule.conditions.map(({ field, operator, value }) => ({ field, operator, value })),
      result: rule.result,
    })),
  };
}

export function registerRuleRoutes(app: FastifyInstance, rules: RuleStoreRef): void {
  app.get('/rules', async (_request, reply) => {
    return reply.status(200).send(serializeStore(rules.current()));
  });

  // A failed reload throws before the swap; the error handler reports it and
  // evaluations continue on the previous store.
  app.post('/rules/reload', async (request, reply) => {
    const store = rules.reload();
    logRuleSet(request.log, store, 'reloaded');

    return reply.status(200).send({
      source: store.source,
      loaded_at: store.loadedAt.toISOString(),
      rules: store.size,
    });
  });
}
