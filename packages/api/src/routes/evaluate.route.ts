import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NO_RULE_ID, type RuleStoreRef } from '@ignis/core';
import { parseBody } from './validation.js';

const RecordSchema = z.record(z.unknown());

const EvaluateBodySchema = z.object({
  record: RecordSchema,
});

const EvaluateBatchBodySchema = z.object({
  records: z.array(RecordSchema),
});

export function registerEvaluateRoutes(app: FastifyInstance, rules: RuleStoreRef): void {
  app.post('/evaluate', async (request, reply) => {
    const { record } = parseBody(EvaluateBodySchema, request.body);
    const result = rules.engine().evaluateOne(record);
    return reply.status(200).send(result);
  });

  app.post('/evaluate/batch', async (request, reply) => {
    const { records } = parseBody(EvaluateBatchBodySchema, request.body);
    const results = rules.engine().evaluateAll(records);

    request.log.info(
      {
        records: results.length,
        matched: results.filter((r) => r.matched_rule_id !== NO_RULE_ID).length,
      },
      'batch evaluated',
    );

    return reply.status(200).send({
      count: results.length,
      results,
    });
  });
}
