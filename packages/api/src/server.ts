import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import {
  ValidationError,
  SourceNotFoundError,
  MalformedSourceError,
  InvalidRuleError,
} from '@ignis/core';
import type { RuleStoreRef } from '@ignis/core';
import type { LogLevel } from './config.js';
import { registerEvaluateRoutes } from './routes/evaluate.route.js';
import { registerRuleRoutes } from './routes/rules.route.js';
import { registerHealthRoutes } from './routes/health.route.js';

export interface ServerDeps {
  rules: RuleStoreRef;
  logLevel?: LogLevel;
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: { level: deps.logLevel ?? 'info' },
    genReqId: () => randomUUID(),
  });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request, reply) => {
    const header = request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
    request.headers['x-correlation-id'] = correlationId;
    reply.header('x-correlation-id', correlationId);
    request.log = request.log.child({ correlation_id: correlationId });
  });

  registerEvaluateRoutes(app, deps.rules);
  registerRuleRoutes(app, deps.rules);
  registerHealthRoutes(app, deps.rules);

  app.setErrorHandler<FastifyError | ValidationError>((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: error.message,
        field: error.field,
      });
    }

    if (error instanceof SourceNotFoundError) {
      request.log.warn({ source: error.source }, 'rule source not found');
      return reply.status(404).send({
        error: 'Rule Source Not Found',
        message: error.message,
        source: error.source,
      });
    }

    if (error instanceof MalformedSourceError) {
      request.log.warn({ source: error.source }, 'rule source malformed');
      return reply.status(422).send({
        error: 'Malformed Rule Source',
        message: error.message,
        source: error.source,
      });
    }

    if (error instanceof InvalidRuleError) {
      request.log.warn({ source: error.source, rule_id: error.ruleId, field: error.field }, 'invalid rule');
      return reply.status(422).send({
        error: 'Invalid Rule',
        message: error.message,
        source: error.source,
        rule_id: error.ruleId,
        field: error.field,
      });
    }

    // Fastify's own errors (bad JSON, unsupported media type) carry a 4xx status
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    request.log.error(error);
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
