import type { FastifyBaseLogger } from 'fastify';
import { isOrderingOperator, type RuleStore } from '@ignis/core';

/**
 * Log a freshly loaded store. Ordering comparisons against a text operand can
 * never hold, so each one is called out.
 */
export function logRuleSet(log: FastifyBaseLogger, store: RuleStore, event: 'loaded' | 'reloaded'): void {
  log.info({ source: store.source, rules: store.size }, `rules ${event}`);

  for (const rule of store.rules) {
    for (const condition of rule.conditions) {
      if (condition.kind === 'string' && isOrderingOperator(condition.operator)) {
        log.warn(
          { rule_id: rule.id, field: condition.field, operator: condition.operator, value: condition.value },
          'ordering comparison against a text value never matches',
        );
      }
    }
  }
}
