import { withSpan } from '../observability/tracing.js';
import { evaluateCondition } from './condition-evaluator.js';
import type { RuleStore } from './rule-store.js';
import {
  DEFAULT_RESULT,
  type AlertRecord,
  type AnnotatedRecord,
  type EvaluationResult,
  type Rule,
} from './types.js';

/**
 * First rule, in the given order, whose conditions all hold. `every` stops at
 * the first failing condition, so later conditions of that rule are never read.
 */
export function findMatchingRule(rules: readonly Rule[], record: AlertRecord): Rule | undefined {
  return rules.find((rule) =>
    rule.conditions.every((condition) => evaluateCondition(condition, record)),
  );
}

export function evaluate(rules: readonly Rule[], record: AlertRecord): EvaluationResult {
  const rule = findMatchingRule(rules, record);
  if (!rule) return { ...DEFAULT_RESULT };

  return {
    risk: rule.result.risk,
    action: rule.result.action,
    matched_rule_id: rule.id,
  };
}

export class RulesEngine {
  constructor(private readonly store: RuleStore) {}

  get rules(): readonly Rule[] {
    return this.store.rules;
  }

  evaluateOne(record: AlertRecord): EvaluationResult {
    return evaluate(this.store.rules, record);
  }

  /**
   * Lazily evaluate records in input order, one result per record.
   */
  *evaluateBatch(records: Iterable<AlertRecord>): Generator<EvaluationResult, void, undefined> {
    for (const record of records) {
      yield this.evaluateOne(record);
    }
  }

  evaluateAll(records: readonly AlertRecord[]): EvaluationResult[] {
    return withSpan(
      'rules.evaluate_batch',
      { 'rules.source': this.store.source, 'records.count': records.length },
      () => Array.from(this.evaluateBatch(records)),
    );
  }

  /** Each record copied with its risk, action and matched rule id appended. */
  annotateRecords(records: readonly AlertRecord[]): AnnotatedRecord[] {
    const results = this.evaluateAll(records);
    return records.map((record, i) => ({ ...record, ...results[i] }));
  }
}
