import { withSpan } from '../observability/tracing.js';
import { compileCondition } from './condition-evaluator.js';
import { loadRules } from './rule-loader.js';
import { parseRuleDocument } from './rule-schema.js';
import type { Rule, RuleDefinition } from './types.js';

function compileRule(definition: RuleDefinition): Rule {
  return Object.freeze({
    id: definition.id,
    priority: definition.priority,
    description: definition.description,
    conditions: Object.freeze(definition.conditions.map(compileCondition)),
    result: Object.freeze({ risk: definition.result.risk, action: definition.result.action }),
  });
}

/**
 * Sort by ascending priority. Array.prototype.sort is stable, so rules with
 * equal priority keep their declaration order.
 */
export function orderRules(definitions: readonly RuleDefinition[]): readonly Rule[] {
  const ordered = definitions
    .map(compileRule)
    .sort((a, b) => a.priority - b.priority);
  return Object.freeze(ordered);
}

/**
 * An immutable, priority-ordered rule set. Reloading means building a new
 * store; see RuleStoreRef.
 */
export class RuleStore {
  readonly rules: readonly Rule[];
  readonly loadedAt: Date;

  private constructor(
    definitions: readonly RuleDefinition[],
    readonly source: string,
  ) {
    this.rules = orderRules(definitions);
    this.loadedAt = new Date();
    Object.freeze(this);
  }

  /** Load from a YAML/JSON rule file, or a directory of them. */
  static load(path: string): RuleStore {
    return withSpan('rules.load', { 'rules.source': path }, (span) => {
      const store = new RuleStore(loadRules(path), path);
      span.setAttribute('rules.count', store.size);
      return store;
    });
  }

  /** Build from a document that has already been parsed (an array or `{ rules }`). */
  static fromDocument(document: unknown, source: string): RuleStore {
    return new RuleStore(parseRuleDocument(document, source), source);
  }

  static fromDefinitions(definitions: readonly RuleDefinition[], source = 'inline'): RuleStore {
    return new RuleStore(definitions, source);
  }

  get size(): number {
    return this.rules.length;
  }
}
