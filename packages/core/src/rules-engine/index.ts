export { RulesEngine, evaluate, findMatchingRule } from './rules-engine.js';
export { RuleStore, orderRules } from './rule-store.js';
export { RuleStoreRef } from './rule-store-ref.js';
export type { RuleStoreLoader } from './rule-store-ref.js';
export { compileCondition, evaluateCondition, isOrderingOperator } from './condition-evaluator.js';
export { loadRules, loadRulesFromFile, loadRulesFromDirectory } from './rule-loader.js';
export { parseRule, parseRuleDocument } from './rule-schema.js';
export { CONDITION_OPERATORS, DEFAULT_RESULT, NO_RULE_ID } from './types.js';
export type {
  AlertRecord,
  AnnotatedRecord,
  Condition,
  ConditionDefinition,
  ConditionOperator,
  ConditionValue,
  EvaluationResult,
  Rule,
  RuleDefinition,
  RuleOutcome,
  ValueKind,
} from './types.js';
