// Shared
export {
  ValidationError,
  SourceNotFoundError,
  MalformedSourceError,
  InvalidRuleError,
  isSourceLoadError,
} from './shared/errors.js';
export type { SourceLoadError } from './shared/errors.js';

// Rules Engine
export {
  RulesEngine,
  RuleStore,
  RuleStoreRef,
  evaluate,
  findMatchingRule,
  orderRules,
  compileCondition,
  evaluateCondition,
  isOrderingOperator,
  loadRules,
  loadRulesFromFile,
  loadRulesFromDirectory,
  parseRule,
  parseRuleDocument,
  CONDITION_OPERATORS,
  DEFAULT_RESULT,
  NO_RULE_ID,
} from './rules-engine/index.js';
export type {
  RuleStoreLoader,
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
} from './rules-engine/index.js';

// Records
export { loadRecordsFromFile, parseCsvRecords, toRecords } from './records/record-reader.js';
export { classifyFile, runClassify, DEFAULT_RULES_PATH } from './records/classify-records.js';
export type { ClassifyIO, LineWriter } from './records/classify-records.js';

// Observability
export { getTracer, startSpan, endSpan, withSpan, SpanStatusCode } from './observability/tracing.js';
