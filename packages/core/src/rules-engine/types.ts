export const CONDITION_OPERATORS = ['>', '<', '==', '!=', '>=', '<='] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export type ConditionValue = number | string;

export type ValueKind = 'number' | 'string';

/** A record as handed to the engine. Never written to. */
export type AlertRecord = Readonly<Record<string, unknown>>;

export interface RuleOutcome {
  risk: string;
  action: string;
}

export interface ConditionDefinition {
  field: string;
  operator: ConditionOperator;
  value: ConditionValue;
}

/** A rule as authored in a rule file, after structural validation. */
export interface RuleDefinition {
  id: string;
  priority: number;
  description: string;
  conditions: ConditionDefinition[];
  result: RuleOutcome;
}

export type Comparator<T extends ConditionValue> = (recordValue: T, operand: T) => boolean;

interface CompiledCondition<K extends ValueKind, T extends ConditionValue> {
  readonly field: string;
  readonly operator: ConditionOperator;
  readonly kind: K;
  readonly value: T;
  readonly compare: Comparator<T>;
}

/** A condition resolved at load time: operand kind tagged, operator bound to its comparator. */
export type Condition =
  | CompiledCondition<'number', number>
  | CompiledCondition<'string', string>;

export interface Rule {
  readonly id: string;
  readonly priority: number;
  readonly description: string;
  readonly conditions: readonly Condition[];
  readonly result: Readonly<RuleOutcome>;
}

export const NO_RULE_ID = 'NO_RULE';

export interface EvaluationResult {
  risk: string;
  action: string;
  matched_rule_id: string;
}

export const DEFAULT_RESULT: Readonly<EvaluationResult> = Object.freeze({
  risk: 'NORMAL',
  action: 'routine monitoring',
  matched_rule_id: NO_RULE_ID,
});

export type AnnotatedRecord = Record<string, unknown> & EvaluationResult;
