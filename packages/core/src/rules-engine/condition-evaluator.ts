import type {
  AlertRecord,
  Comparator,
  Condition,
  ConditionDefinition,
  ConditionOperator,
} from './types.js';

const NUMBER_COMPARATORS: Record<ConditionOperator, Comparator<number>> = {
  '>': (a, b) => a > b,
  '<': (a, b) => a < b,
  '==': (a, b) => a === b,
  '!=': (a, b) => a !== b,
  '>=': (a, b) => a >= b,
  '<=': (a, b) => a <= b,
};

// Ordering is only defined between numbers.
const STRING_COMPARATORS: Record<ConditionOperator, Comparator<string>> = {
  '>': () => false,
  '<': () => false,
  '==': (a, b) => a === b,
  '!=': (a, b) => a !== b,
  '>=': () => false,
  '<=': () => false,
};

export function isOrderingOperator(operator: ConditionOperator): boolean {
  return operator !== '==' && operator !== '!=';
}

export function compileCondition(definition: ConditionDefinition): Condition {
  const { field, operator, value } = definition;
  const condition: Condition =
    typeof value === 'number'
      ? { field, operator, kind: 'number', value, compare: NUMBER_COMPARATORS[operator] }
      : { field, operator, kind: 'string', value, compare: STRING_COMPARATORS[operator] };
  return Object.freeze(condition);
}

/**
 * A missing field, `null` or `NaN` fails the condition. A value of the other
 * kind from the operand is never equal to it, so only `!=` holds; ordering
 * needs two numbers. Nothing here throws.
 */
export function evaluateCondition(condition: Condition, record: AlertRecord): boolean {
  if (!Object.hasOwn(record, condition.field)) return false;

  const value = record[condition.field];
  if (value === null || value === undefined || Number.isNaN(value)) return false;

  if (condition.kind === 'number') {
    return typeof value === 'number'
      ? condition.compare(value, condition.value)
      : condition.operator === '!=';
  }
  return typeof value === 'string'
    ? condition.compare(value, condition.value)
    : condition.operator === '!=';
}
