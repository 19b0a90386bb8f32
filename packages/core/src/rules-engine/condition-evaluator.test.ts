import { describe, it, expect } from 'vitest';
import { compileCondition, evaluateCondition, isOrderingOperator } from './condition-evaluator.js';
import type { ConditionDefinition } from './types.js';

function holds(definition: ConditionDefinition, record: Record<string, unknown>): boolean {
  return evaluateCondition(compileCondition(definition), record);
}

describe('ConditionEvaluator', () => {
  describe('compileCondition', () => {
    it('should tag numeric operands with the number kind', () => {
      const condition = compileCondition({ field: 'temp', operator: '>', value: 40 });
      expect(condition.kind).toBe('number');
      expect(condition.value).toBe(40);
    });

    it('should tag string operands with the string kind', () => {
      const condition = compileCondition({ field: 'event_type', operator: '==', value: 'raio_seco' });
      expect(condition.kind).toBe('string');
    });

    it('should return a frozen condition', () => {
      expect(Object.isFrozen(compileCondition({ field: 'temp', operator: '<', value: 1 }))).toBe(true);
    });
  });

  describe('ordering operators', () => {
    it('should compare with >', () => {
      expect(holds({ field: 'temp', operator: '>', value: 40 }, { temp: 42 })).toBe(true);
      expect(holds({ field: 'temp', operator: '>', value: 40 }, { temp: 40 })).toBe(false);
    });

    it('should compare with <', () => {
      expect(holds({ field: 'hum', operator: '<', value: 20 }, { hum: 18 })).toBe(true);
      expect(holds({ field: 'hum', operator: '<', value: 20 }, { hum: 20 })).toBe(false);
    });

    it('should compare with >=', () => {
      expect(holds({ field: 'wind', operator: '>=', value: 40 }, { wind: 40 })).toBe(true);
      expect(holds({ field: 'wind', operator: '>=', value: 40 }, { wind: 39.9 })).toBe(false);
    });

    it('should compare with <=', () => {
      expect(holds({ field: 'wind', operator: '<=', value: 40 }, { wind: 40 })).toBe(true);
      expect(holds({ field: 'wind', operator: '<=', value: 40 }, { wind: 40.1 })).toBe(false);
    });

    it('should fail when the record value is a string', () => {
      expect(holds({ field: 'temp', operator: '>', value: 40 }, { temp: '42' })).toBe(false);
    });

    it('should fail when the record value is NaN', () => {
      expect(holds({ field: 'temp', operator: '<', value: 40 }, { temp: Number.NaN })).toBe(false);
    });

    it('should never hold against a string operand', () => {
      expect(holds({ field: 'zone', operator: '>', value: 'A' }, { zone: 'Sintra' })).toBe(false);
      expect(holds({ field: 'zone', operator: '<=', value: 'Z' }, { zone: 'Sintra' })).toBe(false);
    });
  });

  describe('equality operators', () => {
    it('should match equal strings with ==', () => {
      expect(holds({ field: 'event_type', operator: '==', value: 'raio_seco' }, { event_type: 'raio_seco' })).toBe(true);
      expect(holds({ field: 'event_type', operator: '==', value: 'raio_seco' }, { event_type: 'nenhum' })).toBe(false);
    });

    it('should match equal numbers with ==', () => {
      expect(holds({ field: 'temp', operator: '==', value: 42 }, { temp: 42 })).toBe(true);
    });

    it('should match differing values with !=', () => {
      expect(holds({ field: 'event_type', operator: '!=', value: 'nenhum' }, { event_type: 'raio_seco' })).toBe(true);
      expect(holds({ field: 'event_type', operator: '!=', value: 'nenhum' }, { event_type: 'nenhum' })).toBe(false);
    });

    it('should compare by the operand kind, not by loose equality', () => {
      expect(holds({ field: 'temp', operator: '==', value: 42 }, { temp: '42' })).toBe(false);
      expect(holds({ field: 'code', operator: '==', value: '7' }, { code: 7 })).toBe(false);
    });

    it('should hold != when the value is of the other kind', () => {
      expect(holds({ field: 'temp', operator: '!=', value: 'hot' }, { temp: 42 })).toBe(true);
      expect(holds({ field: 'event_type', operator: '!=', value: 'nenhum' }, { event_type: 7 })).toBe(true);
      expect(holds({ field: 'temp', operator: '!=', value: 42 }, { temp: '42' })).toBe(true);
    });

    it('should fail ordering operators when the value is of the other kind', () => {
      expect(holds({ field: 'temp', operator: '>=', value: 40 }, { temp: '50' })).toBe(false);
    });

    it('should fail != when the value is NaN', () => {
      expect(holds({ field: 'temp', operator: '!=', value: 40 }, { temp: Number.NaN })).toBe(false);
    });
  });

  describe('missing fields', () => {
    it('should fail when the field is absent', () => {
      expect(holds({ field: 'temp', operator: '>', value: 40 }, {})).toBe(false);
      expect(holds({ field: 'event_type', operator: '!=', value: 'nenhum' }, {})).toBe(false);
    });

    it('should fail when the field is null', () => {
      expect(holds({ field: 'temp', operator: '!=', value: 40 }, { temp: null })).toBe(false);
    });

    it('should ignore inherited properties', () => {
      const record: Record<string, unknown> = Object.create({ temp: 50 });
      expect(holds({ field: 'temp', operator: '>', value: 40 }, record)).toBe(false);
    });
  });

  describe('isOrderingOperator', () => {
    it('should classify the six operators', () => {
      expect((['>', '<', '>=', '<='] as const).every((op) => isOrderingOperator(op))).toBe(true);
      expect(isOrderingOperator('==')).toBe(false);
      expect(isOrderingOperator('!=')).toBe(false);
    });
  });
});
