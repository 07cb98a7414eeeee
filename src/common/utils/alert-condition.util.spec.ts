import { evaluateCondition, parseFilterExpression, parseNumericThreshold } from './alert-condition.util';

describe('alert-condition.util', () => {
  describe('evaluateCondition', () => {
    it('compares numerically when the threshold is numeric', () => {
      expect(evaluateCondition('>', '80', { kind: 'numeric', value: 85 })).toBe(true);
      expect(evaluateCondition('>', '80', { kind: 'numeric', value: 75 })).toBe(false);
      expect(evaluateCondition('<', '10', { kind: 'numeric', value: 9.5 })).toBe(true);
      expect(evaluateCondition('==', '42', { kind: 'numeric', value: 42 })).toBe(true);
      expect(evaluateCondition('!=', '42', { kind: 'numeric', value: 42 })).toBe(false);
    });

    it('treats an equal value as not greater', () => {
      expect(evaluateCondition('>', '80', { kind: 'numeric', value: 80 })).toBe(false);
    });

    it('compares the string form for non-numeric values', () => {
      expect(evaluateCondition('==', 'offline', { kind: 'string', value: 'offline' })).toBe(true);
      expect(evaluateCondition('!=', 'offline', { kind: 'string', value: 'online' })).toBe(true);
      expect(evaluateCondition('==', 'true', { kind: 'boolean', value: true })).toBe(true);
    });

    it('never matches ordering conditions on non-numeric input', () => {
      expect(evaluateCondition('>', '80', { kind: 'string', value: '90' })).toBe(false);
      expect(evaluateCondition('<', 'abc', { kind: 'numeric', value: 1 })).toBe(false);
    });
  });

  describe('parseNumericThreshold', () => {
    it('parses trimmed numbers and rejects the rest', () => {
      expect(parseNumericThreshold(' 12.5 ')).toBe(12.5);
      expect(parseNumericThreshold('')).toBeNull();
      expect(parseNumericThreshold('high')).toBeNull();
    });
  });

  describe('parseFilterExpression', () => {
    it('splits operator and operand', () => {
      expect(parseFilterExpression('> 80')).toEqual({ condition: '>', threshold: '80' });
      expect(parseFilterExpression('== online')).toEqual({ condition: '==', threshold: 'online' });
    });

    it('rejects unknown operators', () => {
      expect(parseFilterExpression('>= 80')).toBeNull();
      expect(parseFilterExpression('80')).toBeNull();
    });
  });
});
