import { describe, it, expect } from 'vitest';
import { validateConditionSyntax } from '../../src/chevrotain-parser/condition-parser';

describe('validateConditionSyntax', () => {
  describe('accepts', () => {
    it.each([
      ['score > 0.9', ['score']],
      ['quality > 0.95 && iterations < 100', ['quality', 'iterations']],
      ['not converged or abs(delta) <= tolerance', ['converged', 'delta', 'tolerance']],
      ['metrics.loss < 0.01', ['metrics.loss']],
      ['!done && ready', ['done', 'ready']],
      ["status === 'done'", ['status']],
      ['count % 2 == 0', ['count']],
    ])('%s', (condition, variables) => {
      expect(validateConditionSyntax(condition)).toEqual({ valid: true, variables });
    });

    it('parses arithmetic, unary minus and literals', () => {
      expect(validateConditionSyntax('(a + b) * 2 >= -c % 3')).toEqual({ valid: true, variables: ['a', 'b', 'c'] });
      expect(validateConditionSyntax('done == true')).toEqual({ valid: true, variables: ['done'] });
      expect(validateConditionSyntax('result != null')).toEqual({ valid: true, variables: ['result'] });
    });

    it('lists a repeated variable once', () => {
      expect(validateConditionSyntax('x > 1 and x < 5')).toEqual({ valid: true, variables: ['x'] });
    });

    it('treats identifiers that start with a keyword as names', () => {
      expect(validateConditionSyntax('order > 1 or nothing')).toEqual({ valid: true, variables: ['order', 'nothing'] });
    });
  });

  describe('rejects', () => {
    it('an empty condition', () => {
      expect(validateConditionSyntax('')).toEqual({ valid: false, error: 'condition is empty' });
      expect(validateConditionSyntax('   ')).toEqual({ valid: false, error: 'condition is empty' });
    });

    it('a character outside the grammar', () => {
      const result = validateConditionSyntax('score > #');
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.error.startsWith('unexpected character at offset 8')).toBe(true);
      }
    });

    it.each(['score >', 'a b', '(a > 1', '&& ready'])('%s', (condition) => {
      const result = validateConditionSyntax(condition);
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.error.length).toBeGreaterThan(0);
      }
    });
  });

  it('can be called again after a failed parse', () => {
    expect(validateConditionSyntax('a >').valid).toBe(false);
    expect(validateConditionSyntax('a > 1')).toEqual({ valid: true, variables: ['a'] });
  });
});
