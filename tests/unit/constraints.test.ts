import { describe, it, expect, beforeEach } from 'vitest';
import {
  variable,
  scalarVar,
  zeros,
  resetExprIds,
  structurallyEqual,
  exprName,
  eq,
  le,
  ge,
  lt,
  gt,
  psdGe,
  psdLe,
  residual,
  constraintVariables,
  isDcpConstraint,
  validateDcpConstraint,
  describeConstraint,
} from '../../src/index.js';
import { power } from '../../src/atoms/index.js';
import { DimensionMismatch, DisciplineViolation } from '../../src/error.js';

describe('Constraints', () => {
  beforeEach(() => {
    resetExprIds();
  });

  describe('comparisons', () => {
    it('x <= 3 references x and the constant 3', () => {
      const x = scalarVar({ name: 'x' });
      const c = x.le(3);
      expect(c.kind).toBe('leq');
      expect(c.lhs).toBe(x.data);
      expect(c.rhs.kind).toBe('constant');
      if (c.rhs.kind === 'constant') {
        expect(c.rhs.value).toEqual({ type: 'scalar', value: 3 });
      }
      expect(constraintVariables(c)).toEqual(new Set([x.id]));
    });

    it('x == x has structurally equal operands', () => {
      const x = variable(2);
      const c = x.eq(x);
      expect(c.kind).toBe('eq');
      expect(structurallyEqual(c.lhs, c.rhs)).toBe(true);
    });

    it('ge is the reflected le', () => {
      const x = variable(2);
      const c = ge(x, 0);
      expect(c.kind).toBe('leq');
      expect(c.rhs).toBe(x.data);
      expect(c.lhs.kind).toBe('constant');
    });

    it('strict comparisons are aliases', () => {
      const x = variable(2);
      expect(lt(x, 1).kind).toBe('leq');
      expect(lt(x, 1).lhs).toBe(x.data);
      expect(gt(x, 1).rhs).toBe(x.data);
      expect(x.lt(1).kind).toBe('leq');
      expect(x.gt(1).kind).toBe('leq');
    });

    it('casts a left-hand number', () => {
      const x = variable(2);
      expect(le(0, x).lhs.kind).toBe('constant');
    });

    it('rejects incompatible shapes', () => {
      expect(() => eq(variable(3), variable(2))).toThrow(DimensionMismatch);
      expect(() => le(variable(3), [1, 2])).toThrow(DimensionMismatch);
    });

    it('collects variables from both sides', () => {
      const x = variable(2);
      const y = variable(2);
      expect(constraintVariables(eq(x, y))).toEqual(new Set([x.id, y.id]));
    });
  });

  describe('matrix inequalities', () => {
    it('psdGe keeps the operand order', () => {
      const X = variable([2, 2]);
      const Y = variable([2, 2]);
      const c = psdGe(X, Y);
      expect(c.kind).toBe('psd');
      expect(c.lhs).toBe(X.data);
      expect(c.rhs).toBe(Y.data);
    });

    it('psdLe swaps the operands', () => {
      const X = variable([2, 2]);
      const Y = variable([2, 2]);
      const c = X.psdLe(Y);
      expect(c.lhs).toBe(Y.data);
      expect(c.rhs).toBe(X.data);
    });

    it('requires square operands of the same shape', () => {
      expect(() => psdGe(variable([2, 3]), variable([2, 3]))).toThrow(DimensionMismatch);
      expect(() => psdGe(variable([2, 2]), variable([3, 3]))).toThrow(DimensionMismatch);
    });

    it('does not check curvature when built', () => {
      const X = variable([2, 2]);
      const c = psdGe(power(X, 2), zeros(2, 2));
      expect(c.kind).toBe('psd');
      expect(isDcpConstraint(c)).toBe(false);
    });
  });

  describe('DCP', () => {
    it('accepts convex <= concave', () => {
      const x = variable(2);
      expect(isDcpConstraint(le(power(x, 2), 1))).toBe(true);
      expect(isDcpConstraint(ge(power(x, 0.5), 1))).toBe(true);
    });

    it('rejects convex >= constant', () => {
      const x = variable(2);
      const c = ge(power(x, 2), 1);
      expect(isDcpConstraint(c)).toBe(false);
      expect(() => validateDcpConstraint(c)).toThrow(
        'DCP violation in leq: inequality requires convex <= concave, got constant <= convex'
      );
    });

    it('requires affine equalities', () => {
      const x = variable(2);
      expect(isDcpConstraint(eq(x, 1))).toBe(true);
      const c = eq(power(x, 2), 1);
      expect(isDcpConstraint(c)).toBe(false);
      expect(() => validateDcpConstraint(c)).toThrow(DisciplineViolation);
    });

    it('accepts affine matrix inequalities', () => {
      const X = variable([2, 2]);
      expect(isDcpConstraint(psdGe(X, zeros(2, 2)))).toBe(true);
      expect(() => validateDcpConstraint(psdGe(X, zeros(2, 2)))).not.toThrow();
    });
  });

  describe('printing', () => {
    it('describes constraints', () => {
      const x = scalarVar({ name: 'x' });
      const X = variable([2, 2], { name: 'X' });
      const Y = variable([2, 2], { name: 'Y' });
      expect(describeConstraint(le(x, 3))).toBe('x <= 3');
      expect(describeConstraint(ge(x, 0))).toBe('0 <= x');
      expect(describeConstraint(eq(x, 1))).toBe('x == 1');
      expect(describeConstraint(psdLe(X, Y))).toBe('Y >> X');
    });

    it('builds the residual', () => {
      const x = scalarVar({ name: 'x' });
      expect(exprName(residual(le(x, 3)))).toBe('x - 3');
    });
  });
});
