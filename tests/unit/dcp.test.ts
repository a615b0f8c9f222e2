import { describe, it, expect, beforeEach } from 'vitest';
import {
  variable,
  scalarVar,
  constant,
  zeros,
  Curvature,
  curvature,
  Sign,
  sign,
  isConstantExpr,
  isAffineExpr,
  isConvexExpr,
  isConcaveExpr,
  isPositiveExpr,
  isNegativeExpr,
  isZeroExpr,
  isDcp,
  resetExprIds,
} from '../../src/index.js';
import type { Expr } from '../../src/index.js';
import {
  addSign,
  mulSign,
  negateSign,
} from '../../src/dcp/index.js';
import { add, sub, neg, mul, div, transpose, index, power } from '../../src/atoms/index.js';
import { DisciplineViolation } from '../../src/error.js';

describe('Curvature', () => {
  beforeEach(() => {
    resetExprIds();
  });

  describe('leaf nodes', () => {
    it('variable is affine', () => {
      expect(curvature(variable(5))).toBe(Curvature.Affine);
    });

    it('constant is constant and DCP', () => {
      const c = constant([1, -2]);
      expect(curvature(c)).toBe(Curvature.Constant);
      expect(isDcp(c)).toBe(true);
      expect(isConvexExpr(c)).toBe(true);
      expect(isConcaveExpr(c)).toBe(true);
    });
  });

  describe('affine operations', () => {
    it('add of affine operands is affine', () => {
      const x = variable(5);
      const y = variable(5);
      expect(curvature(add(x, y))).toBe(Curvature.Affine);
      expect(curvature(add(x, [1, 2, 3, 4, 5]))).toBe(Curvature.Affine);
    });

    it('add of convex and concave is unknown', () => {
      const x = variable(3);
      const e = add(power(x, 2), power(x, 0.5));
      expect(curvature(e)).toBe(Curvature.Unknown);
      expect(isDcp(e)).toBe(false);
    });

    it('negation swaps convex and concave', () => {
      const x = variable(3);
      expect(curvature(neg(power(x, 2)))).toBe(Curvature.Concave);
      expect(curvature(neg(power(x, 0.5)))).toBe(Curvature.Convex);
    });

    it('multiplying by 5 keeps curvature and shape', () => {
      const x = scalarVar();
      const e = mul(5, x);
      expect(curvature(e)).toBe(curvature(x));
      expect(e.shape).toEqual({ rows: 1, cols: 1 });
    });

    it('negative scalar times convex is concave', () => {
      const x = variable(3);
      expect(curvature(mul(-2, power(x, 2)))).toBe(Curvature.Concave);
      expect(curvature(mul(2, power(x, 2)))).toBe(Curvature.Convex);
    });

    it('coefficient of unknown sign keeps only affine curvature', () => {
      const x = variable(2);
      const e = mul([1, -1], power(x, 2));
      expect(curvature(e)).toBe(Curvature.Unknown);
      expect(curvature(mul([1, -1], x))).toBe(Curvature.Affine);
    });

    it('multiplying by zero is constant', () => {
      const x = variable(2);
      const e = mul(0, power(x, 2));
      expect(isConstantExpr(e)).toBe(true);
      expect(curvature(e)).toBe(Curvature.Constant);
      expect(isDcp(e)).toBe(true);
    });

    it('dividing convex by a positive scalar stays convex', () => {
      const x = variable(2);
      expect(curvature(div(power(x, 2), 4))).toBe(Curvature.Convex);
      expect(curvature(div(power(x, 2), -4))).toBe(Curvature.Concave);
    });

    it('transpose and index keep curvature', () => {
      const X = variable([2, 3]);
      const e = power(X, 2);
      expect(curvature(transpose(e))).toBe(Curvature.Convex);
      expect(curvature(index(e, 0, 'all'))).toBe(Curvature.Convex);
    });
  });

  describe('power', () => {
    it('follows the exponent table', () => {
      const x = variable(3);
      expect(curvature(power(x, 0))).toBe(Curvature.Affine);
      expect(curvature(power(x, 1))).toBe(Curvature.Affine);
      expect(curvature(power(x, 0.5))).toBe(Curvature.Concave);
      expect(curvature(power(x, 2))).toBe(Curvature.Convex);
      expect(curvature(power(x, 3))).toBe(Curvature.Convex);
      expect(curvature(power(x, -1))).toBe(Curvature.Convex);
    });

    it('even power of a nonnegative convex argument is convex', () => {
      const x = variable(3);
      expect(curvature(power(power(x, 2), 2))).toBe(Curvature.Convex);
    });

    it('even power of a nonpositive concave argument is convex', () => {
      const x = variable(3);
      expect(curvature(power(neg(power(x, 2)), 2))).toBe(Curvature.Convex);
    });

    it('sqrt of a concave argument is concave', () => {
      const x = variable(3);
      expect(curvature(power(power(x, 0.5), 0.5))).toBe(Curvature.Concave);
    });

    it('rejects combinations outside the table', () => {
      const x = variable(3);
      expect(() => power(power(x, 2), 0.5)).toThrow(DisciplineViolation);
      expect(() => power(power(x, 0.5), 2)).toThrow(DisciplineViolation);
      expect(() => power(power(x, 0.5), 3)).toThrow(DisciplineViolation);
    });

    it('rejects non-finite exponents', () => {
      const x = variable(3);
      expect(() => power(x, Infinity)).toThrow(DisciplineViolation);
      expect(() => power(x, NaN)).toThrow(DisciplineViolation);
    });

    it('accepts any exponent of a constant', () => {
      expect(curvature(power(constant(-2), 0.5))).toBe(Curvature.Constant);
    });
  });

  describe('predicate consistency', () => {
    it('affine iff constant or convex and concave', () => {
      const x = variable(2);
      const nodes: Expr[] = [
        x,
        constant(3),
        add(x, 1),
        power(x, 2),
        power(x, 0.5),
        add(power(x, 2), power(x, 0.5)),
        mul(0, x),
        zeros(2),
      ];
      for (const n of nodes) {
        expect(isAffineExpr(n)).toBe(
          isConstantExpr(n) || (isConvexExpr(n) && isConcaveExpr(n))
        );
      }
    });

    it('zero sign iff positive and negative', () => {
      const x = variable(2, { nonneg: true });
      const nodes: Expr[] = [x, neg(x), constant(0), zeros(2), mul(0, x), constant([1, -1])];
      for (const n of nodes) {
        expect(sign(n) === Sign.Zero).toBe(isPositiveExpr(n) && isNegativeExpr(n));
      }
    });

    it('double transpose keeps shape, curvature and sign', () => {
      const X = variable([2, 3], { nonneg: true });
      const a = power(X, 2);
      const tt = transpose(transpose(a));
      expect(tt.shape).toEqual(a.shape);
      expect(curvature(tt)).toBe(curvature(a));
      expect(sign(tt)).toBe(sign(a));
    });

    it('transpose of a scalar is the same node', () => {
      const t = scalarVar();
      expect(transpose(t)).toBe(t);
      expect(t.T()).toBe(t);
    });
  });
});

describe('Sign', () => {
  beforeEach(() => {
    resetExprIds();
  });

  it('combines signs', () => {
    expect(addSign(Sign.Positive, Sign.Zero)).toBe(Sign.Positive);
    expect(addSign(Sign.Positive, Sign.Negative)).toBe(Sign.Unknown);
    expect(mulSign(Sign.Negative, Sign.Negative)).toBe(Sign.Positive);
    expect(mulSign(Sign.Negative, Sign.Positive)).toBe(Sign.Negative);
    expect(mulSign(Sign.Zero, Sign.Unknown)).toBe(Sign.Zero);
    expect(negateSign(Sign.Positive)).toBe(Sign.Negative);
  });

  it('variables follow their declared sign', () => {
    expect(sign(variable(2))).toBe(Sign.Unknown);
    expect(sign(variable(2, { nonneg: true }))).toBe(Sign.Positive);
    expect(sign(variable(2, { nonpos: true }))).toBe(Sign.Negative);
  });

  it('constants are classified from their values', () => {
    expect(sign(constant([1, 2]))).toBe(Sign.Positive);
    expect(sign(constant([-1, 0]))).toBe(Sign.Negative);
    expect(sign(constant([-1, 1]))).toBe(Sign.Unknown);
    expect(sign(constant(0))).toBe(Sign.Zero);
    expect(isZeroExpr(zeros(3))).toBe(true);
  });

  it('negation flips a definite sign', () => {
    const x = variable(2, { nonneg: true });
    expect(sign(neg(x))).toBe(Sign.Negative);
    expect(sign(neg(neg(x)))).toBe(Sign.Positive);
  });

  it('products and quotients take the product sign', () => {
    const x = variable(2, { nonneg: true });
    expect(sign(mul(-1, x))).toBe(Sign.Negative);
    expect(sign(div(x, -2))).toBe(Sign.Negative);
    expect(sign(mul(0, x))).toBe(Sign.Zero);
  });

  it('sums of like signs keep the sign', () => {
    const x = variable(2, { nonneg: true });
    const y = variable(2, { nonpos: true });
    expect(sign(add(x, 1))).toBe(Sign.Positive);
    expect(sign(sub(y, 1))).toBe(Sign.Negative);
    expect(sign(add(x, y))).toBe(Sign.Unknown);
  });

  it('powers are nonnegative except for p = 1', () => {
    const y = variable(2, { nonpos: true });
    expect(sign(power(y, 2))).toBe(Sign.Positive);
    expect(sign(power(y, 1))).toBe(Sign.Negative);
  });
});
