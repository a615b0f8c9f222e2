import { newExprId } from '../expr/expr-data.js';
import type { ExprInput } from '../expr/expr.js';
import { Expr } from '../expr/expr.js';
import { castToConst } from '../expr/constant.js';
import { curvature, Curvature } from '../dcp/curvature.js';
import { DisciplineViolation } from '../error.js';

/**
 * Element-wise power: x^p.
 *
 * | p            | curvature | requires                          |
 * |--------------|-----------|-----------------------------------|
 * | 0, 1         | affine    |                                   |
 * | (0, 1)       | concave   | concave argument, domain x >= 0   |
 * | even integer | convex    | affine, convex >= 0 or concave <= 0 argument |
 * | other p > 1  | convex    | convex argument, domain x >= 0    |
 * | p < 0        | convex    | concave argument, domain x >= 0   |
 *
 * @example
 * ```ts
 * power(x, 2)      // x^2, convex
 * power(x, 0.5)    // sqrt(x), concave
 * power(x, -1)     // 1/x, convex
 * ```
 */
export function power(arg: ExprInput, p: number): Expr {
  if (!Number.isFinite(p)) {
    throw new DisciplineViolation('power', `exponent must be a finite number, got ${p}`);
  }
  const a = castToConst(arg);
  const result = new Expr({ kind: 'power', id: newExprId(), arg: a, p });
  if (curvature(result.data) === Curvature.Unknown) {
    throw new DisciplineViolation(
      'power',
      `power(${curvature(a)}, ${p}) is neither convex nor concave`
    );
  }
  return result;
}
