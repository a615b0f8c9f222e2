import type { ExprData } from './expr-data.js';
import { exprOperands } from './expr-data.js';
import type { Expr } from './expr.js';
import { unwrap } from './expr.js';
import { isEvenInteger } from '../dcp/curvature.js';
import type { Constraint } from '../constraints/constraint.js';
import { ge } from '../constraints/constraint.js';

/**
 * Constraints under which the expression is defined.
 *
 * Affine atoms add nothing. `power(x, p)` requires `x >= 0` unless p is
 * 0, 1 or an even integer.
 *
 * @example
 * ```ts
 * domain(power(x, 0.5));   // [x >= 0]
 * domain(power(x, 2));     // []
 * ```
 */
export function domain(expr: ExprData | Expr): Constraint[] {
  const data = unwrap(expr);
  const constraints = exprOperands(data).flatMap((operand) => domain(operand));
  if (data.kind === 'power' && needsNonnegativeArg(data.p)) {
    constraints.push(ge(data.arg, 0));
  }
  return constraints;
}

function needsNonnegativeArg(p: number): boolean {
  if (p === 0 || p === 1) return false;
  return !(p > 1 && isEvenInteger(p));
}
