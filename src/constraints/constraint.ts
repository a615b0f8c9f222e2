import type { ExprData, ExprId } from '../expr/expr-data.js';
import { exprShape, exprVariables, newExprId } from '../expr/expr-data.js';
import { sumShapes, isSquare, shapeEquals, shapeToString } from '../expr/shape.js';
import type { ExprInput, Expr } from '../expr/expr.js';
import { castToConst } from '../expr/constant.js';
import { sub } from '../atoms/affine.js';
import { exprName } from '../expr/name.js';
import { curvature, isAffineExpr, isConvexExpr, isConcaveExpr } from '../dcp/curvature.js';
import { DimensionMismatch, DisciplineViolation } from '../error.js';

/**
 * Constraint types for optimization problems.
 *
 * - eq: lhs == rhs
 * - leq: lhs <= rhs
 * - psd: lhs - rhs is positive semidefinite
 */
export interface Constraint {
  readonly kind: 'eq' | 'leq' | 'psd';
  readonly id: ExprId;
  readonly lhs: ExprData;
  readonly rhs: ExprData;
}

export type ConstraintKind = Constraint['kind'];

/**
 * Create an equality constraint: lhs == rhs
 *
 * @example
 * ```ts
 * eq(x, 1)       // x == 1
 * ```
 */
export function eq(lhs: ExprInput, rhs: ExprInput): Constraint {
  return comparison('eq', lhs, rhs);
}

/**
 * Create an inequality constraint: lhs <= rhs
 *
 * @example
 * ```ts
 * le(x, 10)        // x <= 10
 * le(power(x, 2), 1)
 * ```
 */
export function le(lhs: ExprInput, rhs: ExprInput): Constraint {
  return comparison('leq', lhs, rhs);
}

/**
 * Create an inequality constraint: lhs >= rhs, stored as rhs <= lhs.
 *
 * @example
 * ```ts
 * ge(x, 0)      // 0 <= x
 * ```
 */
export function ge(lhs: ExprInput, rhs: ExprInput): Constraint {
  return comparison('leq', rhs, lhs);
}

/** Strict comparisons are not distinguished from non-strict ones */
export const lt = le;
export const gt = ge;

/**
 * Matrix inequality lhs >> rhs: lhs - rhs is positive semidefinite.
 *
 * Both sides must be square with the same shape.
 */
export function psdGe(lhs: ExprInput, rhs: ExprInput): Constraint {
  return psd(castToConst(lhs), castToConst(rhs));
}

/** Matrix inequality lhs << rhs: rhs - lhs is positive semidefinite */
export function psdLe(lhs: ExprInput, rhs: ExprInput): Constraint {
  return psd(castToConst(rhs), castToConst(lhs));
}

function comparison(kind: 'eq' | 'leq', lhs: ExprInput, rhs: ExprInput): Constraint {
  const l = castToConst(lhs);
  const r = castToConst(rhs);
  sumShapes(kind, exprShape(l), exprShape(r));
  return { kind, id: newExprId(), lhs: l, rhs: r };
}

function psd(lhs: ExprData, rhs: ExprData): Constraint {
  const lShape = exprShape(lhs);
  const rShape = exprShape(rhs);
  if (!isSquare(lShape) || !isSquare(rShape) || !shapeEquals(lShape, rShape)) {
    throw new DimensionMismatch(
      'psd',
      shapeToString(lShape),
      shapeToString(rShape),
      'operands must be square with the same shape'
    );
  }
  return { kind: 'psd', id: newExprId(), lhs, rhs };
}

/**
 * The expression lhs - rhs.
 */
export function residual(constraint: Constraint): Expr {
  return sub(constraint.lhs, constraint.rhs);
}

/**
 * Get all variables referenced in a constraint.
 */
export function constraintVariables(constraint: Constraint): Set<ExprId> {
  const vars = exprVariables(constraint.lhs);
  for (const v of exprVariables(constraint.rhs)) {
    vars.add(v);
  }
  return vars;
}

/**
 * Check if a constraint satisfies DCP rules.
 *
 * - eq: both sides affine
 * - leq: convex <= concave
 * - psd: both sides affine
 */
export function isDcpConstraint(constraint: Constraint): boolean {
  switch (constraint.kind) {
    case 'eq':
    case 'psd':
      return isAffineExpr(constraint.lhs) && isAffineExpr(constraint.rhs);
    case 'leq':
      return isConvexExpr(constraint.lhs) && isConcaveExpr(constraint.rhs);
  }
}

/**
 * Validate that a constraint satisfies DCP rules.
 * Throws DisciplineViolation if not.
 */
export function validateDcpConstraint(constraint: Constraint): void {
  if (isDcpConstraint(constraint)) return;

  const l = curvature(constraint.lhs);
  const r = curvature(constraint.rhs);
  switch (constraint.kind) {
    case 'eq':
      throw new DisciplineViolation('eq', `equality requires affine operands, got ${l} == ${r}`);
    case 'leq':
      throw new DisciplineViolation('leq', `inequality requires convex <= concave, got ${l} <= ${r}`);
    case 'psd':
      throw new DisciplineViolation('psd', `matrix inequality requires affine operands, got ${l} and ${r}`);
  }
}

/**
 * Printable form of a constraint.
 *
 * @example
 * ```ts
 * describeConstraint(le(x, 3));  // "x <= 3"
 * ```
 */
export function describeConstraint(constraint: Constraint): string {
  const op = { eq: '==', leq: '<=', psd: '>>' }[constraint.kind];
  return `${exprName(constraint.lhs)} ${op} ${exprName(constraint.rhs)}`;
}
