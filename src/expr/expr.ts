import type { ExprData, ExprId } from './expr-data.js';
import { exprShape } from './expr-data.js';
import type { Shape } from './shape.js';
import { isScalar, isVector, isMatrix } from './shape.js';
import type { ArrayInput } from './array-data.js';
import type { IndexKey } from './key.js';
import type { Constraint } from '../constraints/constraint.js';
import type { CscMatrix } from '../sparse/csc.js';
import type { Curvature, Sign } from '../dcp/index.js';
import {
  curvature,
  sign,
  isConstantExpr,
  isAffineExpr,
  isConvexExpr,
  isConcaveExpr,
  isPositiveExpr,
  isNegativeExpr,
  isZeroExpr,
  isDcp,
} from '../dcp/index.js';
import {
  add as addFn,
  sub as subFn,
  neg as negFn,
  mul as mulFn,
  div as divFn,
  transpose as transposeFn,
  index as indexFn,
} from '../atoms/affine.js';
import { power as powerFn } from '../atoms/power.js';
import {
  eq as eqFn,
  le as leFn,
  lt as ltFn,
  ge as geFn,
  gt as gtFn,
  psdGe as psdGeFn,
  psdLe as psdLeFn,
} from '../constraints/constraint.js';
import { constant } from './constant.js';
import type { VariableValues } from './evaluate.js';
import { evaluate } from './evaluate.js';
import { gradient as gradientFn } from './gradient.js';
import { domain as domainFn } from './domain.js';
import { exprName, describeExpr } from './name.js';

/**
 * Input type for Expr methods - accepts Expr, ExprData, numbers, or arrays.
 */
export type ExprInput = Expr | ExprData | ArrayInput;

/**
 * Get the node behind an expression.
 */
export function unwrap(expr: ExprData | Expr): ExprData {
  return expr instanceof Expr ? expr.data : expr;
}

/**
 * Expression wrapper class providing fluent method chaining.
 *
 * This class wraps the underlying `ExprData` discriminated union. Every
 * method builds a new node; the receiver is never modified. Right operands
 * may be numbers or arrays, which become constants.
 *
 * @example
 * ```ts
 * const x = variable(3);
 * const A = constant([[1, 2, 3], [4, 5, 6]]);
 * const r = A.mul(x).sub([1, 1]);
 * r.power(2).curvature;   // Curvature.Convex
 * r.le(0);                // constraint
 * ```
 */
export class Expr {
  /**
   * The underlying expression data (discriminated union).
   */
  public readonly data: ExprData;

  constructor(data: ExprData) {
    this.data = data;
  }

  // ==================== Properties ====================

  /** Unique node id */
  get id(): ExprId {
    return this.data.id;
  }

  get shape(): Shape {
    return exprShape(this.data);
  }

  get kind(): ExprData['kind'] {
    return this.data.kind;
  }

  get curvature(): Curvature {
    return curvature(this.data);
  }

  get sign(): Sign {
    return sign(this.data);
  }

  // ==================== Arithmetic Operations ====================

  /**
   * Add another expression to this one.
   *
   * @example
   * ```ts
   * x.add(y)       // x + y
   * x.add(5)       // x + 5 (auto-wraps constant)
   * ```
   */
  add(other: ExprInput): Expr {
    return addFn(this.data, other);
  }

  /** Subtract: this - other */
  sub(other: ExprInput): Expr {
    return subFn(this.data, other);
  }

  neg(): Expr {
    return negFn(this.data);
  }

  /**
   * Multiply by another expression; one side must be constant.
   *
   * @example
   * ```ts
   * x.mul(2)       // x * 2
   * A.mul(x)       // A @ x (A constant)
   * x.T().mul(A)   // x' @ A
   * ```
   */
  mul(other: ExprInput): Expr {
    return mulFn(this.data, other);
  }

  /**
   * Divide by a scalar constant.
   *
   * @example
   * ```ts
   * x.div(2)       // x / 2
   * ```
   */
  div(other: ExprInput): Expr {
    return divFn(this.data, other);
  }

  /**
   * Element-wise power: x^p.
   *
   * @example
   * ```ts
   * x.power(2)     // x^2
   * x.power(0.5)   // sqrt(x)
   * ```
   */
  power(p: number): Expr {
    return powerFn(this.data, p);
  }

  // ==================== Shape Operations ====================

  /**
   * Transpose. A scalar is returned as is.
   *
   * @example
   * ```ts
   * A.T()          // A'
   * ```
   */
  T(): Expr {
    return isScalar(this.shape) ? this : transposeFn(this.data);
  }

  /** Alias for T() */
  transpose(): Expr {
    return this.T();
  }

  /**
   * Index into this expression.
   *
   * @example
   * ```ts
   * x.index(0)                   // x[0]
   * x.index(slice(1, 3))         // x[1:3]
   * A.index('all', 0)            // A[:, 0]
   * A.index([0, 1], [1, 0])      // A[[0, 1], [1, 0]]
   * ```
   */
  index(...keys: IndexKey[]): Expr {
    return indexFn(this.data, ...keys);
  }

  // ==================== Constraint Methods ====================

  /** Equality constraint: this == other */
  eq(other: ExprInput): Constraint {
    return eqFn(this.data, other);
  }

  /** Inequality constraint: this <= other */
  le(other: ExprInput): Constraint {
    return leFn(this.data, other);
  }

  /** Same as le(); inequalities are never strict */
  lt(other: ExprInput): Constraint {
    return ltFn(this.data, other);
  }

  /** Inequality constraint: this >= other */
  ge(other: ExprInput): Constraint {
    return geFn(this.data, other);
  }

  /** Same as ge() */
  gt(other: ExprInput): Constraint {
    return gtFn(this.data, other);
  }

  /** Matrix inequality: this - other is positive semidefinite */
  psdGe(other: ExprInput): Constraint {
    return psdGeFn(this.data, other);
  }

  /** Matrix inequality: other - this is positive semidefinite */
  psdLe(other: ExprInput): Constraint {
    return psdLeFn(this.data, other);
  }

  // ==================== Analysis ====================

  isConstant(): boolean {
    return isConstantExpr(this.data);
  }

  isAffine(): boolean {
    return isAffineExpr(this.data);
  }

  isConvex(): boolean {
    return isConvexExpr(this.data);
  }

  isConcave(): boolean {
    return isConcaveExpr(this.data);
  }

  isPositive(): boolean {
    return isPositiveExpr(this.data);
  }

  isNegative(): boolean {
    return isNegativeExpr(this.data);
  }

  isZero(): boolean {
    return isZeroExpr(this.data);
  }

  isDcp(): boolean {
    return isDcp(this.data);
  }

  isScalar(): boolean {
    return isScalar(this.shape);
  }

  isVector(): boolean {
    return isVector(this.shape);
  }

  isMatrix(): boolean {
    return isMatrix(this.shape);
  }

  // ==================== Evaluation ====================

  /**
   * Numeric value (column-major), or undefined when a variable has no value.
   *
   * @example
   * ```ts
   * const x = variable(2);
   * x.mul(3).value(new Map([[x.id, new Float64Array([1, 2])]]));  // [3, 6]
   * ```
   */
  value(values?: VariableValues): Float64Array | undefined {
    return evaluate(this.data, values);
  }

  /** Gradient blocks keyed by variable id */
  gradient(values?: VariableValues): Map<ExprId, CscMatrix> | undefined {
    return gradientFn(this.data, values);
  }

  /** Constraints under which this expression is defined */
  domain(): Constraint[] {
    return domainFn(this.data);
  }

  name(): string {
    return exprName(this.data);
  }

  toString(): string {
    return exprName(this.data);
  }

  /** e.g. `Expression(convex, positive, (3, 1))` */
  describe(): string {
    return describeExpr(this.data);
  }

  /**
   * Create an Expr from a constant value.
   *
   * @example
   * ```ts
   * Expr.constant(5)
   * Expr.constant([1, 2, 3])
   * Expr.constant([[1, 2], [3, 4]])
   * ```
   */
  static constant(value: ArrayInput): Expr {
    return constant(value);
  }
}

/**
 * Wrap ExprData in an Expr for fluent API access.
 */
export function wrap(data: ExprData): Expr {
  return new Expr(data);
}

/**
 * Check if a value is an Expr instance.
 */
export function isExpr(value: unknown): value is Expr {
  return value instanceof Expr;
}
