import type { ExprData } from './expr-data.js';
import { newExprId } from './expr-data.js';
import type { ArrayData, ArrayInput } from './array-data.js';
import { toArrayData, isArrayInput } from './array-data.js';
import { vector, matrix } from './shape.js';
import { ExpressionError } from '../error.js';
import type { ExprInput } from './expr.js';
import { Expr, unwrap } from './expr.js';

/**
 * Create a constant expression from various input types.
 *
 * A one-dimensional input becomes a column vector.
 *
 * @example
 * ```ts
 * const c = constant(5);                    // Scalar
 * const v = constant([1, 2, 3]);            // (3, 1) column
 * const M = constant([[1, 2], [3, 4]]);     // (2, 2) matrix
 * ```
 */
export function constant(value: ArrayInput): Expr {
  return constantFromData(toArrayData(value));
}

/**
 * Create a constant expression from pre-built ArrayData.
 */
export function constantFromData(data: ArrayData): Expr {
  return new Expr({
    kind: 'constant',
    id: newExprId(),
    value: data,
  });
}

/**
 * Convert an operand to an expression node.
 *
 * Expressions pass through unchanged; numbers and arrays are wrapped in a
 * constant node whose shape and sign come from the value.
 */
export function castToConst(value: ExprInput): ExprData {
  if (isArrayInput(value)) {
    return constant(value).data;
  }
  return unwrap(value);
}

/**
 * Create a vector/matrix of zeros.
 *
 * @example
 * ```ts
 * const z = zeros(5);        // 5-element zero vector
 * const Z = zeros(3, 4);     // 3x4 zero matrix
 * ```
 */
export function zeros(n: number): Expr;
export function zeros(rows: number, cols: number): Expr;
export function zeros(rowsOrN: number, cols?: number): Expr {
  return filled(0, rowsOrN, cols);
}

/**
 * Create a vector/matrix of ones.
 *
 * @example
 * ```ts
 * const o = ones(5);        // 5-element ones vector
 * const O = ones(3, 4);     // 3x4 ones matrix
 * ```
 */
export function ones(n: number): Expr;
export function ones(rows: number, cols: number): Expr;
export function ones(rowsOrN: number, cols?: number): Expr {
  return filled(1, rowsOrN, cols);
}

function filled(fill: number, rowsOrN: number, cols?: number): Expr {
  const flat = cols === undefined;
  const shape = flat ? vector(rowsOrN) : matrix(rowsOrN, cols);
  const data = new Float64Array(shape.rows * shape.cols);
  data.fill(fill);
  return constantFromData({ type: 'dense', data, shape, flat });
}

/**
 * Create an identity matrix.
 *
 * @example
 * ```ts
 * const I = eye(3);  // 3x3 identity matrix
 * ```
 */
export function eye(n: number): Expr {
  const shape = matrix(n, n);
  const data = new Float64Array(n * n);
  for (let i = 0; i < n; i++) {
    data[i * n + i] = 1;
  }
  return constantFromData({ type: 'dense', data, shape, flat: false });
}

/**
 * Check if an expression is a constant leaf.
 */
export function isConstant(expr: ExprData | Expr): boolean {
  return unwrap(expr).kind === 'constant';
}

/**
 * Get the numeric value of a constant leaf.
 * Throws if the expression is not a constant.
 */
export function getConstantData(expr: ExprData | Expr): ArrayData {
  const e = unwrap(expr);
  if (e.kind !== 'constant') {
    throw new ExpressionError(`Expected constant, got ${e.kind}`);
  }
  return e.value;
}
