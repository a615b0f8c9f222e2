import type { ExprData, ExprId } from './expr-data.js';
import { exprShape } from './expr-data.js';
import type { Shape } from './shape.js';
import { isScalar } from './shape.js';
import { arrayDataValues, transposeValues, checkValueSize } from './array-data.js';
import type { Expr } from './expr.js';
import { unwrap } from './expr.js';
import { ExpressionError } from '../error.js';

/**
 * Variable values mapping - variable ID to its column-major values.
 */
export type VariableValues = ReadonlyMap<ExprId, Float64Array>;

const NO_VALUES: VariableValues = new Map();

/**
 * Evaluate an expression given variable values.
 *
 * Returns a fresh array of the column-major values of the expression, or
 * undefined when a variable it depends on has no value.
 *
 * @example
 * ```ts
 * const x = variable(3);
 * const values = new Map([[x.id, new Float64Array([1, 2, 3])]]);
 * evaluate(x.mul(2), values);  // Float64Array [2, 4, 6]
 * ```
 */
export function evaluate(
  expr: ExprData | Expr,
  values: VariableValues = NO_VALUES
): Float64Array | undefined {
  return evalExpr(unwrap(expr), values);
}

/**
 * Evaluate an expression and return a scalar value.
 * Throws if the result is not a scalar.
 */
export function evaluateScalar(
  expr: ExprData | Expr,
  values: VariableValues = NO_VALUES
): number | undefined {
  const result = evaluate(expr, values);
  if (result === undefined) return undefined;
  if (result.length !== 1) {
    throw new ExpressionError(`Expected scalar result, got ${result.length} elements`);
  }
  return result[0];
}

function evalExpr(expr: ExprData, values: VariableValues): Float64Array | undefined {
  switch (expr.kind) {
    case 'variable': {
      const val = values.get(expr.id);
      if (val === undefined) return undefined;
      checkValueSize('value', val, expr.shape);
      return val.slice();
    }

    // leaves are copied so callers cannot write into a node or a values map
    case 'constant':
      return arrayDataValues(expr.value).slice();

    case 'add': {
      const left = evalExpr(expr.left, values);
      const right = evalExpr(expr.right, values);
      if (left === undefined || right === undefined) return undefined;
      return broadcast(left, right, (a, b) => a + b);
    }

    case 'neg': {
      const arg = evalExpr(expr.arg, values);
      return arg?.map((v) => -v);
    }

    case 'mul':
    case 'rmul': {
      const left = evalExpr(expr.left, values);
      const right = evalExpr(expr.right, values);
      if (left === undefined || right === undefined) return undefined;
      const leftShape = exprShape(expr.left);
      const rightShape = exprShape(expr.right);
      if (isScalar(leftShape) || isScalar(rightShape)) {
        return broadcast(left, right, (a, b) => a * b);
      }
      return matmul(left, leftShape, right, rightShape);
    }

    case 'div': {
      const left = evalExpr(expr.left, values);
      const right = evalExpr(expr.right, values);
      if (left === undefined || right === undefined) return undefined;
      return broadcast(left, right, (a, b) => a / b);
    }

    case 'power': {
      const arg = evalExpr(expr.arg, values);
      if (arg === undefined) return undefined;
      const p = expr.p;
      return arg.map((v) => (p === 0 ? 1 : Math.pow(v, p)));
    }

    case 'transpose': {
      const arg = evalExpr(expr.arg, values);
      return arg && transposeValues(arg, exprShape(expr.arg));
    }

    case 'index': {
      const arg = evalExpr(expr.arg, values);
      if (arg === undefined) return undefined;
      return Float64Array.from(expr.selection, (k) => arg[k]);
    }
  }
}

function broadcast(
  left: Float64Array,
  right: Float64Array,
  op: (a: number, b: number) => number
): Float64Array {
  // Handle scalar broadcasting
  if (left.length === 1 && right.length > 1) {
    const scalar = left[0];
    return right.map((v) => op(scalar, v));
  }
  if (right.length === 1 && left.length > 1) {
    const scalar = right[0];
    return left.map((v) => op(v, scalar));
  }
  const result = new Float64Array(left.length);
  for (let i = 0; i < left.length; i++) {
    result[i] = op(left[i], right[i]);
  }
  return result;
}

/** Column-major matrix product */
function matmul(left: Float64Array, leftShape: Shape, right: Float64Array, rightShape: Shape): Float64Array {
  const m = leftShape.rows;
  const k = leftShape.cols;
  const n = rightShape.cols;
  const result = new Float64Array(m * n);
  for (let jout = 0; jout < n; jout++) {
    for (let i = 0; i < m; i++) {
      let sum = 0;
      for (let jin = 0; jin < k; jin++) {
        sum += left[jin * m + i] * right[jout * k + jin];
      }
      result[jout * m + i] = sum;
    }
  }
  return result;
}
