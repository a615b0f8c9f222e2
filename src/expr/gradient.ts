import type { ExprData, ExprId } from './expr-data.js';
import { exprShape } from './expr-data.js';
import { size, isScalar } from './shape.js';
import type { Expr } from './expr.js';
import { unwrap } from './expr.js';
import type { VariableValues } from './evaluate.js';
import { evaluate } from './evaluate.js';
import type { CscMatrix } from '../sparse/csc.js';
import {
  cscAdd,
  cscDiag,
  cscFromTriplets,
  cscIdentity,
  cscMulMat,
  cscScale,
} from '../sparse/csc.js';

/**
 * Gradient blocks keyed by variable id.
 *
 * Block `G[v]` has shape (size(v), size(expr)): column k holds the gradient
 * of element k of the vectorized (column-major) expression.
 */
export type Gradient = Map<ExprId, CscMatrix>;

/**
 * Gradient of an expression with respect to each variable it depends on.
 *
 * Affine expressions need no variable values. Returns undefined when a
 * value needed by a nonlinear atom is missing, or the derivative is not
 * finite there.
 *
 * @example
 * ```ts
 * const x = variable(2);
 * const g = gradient(x.power(2), new Map([[x.id, new Float64Array([1, 3])]]));
 * cscToDense(g.get(x.id));  // [2, 0, 0, 6]
 * ```
 */
export function gradient(expr: ExprData | Expr, values?: VariableValues): Gradient | undefined {
  return grad(unwrap(expr), values);
}

function grad(expr: ExprData, values: VariableValues | undefined): Gradient | undefined {
  switch (expr.kind) {
    case 'variable':
      return new Map([[expr.id, cscIdentity(size(expr.shape))]]);

    case 'constant':
      return new Map();

    case 'add': {
      const n = size(exprShape(expr));
      const left = grad(expr.left, values);
      const right = grad(expr.right, values);
      if (left === undefined || right === undefined) return undefined;
      return sumGradients(promote(left, expr.left, n), promote(right, expr.right, n));
    }

    case 'neg': {
      const arg = grad(expr.arg, values);
      return arg && mapBlocks(arg, (block) => cscScale(block, -1));
    }

    case 'mul': {
      // left is the constant coefficient
      const coefficient = evaluate(expr.left, values);
      const arg = grad(expr.right, values);
      if (coefficient === undefined || arg === undefined) return undefined;
      return chain(arg, mulJacobian(coefficient, expr.left, expr.right));
    }

    case 'rmul': {
      const coefficient = evaluate(expr.right, values);
      const arg = grad(expr.left, values);
      if (coefficient === undefined || arg === undefined) return undefined;
      return chain(arg, rmulJacobian(coefficient, expr.left, expr.right));
    }

    case 'div': {
      const divisor = evaluate(expr.right, values);
      const arg = grad(expr.left, values);
      if (divisor === undefined || arg === undefined) return undefined;
      const scale = 1 / divisor[0];
      return mapBlocks(arg, (block) => cscScale(block, scale));
    }

    case 'power': {
      const argValue = evaluate(expr.arg, values);
      const arg = grad(expr.arg, values);
      if (argValue === undefined || arg === undefined) return undefined;
      const p = expr.p;
      const derivative = argValue.map((v) => (p === 0 ? 0 : p * Math.pow(v, p - 1)));
      if (!derivative.every(Number.isFinite)) return undefined;
      return chain(arg, cscDiag(derivative));
    }

    case 'transpose': {
      const arg = grad(expr.arg, values);
      if (arg === undefined) return undefined;
      const { rows: m, cols: n } = exprShape(expr.arg);
      const rows: number[] = [];
      const cols: number[] = [];
      for (let j = 0; j < n; j++) {
        for (let i = 0; i < m; i++) {
          rows.push(i + j * m);
          cols.push(j + i * n);
        }
      }
      return chain(arg, cscFromTriplets(m * n, m * n, rows, cols, rows.map(() => 1)));
    }

    case 'index': {
      const arg = grad(expr.arg, values);
      if (arg === undefined) return undefined;
      const k = expr.selection.length;
      const cols = expr.selection.map((_, i) => i);
      const selector = cscFromTriplets(
        size(exprShape(expr.arg)),
        k,
        expr.selection,
        cols,
        cols.map(() => 1)
      );
      return chain(arg, selector);
    }
  }
}

/** Apply the transposed Jacobian of an atom to every block */
function chain(arg: Gradient, jacobianT: CscMatrix): Gradient {
  return mapBlocks(arg, (block) => cscMulMat(block, jacobianT));
}

function mapBlocks(g: Gradient, fn: (block: CscMatrix) => CscMatrix): Gradient {
  const result: Gradient = new Map();
  for (const [id, block] of g) {
    result.set(id, fn(block));
  }
  return result;
}

function sumGradients(a: Gradient, b: Gradient): Gradient {
  const result: Gradient = new Map(a);
  for (const [id, block] of b) {
    const existing = result.get(id);
    result.set(id, existing ? cscAdd(existing, block) : block);
  }
  return result;
}

/** A scalar operand of a sum is broadcast to n elements */
function promote(g: Gradient, operand: ExprData, n: number): Gradient {
  if (size(exprShape(operand)) === n) return g;
  const ones = cscFromTriplets(1, n, new Array<number>(n).fill(0), range(n), new Array<number>(n).fill(1));
  return chain(g, ones);
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/**
 * Transposed Jacobian of C @ X with respect to X, with C constant.
 */
function mulJacobian(c: Float64Array, coefficient: ExprData, arg: ExprData): CscMatrix {
  const cShape = exprShape(coefficient);
  const xShape = exprShape(arg);
  const xSize = size(xShape);

  if (isScalar(cShape)) {
    return cscScale(cscIdentity(xSize), c[0]);
  }
  if (isScalar(xShape)) {
    // C * x: every element depends on x through vec(C)
    return cscFromTriplets(1, c.length, new Array<number>(c.length).fill(0), range(c.length), Array.from(c));
  }

  // I_r ⊗ C^T
  const p = cShape.rows;
  const q = cShape.cols;
  const r = xShape.cols;
  const rows: number[] = [];
  const cols: number[] = [];
  const vals: number[] = [];
  for (let b = 0; b < r; b++) {
    for (let col = 0; col < q; col++) {
      for (let row = 0; row < p; row++) {
        rows.push(b * q + col);
        cols.push(b * p + row);
        vals.push(c[row + col * p]);
      }
    }
  }
  return cscFromTriplets(q * r, p * r, rows, cols, vals);
}

/**
 * Transposed Jacobian of X @ C with respect to X, with C constant.
 */
function rmulJacobian(c: Float64Array, arg: ExprData, coefficient: ExprData): CscMatrix {
  const xShape = exprShape(arg);
  const cShape = exprShape(coefficient);

  // C ⊗ I_p
  const p = xShape.rows;
  const q = cShape.rows;
  const r = cShape.cols;
  const rows: number[] = [];
  const cols: number[] = [];
  const vals: number[] = [];
  for (let b = 0; b < r; b++) {
    for (let a = 0; a < q; a++) {
      for (let i = 0; i < p; i++) {
        rows.push(a * p + i);
        cols.push(b * p + i);
        vals.push(c[a + b * q]);
      }
    }
  }
  return cscFromTriplets(p * q, p * r, rows, cols, vals);
}

