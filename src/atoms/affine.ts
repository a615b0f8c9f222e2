import type { ExprData } from '../expr/expr-data.js';
import { exprShape, exprVariables, newExprId } from '../expr/expr-data.js';
import { sumShapes, mulShapes, isScalar, isSquare, shapeToString } from '../expr/shape.js';
import type { IndexKey } from '../expr/key.js';
import { resolveKey } from '../expr/key.js';
import type { ExprInput } from '../expr/expr.js';
import { Expr } from '../expr/expr.js';
import { castToConst } from '../expr/constant.js';
import { evaluate } from '../expr/evaluate.js';
import { isConstantExpr } from '../dcp/curvature.js';
import { isZeroExpr } from '../dcp/sign.js';
import { DisciplineViolation } from '../error.js';

/**
 * Add two expressions.
 * Shapes must match, or one side must be scalar.
 *
 * @example
 * ```ts
 * const z = add(x, y);
 * const w = add(2, x);  // 2 + x
 * ```
 */
export function add(left: ExprInput, right: ExprInput): Expr {
  const l = castToConst(left);
  const r = castToConst(right);
  sumShapes('add', exprShape(l), exprShape(r));
  return new Expr({ kind: 'add', id: newExprId(), left: l, right: r });
}

/**
 * Subtract two expressions.
 *
 * @example
 * ```ts
 * const z = sub(x, y);  // x - y
 * ```
 */
export function sub(left: ExprInput, right: ExprInput): Expr {
  return add(left, neg(right));
}

/**
 * Negate an expression.
 *
 * @example
 * ```ts
 * const y = neg(x);  // -x
 * ```
 */
export function neg(arg: ExprInput): Expr {
  return new Expr({ kind: 'neg', id: newExprId(), arg: castToConst(arg) });
}

/**
 * Multiply two expressions, at least one of them constant.
 *
 * Scalars multiply elementwise; otherwise this is the matrix product.
 * The constant coefficient ends up on the left (`mul`) unless it is a
 * non-scalar on the right of a non-scalar (`rmul`).
 *
 * A constant built from a flat array that is used as a row (its length
 * matches the other operand's rows) is transposed first, so
 * `mul([1, 2, 3], x)` is the inner product for x of shape (3, 1).
 *
 * @example
 * ```ts
 * mul(2, x)        // 2 * x
 * mul(A, x)        // A @ x
 * mul(x.T(), A)    // x' @ A
 * ```
 */
export function mul(left: ExprInput, right: ExprInput): Expr {
  let l = castToConst(left);
  const r = castToConst(right);
  const lConst = isConstantExpr(l);
  const rConst = isConstantExpr(r);

  if (!lConst && !rConst) {
    throw new DisciplineViolation('mul', 'cannot multiply two non-constant expressions');
  }

  if (lConst) {
    const lShape = exprShape(l);
    if (
      l.kind === 'constant' &&
      l.value.type === 'dense' &&
      l.value.flat &&
      lShape.rows === exprShape(r).rows &&
      !isSquare(lShape)
    ) {
      l = transpose(l).data;
    }
    mulShapes('mul', exprShape(l), exprShape(r));
    return new Expr({ kind: 'mul', id: newExprId(), left: l, right: r });
  }

  const lShape = exprShape(l);
  const rShape = exprShape(r);
  mulShapes('mul', lShape, rShape);
  if (isScalar(lShape) || isScalar(rShape)) {
    return new Expr({ kind: 'mul', id: newExprId(), left: r, right: l });
  }
  return new Expr({ kind: 'rmul', id: newExprId(), left: l, right: r });
}

/**
 * Divide an expression by a non-zero scalar constant.
 *
 * @example
 * ```ts
 * const z = div(x, 2);  // x / 2
 * ```
 */
export function div(left: ExprInput, right: ExprInput): Expr {
  const l = castToConst(left);
  const r = castToConst(right);

  if (!isConstantExpr(r)) {
    throw new DisciplineViolation('div', 'divisor must be constant');
  }
  const rShape = exprShape(r);
  if (!isScalar(rShape)) {
    throw new DisciplineViolation('div', `divisor must be scalar, got shape ${shapeToString(rShape)}`);
  }
  // a divisor without variables may sum to zero with an unknown sign
  if (isZeroExpr(r) || (exprVariables(r).size === 0 && evaluate(r)?.[0] === 0)) {
    throw new DisciplineViolation('div', 'division by zero');
  }

  return new Expr({ kind: 'div', id: newExprId(), left: l, right: r });
}

/**
 * Transpose an expression. A scalar is returned unchanged.
 *
 * @example
 * ```ts
 * const At = transpose(A);  // A'
 * ```
 */
export function transpose(arg: ExprInput): Expr {
  if (arg instanceof Expr && isScalar(arg.shape)) {
    return arg;
  }
  const a = castToConst(arg);
  if (isScalar(exprShape(a))) {
    return new Expr(a);
  }
  return new Expr({ kind: 'transpose', id: newExprId(), arg: a });
}

/**
 * Index into an expression.
 *
 * @example
 * ```ts
 * index(x, 0)                    // x[0]
 * index(x, slice(0, 3))          // x[0:3]
 * index(A, 'all', 1)             // A[:, 1]
 * index(A, [0, 2], [1, 1])       // A[[0, 2], [1, 1]] (pairs, column result)
 * index(A, [[true, false], [false, true]])  // A[mask]
 * ```
 */
export function index(arg: ExprInput, ...keys: IndexKey[]): Expr {
  const a: ExprData = castToConst(arg);
  const resolved = resolveKey(exprShape(a), keys);
  return new Expr({
    kind: 'index',
    id: newExprId(),
    arg: a,
    selection: resolved.selection,
    shape: resolved.shape,
    key: resolved.key,
    special: resolved.special,
  });
}
