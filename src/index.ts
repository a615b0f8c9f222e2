/**
 * dcp-graph - expression graphs with Disciplined Convex Programming analysis
 *
 * @example
 * ```ts
 * import { variable, constant, Curvature } from 'dcp-graph';
 *
 * const x = variable(3, { name: 'x' });
 * const A = constant([[1, 2, 3], [4, 5, 6]]);
 *
 * const r = A.mul(x).sub([1, 2]);
 * r.power(2).curvature;             // Curvature.Convex
 * r.power(2).le(4).lhs;             // constraint operands
 * x.power(0.5).domain();            // [0 <= x]
 * ```
 *
 * @packageDocumentation
 */

// === Expression Types ===
export type {
  Shape,
  ExprId,
  ExprData,
  ExprKind,
  VariableData,
  ArrayData,
  ArrayInput,
  Slice,
  AxisKey,
  BooleanMask,
  IndexKey,
  VariableOptions,
  VariableValues,
  Gradient,
  ExprInput,
} from './expr/index.js';

// === Shape Utilities ===
export {
  scalar,
  vector,
  matrix,
  size,
  isScalar,
  isVector,
  isMatrix,
  isSquare,
  shapeEquals,
  shapeToString,
  normalizeShape,
} from './expr/index.js';

// === Variable Creation ===
export {
  variable,
  scalarVar,
  vectorVar,
  matrixVar,
  VariableBuilder,
  getVariableId,
  isVariable,
} from './expr/index.js';

// === Constant Creation ===
export {
  constant,
  castToConst,
  zeros,
  ones,
  eye,
  isConstant,
  getConstantData,
} from './expr/index.js';

// === Expression Utilities ===
export {
  exprShape,
  exprVariables,
  exprOperands,
  resetExprIds,
  slice,
  evaluate,
  evaluateScalar,
  gradient,
  domain,
  exprName,
  describeExpr,
  structurallyEqual,
} from './expr/index.js';

// === Expression Wrapper ===
export { Expr, wrap, isExpr, unwrap } from './expr/index.js';

// === Atoms ===
export { add, sub, neg, mul, div, transpose, index, power } from './atoms/index.js';

// === DCP Analysis ===
export {
  Curvature,
  curvature,
  isConstantExpr,
  isAffineExpr,
  isConvexExpr,
  isConcaveExpr,
  isDcp,
  Sign,
  sign,
  isNonnegative,
  isNonpositive,
  isPositiveExpr,
  isNegativeExpr,
  isZeroExpr,
} from './dcp/index.js';

// === Sparse Matrix ===
export type { CscMatrix } from './sparse/index.js';
export {
  cscEmpty,
  cscIdentity,
  cscFromTriplets,
  cscFromDense,
  cscNnz,
  cscGet,
  cscScale,
  cscAdd,
  cscMulMat,
  cscDiag,
  cscToDense,
  cscEquals,
} from './sparse/index.js';

// === Constraints ===
export type { Constraint, ConstraintKind } from './constraints/index.js';
export {
  eq,
  le,
  lt,
  ge,
  gt,
  psdGe,
  psdLe,
  residual,
  constraintVariables,
  isDcpConstraint,
  validateDcpConstraint,
  describeConstraint,
} from './constraints/index.js';

// === Errors ===
export { ExpressionError, DisciplineViolation, DimensionMismatch } from './error.js';
