// Shape utilities
export type { Shape } from './shape.js';
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
  transposeShape,
  sumShapes,
  mulShapes,
  normalizeShape,
} from './shape.js';

// Numeric values
export type { ArrayData, ArrayInput } from './array-data.js';
export {
  toArrayData,
  isArrayInput,
  arrayDataShape,
  arrayDataValues,
  arrayDataIsZero,
  arrayDataIsNonnegative,
  arrayDataIsNonpositive,
  transposeArrayData,
  arrayDataToString,
} from './array-data.js';

// Core expression types
export type { ExprId, ExprData, ExprKind, VariableData } from './expr-data.js';
export {
  newExprId,
  resetExprIds,
  exprShape,
  exprOperands,
  exprVariables,
  exprVariableNodes,
} from './expr-data.js';

// Index keys
export type { Slice, AxisKey, BooleanMask, IndexKey, Selection } from './key.js';
export { slice, resolveKey, sliceIndices, formatKey, isSpecialKey } from './key.js';

// Variable creation
export type { VariableOptions } from './variable.js';
export {
  VariableBuilder,
  variable,
  scalarVar,
  vectorVar,
  matrixVar,
  getVariableId,
  isVariable,
} from './variable.js';

// Constant creation
export {
  constant,
  constantFromData,
  castToConst,
  zeros,
  ones,
  eye,
  isConstant,
  getConstantData,
} from './constant.js';

// Queries
export type { VariableValues } from './evaluate.js';
export { evaluate, evaluateScalar } from './evaluate.js';
export type { Gradient } from './gradient.js';
export { gradient } from './gradient.js';
export { domain } from './domain.js';
export { exprName, describeExpr } from './name.js';
export { structurallyEqual } from './equality.js';

// Expression wrapper class
export { Expr, wrap, isExpr, unwrap } from './expr.js';
export type { ExprInput } from './expr.js';
