export {
  Curvature,
  scaleProfile,
  powerProfile,
  isEvenInteger,
  composeCurvature,
  curvatureFlags,
  curvature,
  isConstantExpr,
  isAffineExpr,
  isConvexExpr,
  isConcaveExpr,
  isDcp,
} from './curvature.js';
export type { CurvatureFlags, AtomProfile } from './curvature.js';

export {
  Sign,
  isNonnegative,
  isNonpositive,
  isZero,
  addSign,
  negateSign,
  mulSign,
  powerSign,
  signFlags,
  sign,
  isPositiveExpr,
  isNegativeExpr,
  isZeroExpr,
} from './sign.js';
export type { SignFlags } from './sign.js';
