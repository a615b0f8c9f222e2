export type { Constraint, ConstraintKind } from './constraint.js';
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
} from './constraint.js';
