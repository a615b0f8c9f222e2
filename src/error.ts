/**
 * Base error class for dcp-graph.
 */
export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

/**
 * Error thrown when a composition breaks a DCP rule.
 *
 * Raised at construction time, so the caller never receives a partial node.
 */
export class DisciplineViolation extends ExpressionError {
  /** Operator whose precondition failed, e.g. `mul` */
  readonly operator: string;
  /** The rule that was broken */
  readonly rule: string;

  constructor(operator: string, rule: string) {
    super(`DCP violation in ${operator}: ${rule}`);
    this.name = 'DisciplineViolation';
    this.operator = operator;
    this.rule = rule;
  }
}

/**
 * Error thrown when operand shapes are incompatible.
 */
export class DimensionMismatch extends ExpressionError {
  readonly operator: string;
  readonly left: string;
  readonly right: string;

  constructor(operator: string, left: string, right: string, detail?: string) {
    const suffix = detail ? ` (${detail})` : '';
    super(`Incompatible dimensions for ${operator}: ${left} and ${right}${suffix}`);
    this.name = 'DimensionMismatch';
    this.operator = operator;
    this.left = left;
    this.right = right;
  }
}
