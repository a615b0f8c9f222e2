import type { ExprData, ExprId } from './expr-data.js';
import { newExprId } from './expr-data.js';
import type { Shape } from './shape.js';
import { normalizeShape, vector, matrix, scalar } from './shape.js';
import { Expr, unwrap } from './expr.js';
import { ExpressionError } from '../error.js';

/**
 * Options for variable creation.
 */
export interface VariableOptions {
  /** Optional name used in expression names */
  name?: string;
  /** Declare the variable >= 0 (sign analysis treats it as positive) */
  nonneg?: boolean;
  /** Declare the variable <= 0 (sign analysis treats it as negative) */
  nonpos?: boolean;
}

/**
 * Builder for creating optimization variables.
 *
 * @example
 * ```ts
 * const x = new VariableBuilder(5).name('x').nonneg().build();
 * const A = new VariableBuilder([3, 4]).name('A').build();
 * ```
 */
export class VariableBuilder {
  private readonly _shape: Shape;
  private _name?: string;
  private _nonneg = false;
  private _nonpos = false;

  constructor(shape: number | readonly [number] | readonly [number, number] | Shape) {
    this._shape = normalizeShape(shape);
  }

  /** Set the variable name */
  name(n: string): this {
    this._name = n;
    return this;
  }

  /** Declare the variable non-negative (>= 0) */
  nonneg(): this {
    this._nonneg = true;
    this._nonpos = false; // Mutually exclusive
    return this;
  }

  /** Declare the variable non-positive (<= 0) */
  nonpos(): this {
    this._nonpos = true;
    this._nonneg = false; // Mutually exclusive
    return this;
  }

  /** Build the variable expression */
  build(): Expr {
    return new Expr({
      kind: 'variable',
      id: newExprId(),
      shape: this._shape,
      name: this._name,
      nonneg: this._nonneg || undefined,
      nonpos: this._nonpos || undefined,
    });
  }
}

/**
 * Create an optimization variable.
 *
 * @param shape - Size as number (column vector) or [rows, cols] (matrix)
 * @param options - Optional name and sign
 *
 * @example
 * ```ts
 * const x = variable(5);                    // (5, 1) column
 * const A = variable([3, 4]);               // 3x4 matrix
 * const y = variable(3, { nonneg: true });  // Non-negative vector
 * ```
 */
export function variable(
  shape: number | readonly [number] | readonly [number, number] | Shape,
  options?: VariableOptions
): Expr {
  const builder = new VariableBuilder(shape);
  if (options?.name) builder.name(options.name);
  if (options?.nonneg) builder.nonneg();
  if (options?.nonpos) builder.nonpos();
  return builder.build();
}

/**
 * Create a scalar optimization variable.
 *
 * @example
 * ```ts
 * const t = scalarVar();
 * const t = scalarVar({ name: 't', nonneg: true });
 * ```
 */
export function scalarVar(options?: VariableOptions): Expr {
  return variable(scalar(), options);
}

/**
 * Create a column vector optimization variable.
 */
export function vectorVar(n: number, options?: VariableOptions): Expr {
  return variable(vector(n), options);
}

/**
 * Create a matrix optimization variable.
 */
export function matrixVar(rows: number, cols: number, options?: VariableOptions): Expr {
  return variable(matrix(rows, cols), options);
}

/**
 * Get the ID of a variable expression.
 * Throws if the expression is not a variable.
 */
export function getVariableId(expr: ExprData | Expr): ExprId {
  const e = unwrap(expr);
  if (e.kind !== 'variable') {
    throw new ExpressionError(`Expected variable, got ${e.kind}`);
  }
  return e.id;
}

/**
 * Check if an expression is a variable.
 */
export function isVariable(expr: ExprData | Expr): boolean {
  return unwrap(expr).kind === 'variable';
}
