import type { Shape } from './shape.js';
import { transposeShape } from './shape.js';
import type { ArrayData } from './array-data.js';
import { arrayDataShape } from './array-data.js';

/**
 * Unique identifier for expressions and constraints.
 * Uses a branded type for type safety.
 */
export type ExprId = number & { readonly __brand: unique symbol };

let nextExprId = 0;

/** Generate a new unique expression ID */
export function newExprId(): ExprId {
  return nextExprId++ as ExprId;
}

/** Reset the ID counter (for testing) */
export function resetExprIds(): void {
  nextExprId = 0;
}

/**
 * Core expression data type using discriminated union.
 *
 * All expressions are immutable. The expression tree forms a DAG
 * where subexpressions can be shared. Curvature and sign are not stored:
 * they are derived from the operands on demand (see `dcp/`).
 *
 * This is the internal data structure. Users should work with the `Expr` class
 * which wraps this type and provides a fluent API.
 */
export type ExprData =
  // === Leaf nodes ===
  | {
      readonly kind: 'variable';
      readonly id: ExprId;
      readonly shape: Shape;
      readonly name?: string;
      readonly nonneg?: boolean;
      readonly nonpos?: boolean;
    }
  | { readonly kind: 'constant'; readonly id: ExprId; readonly value: ArrayData }

  // === Affine atoms ===
  | { readonly kind: 'add'; readonly id: ExprId; readonly left: ExprData; readonly right: ExprData }
  | { readonly kind: 'neg'; readonly id: ExprId; readonly arg: ExprData }
  // constant coefficient on the left: left @ right
  | { readonly kind: 'mul'; readonly id: ExprId; readonly left: ExprData; readonly right: ExprData }
  // constant coefficient on the right: left @ right
  | { readonly kind: 'rmul'; readonly id: ExprId; readonly left: ExprData; readonly right: ExprData }
  // division by a scalar constant
  | { readonly kind: 'div'; readonly id: ExprId; readonly left: ExprData; readonly right: ExprData }
  | { readonly kind: 'transpose'; readonly id: ExprId; readonly arg: ExprData }
  | {
      readonly kind: 'index';
      readonly id: ExprId;
      readonly arg: ExprData;
      /** Column-major positions in `arg`, listed in column-major order of the result */
      readonly selection: readonly number[];
      readonly shape: Shape;
      /** Printable form of the key */
      readonly key: string;
      /** Selected by a list or boolean mask rather than slices */
      readonly special: boolean;
    }

  // === Nonlinear atoms ===
  | { readonly kind: 'power'; readonly id: ExprId; readonly arg: ExprData; readonly p: number };

export type ExprKind = ExprData['kind'];

/** A variable leaf */
export type VariableData = Extract<ExprData, { kind: 'variable' }>;

/**
 * Get the shape of an expression.
 */
export function exprShape(expr: ExprData): Shape {
  switch (expr.kind) {
    case 'variable':
      return expr.shape;

    case 'constant':
      return arrayDataShape(expr.value);

    case 'add': {
      // Operand shapes were validated at construction; a scalar side is promoted
      const l = exprShape(expr.left);
      return l.rows * l.cols === 1 ? exprShape(expr.right) : l;
    }

    case 'mul':
    case 'rmul': {
      const l = exprShape(expr.left);
      const r = exprShape(expr.right);
      if (l.rows * l.cols === 1) return r;
      if (r.rows * r.cols === 1) return l;
      return { rows: l.rows, cols: r.cols };
    }

    case 'div':
      return exprShape(expr.left);

    case 'neg':
    case 'power':
      return exprShape(expr.arg);

    case 'transpose':
      return transposeShape(exprShape(expr.arg));

    case 'index':
      return expr.shape;
  }
}

/**
 * Direct operands of an expression.
 */
export function exprOperands(expr: ExprData): readonly ExprData[] {
  switch (expr.kind) {
    case 'variable':
    case 'constant':
      return [];
    case 'add':
    case 'mul':
    case 'rmul':
    case 'div':
      return [expr.left, expr.right];
    case 'neg':
    case 'transpose':
    case 'index':
    case 'power':
      return [expr.arg];
  }
}

/**
 * Get all variables referenced in an expression, keyed by ID.
 */
export function exprVariableNodes(expr: ExprData): Map<ExprId, VariableData> {
  const vars = new Map<ExprId, VariableData>();
  collectVariables(expr, vars);
  return vars;
}

/**
 * Get all variable IDs referenced in an expression.
 */
export function exprVariables(expr: ExprData): Set<ExprId> {
  return new Set(exprVariableNodes(expr).keys());
}

function collectVariables(
  expr: ExprData,
  vars: Map<ExprId, VariableData>
): void {
  if (expr.kind === 'variable') {
    vars.set(expr.id, expr);
    return;
  }
  for (const operand of exprOperands(expr)) {
    collectVariables(operand, vars);
  }
}
