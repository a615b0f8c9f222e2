import type { ExprData } from './expr-data.js';
import { exprShape } from './expr-data.js';
import { shapeToString } from './shape.js';
import { arrayDataToString } from './array-data.js';
import type { Expr } from './expr.js';
import { unwrap } from './expr.js';
import { curvature } from '../dcp/curvature.js';
import { sign } from '../dcp/sign.js';

/**
 * Printable form of an expression.
 *
 * @example
 * ```ts
 * exprName(add(mul(2, x), 1));   // "2 * x + 1"
 * exprName(power(x.index(0), 2)) // "power(x[0], 2)"
 * ```
 */
export function exprName(expr: ExprData | Expr): string {
  const data = unwrap(expr);
  switch (data.kind) {
    case 'variable':
      return data.name ?? `var${data.id}`;
    case 'constant':
      return arrayDataToString(data.value);
    case 'add':
      return data.right.kind === 'neg'
        ? `${exprName(data.left)} - ${operand(data.right.arg)}`
        : `${exprName(data.left)} + ${exprName(data.right)}`;
    case 'neg':
      return `-${operand(data.arg)}`;
    case 'mul':
    case 'rmul':
      return `${operand(data.left)} * ${operand(data.right)}`;
    case 'div':
      return `${operand(data.left)} / ${operand(data.right)}`;
    case 'power':
      return `power(${exprName(data.arg)}, ${data.p})`;
    case 'transpose':
      return `${operand(data.arg)}.T`;
    case 'index':
      return `${operand(data.arg)}[${data.key}]`;
  }
}

/** Name of an operand, parenthesized when it is a sum */
function operand(expr: ExprData): string {
  const name = exprName(expr);
  return expr.kind === 'add' ? `(${name})` : name;
}

/**
 * One-line summary of the analysis of an expression.
 *
 * @example
 * ```ts
 * describeExpr(power(x, 2));  // "Expression(convex, positive, (3, 1))"
 * ```
 */
export function describeExpr(expr: ExprData | Expr): string {
  const data = unwrap(expr);
  return `Expression(${curvature(data)}, ${sign(data)}, ${shapeToString(exprShape(data))})`;
}
