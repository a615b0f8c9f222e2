import type { ExprData } from './expr-data.js';
import { exprOperands } from './expr-data.js';
import { shapeEquals } from './shape.js';
import { arrayDataShape, arrayDataValues } from './array-data.js';
import type { Expr } from './expr.js';
import { unwrap } from './expr.js';

/**
 * Check whether two expressions have the same structure.
 *
 * Node ids are ignored except for variables, which are equal only to
 * themselves. Constants compare by shape and values.
 */
export function structurallyEqual(a: ExprData | Expr, b: ExprData | Expr): boolean {
  const x = unwrap(a);
  const y = unwrap(b);
  if (x === y) return true;

  switch (x.kind) {
    case 'variable':
      return y.kind === 'variable' && x.id === y.id;
    case 'constant': {
      if (y.kind !== 'constant') return false;
      if (!shapeEquals(arrayDataShape(x.value), arrayDataShape(y.value))) return false;
      const xs = arrayDataValues(x.value);
      const ys = arrayDataValues(y.value);
      return xs.every((v, i) => v === ys[i]);
    }
    case 'power':
      if (y.kind !== 'power' || x.p !== y.p) return false;
      break;
    case 'index':
      if (
        y.kind !== 'index' ||
        !shapeEquals(x.shape, y.shape) ||
        x.selection.length !== y.selection.length ||
        x.selection.some((k, i) => k !== y.selection[i])
      ) {
        return false;
      }
      break;
    default:
      if (x.kind !== y.kind) return false;
  }

  const xOps = exprOperands(x);
  const yOps = exprOperands(y);
  return xOps.length === yOps.length && xOps.every((op, i) => structurallyEqual(op, yOps[i]));
}
