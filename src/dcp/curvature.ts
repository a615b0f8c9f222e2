import type { ExprData } from '../expr/expr-data.js';
import { exprVariables } from '../expr/expr-data.js';
import type { Expr } from '../expr/expr.js';
import { unwrap } from '../expr/expr.js';
import { Sign, sign, isZeroExpr, isNonnegative, isNonpositive } from './sign.js';

/**
 * Curvature of an expression in disciplined convex programming.
 *
 * The curvature hierarchy (from most to least restrictive):
 * - Constant: Fixed value, no variables
 * - Affine: Linear in variables (both convex and concave)
 * - Convex: f(λx + (1-λ)y) ≤ λf(x) + (1-λ)f(y)
 * - Concave: f(λx + (1-λ)y) ≥ λf(x) + (1-λ)f(y)
 * - Unknown: Does not satisfy DCP rules
 */
export enum Curvature {
  Constant = 'constant',
  Affine = 'affine',
  Convex = 'convex',
  Concave = 'concave',
  Unknown = 'unknown',
}

/**
 * The two curvature predicates of a node.
 */
export interface CurvatureFlags {
  readonly convex: boolean;
  readonly concave: boolean;
}

/**
 * Curvature and monotonicity of an atom, independent of its argument.
 */
export interface AtomProfile {
  readonly convex: boolean;
  readonly concave: boolean;
  readonly increasing: boolean;
  readonly decreasing: boolean;
}

/**
 * Profile of a product by a constant coefficient of the given sign.
 * The product is affine in the other operand; its direction follows the sign.
 */
export function scaleProfile(coefficient: Sign): AtomProfile {
  return {
    convex: true,
    concave: true,
    increasing: isNonnegative(coefficient),
    decreasing: isNonpositive(coefficient),
  };
}

/**
 * Profile of x^p.
 *
 * | p            | curvature | monotonicity                     |
 * |--------------|-----------|----------------------------------|
 * | 0            | affine    | both (constant 1)                |
 * | 1            | affine    | increasing                       |
 * | (0, 1)       | concave   | increasing                       |
 * | even integer | convex    | follows the sign of the argument |
 * | other p > 1  | convex    | increasing                       |
 * | p < 0        | convex    | decreasing                       |
 */
export function powerProfile(p: number, argSign: Sign): AtomProfile {
  if (p === 0) {
    return { convex: true, concave: true, increasing: true, decreasing: true };
  }
  if (p === 1) {
    return { convex: true, concave: true, increasing: true, decreasing: false };
  }
  if (p > 0 && p < 1) {
    return { convex: false, concave: true, increasing: true, decreasing: false };
  }
  if (p > 1 && isEvenInteger(p)) {
    return {
      convex: true,
      concave: false,
      increasing: isNonnegative(argSign),
      decreasing: isNonpositive(argSign),
    };
  }
  if (p > 1) {
    return { convex: true, concave: false, increasing: true, decreasing: false };
  }
  return { convex: true, concave: false, increasing: false, decreasing: true };
}

/** Check if p is an even integer */
export function isEvenInteger(p: number): boolean {
  return Number.isInteger(p) && p % 2 === 0;
}

/**
 * DCP composition rule for a single-argument atom.
 *
 * f(g) is convex if f is convex and g is affine, or f is increasing and
 * g is convex, or f is decreasing and g is concave. Concave is symmetric.
 */
export function composeCurvature(profile: AtomProfile, arg: ExprData): CurvatureFlags {
  const a = curvatureFlags(arg);
  const affine = isConstantExpr(arg) || (a.convex && a.concave);
  return {
    convex:
      profile.convex &&
      (affine || (profile.increasing && a.convex) || (profile.decreasing && a.concave)),
    concave:
      profile.concave &&
      (affine || (profile.increasing && a.concave) || (profile.decreasing && a.convex)),
  };
}

/**
 * Compute the curvature predicates of an expression.
 *
 * A constant node is both convex and concave whatever its structure.
 */
export function curvatureFlags(expr: ExprData): CurvatureFlags {
  if (expr.kind === 'variable' || expr.kind === 'constant' || isConstantExpr(expr)) {
    return { convex: true, concave: true };
  }

  switch (expr.kind) {
    case 'add': {
      const l = curvatureFlags(expr.left);
      const r = curvatureFlags(expr.right);
      return { convex: l.convex && r.convex, concave: l.concave && r.concave };
    }

    case 'neg': {
      const a = curvatureFlags(expr.arg);
      return { convex: a.concave, concave: a.convex };
    }

    case 'mul':
      return composeCurvature(scaleProfile(sign(expr.left)), expr.right);

    case 'rmul':
      return composeCurvature(scaleProfile(sign(expr.right)), expr.left);

    case 'div':
      // x / c scales by 1 / c, which has the sign of c
      return composeCurvature(scaleProfile(sign(expr.right)), expr.left);

    case 'power':
      return composeCurvature(powerProfile(expr.p, sign(expr.arg)), expr.arg);

    case 'transpose':
    case 'index':
      return curvatureFlags(expr.arg);
  }
}

/**
 * Is the expression constant? (no variables, or identically zero)
 */
export function isConstantExpr(expr: ExprData | Expr): boolean {
  const data = unwrap(expr);
  return exprVariables(data).size === 0 || isZeroExpr(data);
}

/** Is the expression convex? */
export function isConvexExpr(expr: ExprData | Expr): boolean {
  return curvatureFlags(unwrap(expr)).convex;
}

/** Is the expression concave? */
export function isConcaveExpr(expr: ExprData | Expr): boolean {
  return curvatureFlags(unwrap(expr)).concave;
}

/** Is the expression affine? (constant, or convex and concave) */
export function isAffineExpr(expr: ExprData | Expr): boolean {
  const data = unwrap(expr);
  if (isConstantExpr(data)) return true;
  const flags = curvatureFlags(data);
  return flags.convex && flags.concave;
}

/**
 * Compute the curvature of an expression.
 *
 * This is the core DCP analysis function. The first predicate that holds
 * wins: constant, affine, convex, concave, otherwise unknown.
 */
export function curvature(expr: ExprData | Expr): Curvature {
  const data = unwrap(expr);
  if (isConstantExpr(data)) return Curvature.Constant;
  const flags = curvatureFlags(data);
  if (flags.convex && flags.concave) return Curvature.Affine;
  if (flags.convex) return Curvature.Convex;
  if (flags.concave) return Curvature.Concave;
  return Curvature.Unknown;
}

/**
 * Is the expression DCP compliant? (convex or concave)
 */
export function isDcp(expr: ExprData | Expr): boolean {
  const flags = curvatureFlags(unwrap(expr));
  return flags.convex || flags.concave;
}
