import type { ExprData } from '../expr/expr-data.js';
import {
  arrayDataIsNonnegative,
  arrayDataIsNonpositive,
} from '../expr/array-data.js';
import type { Expr } from '../expr/expr.js';
import { unwrap } from '../expr/expr.js';

/**
 * Sign of an expression.
 *
 * Used for DCP composition rules where the sign of an argument
 * affects whether certain compositions are valid.
 */
export enum Sign {
  /** Expression is always = 0 */
  Zero = 'zero',
  /** Expression is always >= 0 */
  Positive = 'positive',
  /** Expression is always <= 0 */
  Negative = 'negative',
  /** Sign is unknown or mixed */
  Unknown = 'unknown',
}

/** Check if sign is nonnegative (includes zero) */
export function isNonnegative(s: Sign): boolean {
  return s === Sign.Positive || s === Sign.Zero;
}

/** Check if sign is nonpositive (includes zero) */
export function isNonpositive(s: Sign): boolean {
  return s === Sign.Negative || s === Sign.Zero;
}

/** Check if sign is zero */
export function isZero(s: Sign): boolean {
  return s === Sign.Zero;
}

/**
 * Combine signs under addition.
 */
export function addSign(a: Sign, b: Sign): Sign {
  if (a === Sign.Zero) return b;
  if (b === Sign.Zero) return a;
  if (a === b) return a;
  return Sign.Unknown;
}

/**
 * Negate a sign.
 */
export function negateSign(s: Sign): Sign {
  if (s === Sign.Positive) return Sign.Negative;
  if (s === Sign.Negative) return Sign.Positive;
  return s; // Zero and Unknown unchanged
}

/**
 * Multiply signs.
 */
export function mulSign(a: Sign, b: Sign): Sign {
  if (a === Sign.Zero || b === Sign.Zero) return Sign.Zero;
  if (a === Sign.Unknown || b === Sign.Unknown) return Sign.Unknown;

  // Same sign -> nonnegative
  if (a === b) return Sign.Positive;

  // Different signs -> nonpositive
  return Sign.Negative;
}

/**
 * The two sign predicates of a node. Zero is both.
 */
export interface SignFlags {
  readonly positive: boolean;
  readonly negative: boolean;
}

function flagsToSign(flags: SignFlags): Sign {
  if (flags.positive && flags.negative) return Sign.Zero;
  if (flags.positive) return Sign.Positive;
  if (flags.negative) return Sign.Negative;
  return Sign.Unknown;
}

function signToFlags(s: Sign): SignFlags {
  return { positive: isNonnegative(s), negative: isNonpositive(s) };
}

/**
 * Sign of a power atom: the argument's for p = 1, otherwise nonnegative
 * over the atom's domain.
 */
export function powerSign(p: number, arg: Sign): Sign {
  return p === 1 ? arg : Sign.Positive;
}

/**
 * Compute the sign predicates of an expression.
 * Each operand is visited once.
 */
export function signFlags(expr: ExprData): SignFlags {
  switch (expr.kind) {
    case 'variable':
      return { positive: expr.nonneg === true, negative: expr.nonpos === true };

    case 'constant':
      return {
        positive: arrayDataIsNonnegative(expr.value),
        negative: arrayDataIsNonpositive(expr.value),
      };

    case 'add':
      return signToFlags(addSign(sign(expr.left), sign(expr.right)));

    case 'neg':
      return signToFlags(negateSign(sign(expr.arg)));

    case 'mul':
    case 'rmul':
    case 'div':
      // x / c has the sign of x * c
      return signToFlags(mulSign(sign(expr.left), sign(expr.right)));

    case 'power':
      return signToFlags(powerSign(expr.p, sign(expr.arg)));

    case 'transpose':
    case 'index':
      return signFlags(expr.arg);
  }
}

/**
 * Compute the sign of an expression.
 */
export function sign(expr: ExprData | Expr): Sign {
  return flagsToSign(signFlags(unwrap(expr)));
}

/** Is the expression provably >= 0? */
export function isPositiveExpr(expr: ExprData | Expr): boolean {
  return signFlags(unwrap(expr)).positive;
}

/** Is the expression provably <= 0? */
export function isNegativeExpr(expr: ExprData | Expr): boolean {
  return signFlags(unwrap(expr)).negative;
}

/** Is the expression identically zero? (positive and negative) */
export function isZeroExpr(expr: ExprData | Expr): boolean {
  const flags = signFlags(unwrap(expr));
  return flags.positive && flags.negative;
}
