import { DimensionMismatch } from '../error.js';

/**
 * Shape representation for expressions.
 *
 * Every expression is two-dimensional:
 * - Scalar: (1, 1)
 * - Column vector: (n, 1), row vector: (1, n)
 * - Matrix: (rows, cols)
 */
export interface Shape {
  readonly rows: number;
  readonly cols: number;
}

/** Create a scalar shape */
export function scalar(): Shape {
  return { rows: 1, cols: 1 };
}

/** Create a column vector shape */
export function vector(n: number): Shape {
  return matrix(n, 1);
}

/** Create a matrix shape */
export function matrix(rows: number, cols: number): Shape {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
    throw new DimensionMismatch('shape', String(rows), String(cols), 'dimensions must be integers >= 1');
  }
  return { rows, cols };
}

/** Total number of elements in the shape */
export function size(shape: Shape): number {
  return shape.rows * shape.cols;
}

/** Check if shape is scalar */
export function isScalar(shape: Shape): boolean {
  return shape.rows === 1 && shape.cols === 1;
}

/** Check if shape is a row or column vector (scalars included) */
export function isVector(shape: Shape): boolean {
  return Math.min(shape.rows, shape.cols) === 1;
}

/** Check if shape is a matrix (both dimensions > 1) */
export function isMatrix(shape: Shape): boolean {
  return shape.rows > 1 && shape.cols > 1;
}

/** Check if shape is square */
export function isSquare(shape: Shape): boolean {
  return shape.rows === shape.cols;
}

/** Check if two shapes are equal */
export function shapeEquals(a: Shape, b: Shape): boolean {
  return a.rows === b.rows && a.cols === b.cols;
}

/** Format shape as string for messages */
export function shapeToString(shape: Shape): string {
  return `(${shape.rows}, ${shape.cols})`;
}

/** Swap rows and columns */
export function transposeShape(shape: Shape): Shape {
  return { rows: shape.cols, cols: shape.rows };
}

/**
 * Result shape of an elementwise sum.
 * Shapes must match, or one of them must be scalar.
 */
export function sumShapes(operator: string, a: Shape, b: Shape): Shape {
  if (shapeEquals(a, b)) return a;
  if (isScalar(a)) return b;
  if (isScalar(b)) return a;
  throw new DimensionMismatch(operator, shapeToString(a), shapeToString(b));
}

/**
 * Result shape of a matrix product.
 * A scalar operand is promoted to the other operand's shape.
 */
export function mulShapes(operator: string, a: Shape, b: Shape): Shape {
  if (isScalar(a)) return b;
  if (isScalar(b)) return a;
  if (a.cols !== b.rows) {
    throw new DimensionMismatch(operator, shapeToString(a), shapeToString(b), 'inner dimensions differ');
  }
  return { rows: a.rows, cols: b.cols };
}

/**
 * Normalize shape input to a Shape object.
 * Accepts: number (column vector), [n] (column vector), [m, n] (matrix), or Shape
 */
export function normalizeShape(
  input: number | readonly [number] | readonly [number, number] | Shape
): Shape {
  if (typeof input === 'number') {
    return vector(input);
  }
  if ('rows' in input) {
    return matrix(input.rows, input.cols);
  }
  if (input.length === 1) {
    return vector(input[0]);
  }
  return matrix(input[0], input[1]);
}
