import type { Shape } from './shape.js';
import { scalar, vector, matrix, size, shapeToString } from './shape.js';
import { DimensionMismatch } from '../error.js';

/**
 * Numeric array storage for constants.
 *
 * Dense data is column-major. A dense array built from a one-dimensional
 * input is stored as a column and keeps `flat: true`.
 */
export type ArrayData =
  | { readonly type: 'scalar'; readonly value: number }
  | {
      readonly type: 'dense';
      readonly data: Float64Array;
      readonly shape: Shape;
      readonly flat: boolean;
    };

/**
 * Raw numeric input accepted wherever an expression is expected.
 */
export type ArrayInput =
  | number
  | readonly number[]
  | readonly (readonly number[])[]
  | Float64Array;

/** Check whether a value is raw numeric input */
export function isArrayInput(value: unknown): value is ArrayInput {
  if (typeof value === 'number' || value instanceof Float64Array) return true;
  if (!Array.isArray(value)) return false;
  return value.every(
    (item) =>
      typeof item === 'number' ||
      (Array.isArray(item) && item.every((inner) => typeof inner === 'number'))
  );
}

/**
 * Convert various input types to ArrayData.
 */
export function toArrayData(value: ArrayInput): ArrayData {
  if (typeof value === 'number') {
    return { type: 'scalar', value };
  }

  if (value instanceof Float64Array) {
    return { type: 'dense', data: new Float64Array(value), shape: vector(value.length), flat: true };
  }

  const first = value[0];
  if (first === undefined) {
    throw new DimensionMismatch('constant', '(0, 1)', '(1, 1)', 'empty arrays have no shape');
  }

  if (typeof first === 'number') {
    const flat: number[] = [];
    for (const item of value) {
      if (typeof item !== 'number') {
        throw new DimensionMismatch('constant', 'number', 'row', 'mixed one- and two-dimensional input');
      }
      flat.push(item);
    }
    return { type: 'dense', data: new Float64Array(flat), shape: vector(flat.length), flat: true };
  }

  const rowsIn: (readonly number[])[] = [];
  for (const item of value) {
    if (typeof item === 'number') {
      throw new DimensionMismatch('constant', 'row', 'number', 'mixed one- and two-dimensional input');
    }
    rowsIn.push(item);
  }
  const nRows = rowsIn.length;
  const nCols = first.length;

  rowsIn.forEach((row, i) => {
    if (row.length !== nCols) {
      throw new DimensionMismatch(
        'constant',
        `row 0 with ${nCols} cols`,
        `row ${i} with ${row.length} cols`,
        'ragged matrix'
      );
    }
  });

  const shape = matrix(nRows, nCols);
  // Flatten to column-major order
  const data = new Float64Array(nRows * nCols);
  rowsIn.forEach((row, i) => {
    row.forEach((v, j) => {
      data[j * nRows + i] = v;
    });
  });

  return { type: 'dense', data, shape, flat: false };
}

/** Get the shape of ArrayData */
export function arrayDataShape(data: ArrayData): Shape {
  switch (data.type) {
    case 'scalar':
      return scalar();
    case 'dense':
      return data.shape;
  }
}

/** Column-major values of ArrayData */
export function arrayDataValues(data: ArrayData): Float64Array {
  switch (data.type) {
    case 'scalar':
      return new Float64Array([data.value]);
    case 'dense':
      return data.data;
  }
}

/** True when every element is zero */
export function arrayDataIsZero(data: ArrayData): boolean {
  return arrayDataValues(data).every((v) => v === 0);
}

/** True when every element is >= 0 */
export function arrayDataIsNonnegative(data: ArrayData): boolean {
  return arrayDataValues(data).every((v) => v >= 0);
}

/** True when every element is <= 0 */
export function arrayDataIsNonpositive(data: ArrayData): boolean {
  return arrayDataValues(data).every((v) => v <= 0);
}

/**
 * Transpose column-major values of the given shape.
 */
export function transposeValues(values: Float64Array, shape: Shape): Float64Array {
  const { rows, cols } = shape;
  const result = new Float64Array(values.length);
  for (let j = 0; j < cols; j++) {
    for (let i = 0; i < rows; i++) {
      result[i * cols + j] = values[j * rows + i];
    }
  }
  return result;
}

/** Transpose ArrayData. The result is never flagged one-dimensional. */
export function transposeArrayData(data: ArrayData): ArrayData {
  if (data.type === 'scalar') return data;
  const shape = { rows: data.shape.cols, cols: data.shape.rows };
  return { type: 'dense', data: transposeValues(data.data, data.shape), shape, flat: false };
}

/** Format ArrayData for expression names */
export function arrayDataToString(data: ArrayData): string {
  if (data.type === 'scalar') return formatNumber(data.value);
  const { rows, cols } = data.shape;
  if (data.flat) {
    return `[${Array.from(data.data, formatNumber).join(', ')}]`;
  }
  const lines: string[] = [];
  for (let i = 0; i < rows; i++) {
    const row: string[] = [];
    for (let j = 0; j < cols; j++) {
      row.push(formatNumber(data.data[j * rows + i]));
    }
    lines.push(`[${row.join(', ')}]`);
  }
  return `[${lines.join(', ')}]`;
}

function formatNumber(v: number): string {
  return Object.is(v, -0) ? '0' : String(v);
}

/**
 * Check that a value array has the element count of a shape.
 */
export function checkValueSize(operator: string, values: Float64Array, shape: Shape): void {
  if (values.length !== size(shape)) {
    throw new DimensionMismatch(operator, shapeToString(shape), `${values.length} values`);
  }
}
