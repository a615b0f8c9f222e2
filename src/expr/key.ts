import type { Shape } from './shape.js';
import { shapeToString } from './shape.js';
import { DimensionMismatch } from '../error.js';

/**
 * A slice along one axis, with the usual start/stop/step semantics:
 * negative positions count from the end, out-of-range bounds are clipped.
 */
export interface Slice {
  readonly start?: number;
  readonly stop?: number;
  readonly step?: number;
}

/**
 * Key for one axis.
 *
 * Integers, slices and `'all'` form a simple key. Integer lists (fancy
 * indexing) and boolean masks make the whole key special.
 */
export type AxisKey = number | Slice | 'all' | readonly number[] | readonly boolean[];

/** A boolean mask with the full shape of the indexed expression */
export type BooleanMask = readonly (readonly boolean[])[];

export type IndexKey = AxisKey | BooleanMask;

/**
 * Resolved selection of an index key.
 */
export interface Selection {
  /** Column-major positions in the source, in column-major order of the result */
  readonly selection: number[];
  readonly shape: Shape;
  readonly key: string;
  readonly special: boolean;
}

/**
 * Create a slice.
 *
 * @example
 * ```ts
 * x.index(slice(0, 3))        // x[0:3]
 * A.index(slice(), 1)         // A[:, 1]
 * x.index(slice(undefined, undefined, -1))  // x[::-1]
 * ```
 */
export function slice(start?: number, stop?: number, step?: number): Slice {
  return { start, stop, step };
}

function isBooleanMask(key: IndexKey): key is BooleanMask {
  return Array.isArray(key) && key.length > 0 && Array.isArray(key[0]);
}

function isListKey(key: IndexKey): key is readonly number[] | readonly boolean[] {
  return Array.isArray(key) && !isBooleanMask(key);
}

function isSlice(key: IndexKey): key is Slice {
  return typeof key === 'object' && !Array.isArray(key);
}

/**
 * Does the key select through a list or a mask?
 */
export function isSpecialKey(keys: readonly IndexKey[]): boolean {
  return keys.some((key) => isListKey(key) || isBooleanMask(key));
}

/** Format a key the way it would be written between brackets */
export function formatKey(keys: readonly IndexKey[]): string {
  return keys.map(formatAxisKey).join(', ');
}

function formatAxisKey(key: IndexKey): string {
  if (typeof key === 'number') return String(key);
  if (key === 'all') return ':';
  if (isSlice(key)) {
    const parts = [key.start ?? '', key.stop ?? ''].map(String);
    if (key.step !== undefined) parts.push(String(key.step));
    return parts.join(':');
  }
  const items: readonly unknown[] = key;
  return `[${items.map((item) => (Array.isArray(item) ? `[${item.join(', ')}]` : String(item))).join(', ')}]`;
}

/**
 * Positions selected by a slice on an axis of the given length.
 */
export function sliceIndices(s: Slice, length: number): number[] {
  const step = s.step ?? 1;
  if (!Number.isInteger(step) || step === 0) {
    throw new DimensionMismatch('index', `axis of size ${length}`, `step ${step}`, 'slice step must be a non-zero integer');
  }

  const lower = step > 0 ? 0 : -1;
  const upper = step > 0 ? length : length - 1;
  const clip = (bound: number | undefined, fallback: number): number => {
    if (bound === undefined) return fallback;
    const b = bound < 0 ? bound + length : bound;
    return Math.min(Math.max(b, lower), upper);
  };

  const start = clip(s.start, step > 0 ? lower : upper);
  const stop = clip(s.stop, step > 0 ? upper : lower);

  const result: number[] = [];
  for (let i = start; step > 0 ? i < stop : i > stop; i += step) {
    result.push(i);
  }
  return result;
}

/** Axis after resolution: the positions it selects, and whether it came from a list */
interface ResolvedAxis {
  readonly positions: number[];
  readonly advanced: boolean;
  /** An integer position (broadcasts against lists) */
  readonly single: boolean;
}

/**
 * Resolve an index key against a shape.
 *
 * A single key on a column vector indexes rows, on a row vector columns.
 * On a matrix a single key must be a full-shape boolean mask.
 */
export function resolveKey(shape: Shape, keys: readonly IndexKey[]): Selection {
  const label = formatKey(keys);
  const fail = (detail: string): DimensionMismatch =>
    new DimensionMismatch('index', shapeToString(shape), `[${label}]`, detail);

  const [first, second] = keys;
  if (keys.length === 1 && isBooleanMask(first)) {
    return resolveMask(shape, first, label, fail);
  }

  let axisKeys: readonly [IndexKey, IndexKey];
  if (keys.length === 1) {
    if (shape.cols === 1) {
      axisKeys = [first, 'all'];
    } else if (shape.rows === 1) {
      axisKeys = ['all', first];
    } else {
      throw fail('a matrix needs a row and a column key');
    }
  } else if (keys.length === 2) {
    axisKeys = [first, second];
  } else {
    throw fail(`expected 1 or 2 keys, got ${keys.length}`);
  }

  const rowAxis = resolveAxis(axisKeys[0], shape.rows, 0, fail);
  const colAxis = resolveAxis(axisKeys[1], shape.cols, 1, fail);
  const special = rowAxis.advanced || colAxis.advanced;

  // Lists (and integers) on both axes pair up elementwise
  const paired = (rowAxis.advanced || rowAxis.single) && (colAxis.advanced || colAxis.single);
  if (special && paired) {
    const n = Math.max(rowAxis.positions.length, colAxis.positions.length);
    const rowLen = rowAxis.positions.length;
    const colLen = colAxis.positions.length;
    if ((rowLen !== n && rowLen !== 1) || (colLen !== n && colLen !== 1)) {
      throw fail(`cannot pair ${rowLen} row positions with ${colLen} column positions`);
    }
    if (n === 0) throw fail('empty selection');
    const selection: number[] = [];
    for (let k = 0; k < n; k++) {
      const r = rowAxis.positions[rowLen === 1 ? 0 : k];
      const c = colAxis.positions[colLen === 1 ? 0 : k];
      selection.push(r + c * shape.rows);
    }
    return { selection, shape: { rows: n, cols: 1 }, key: label, special };
  }

  const rowPositions = rowAxis.positions;
  const colPositions = colAxis.positions;
  if (rowPositions.length === 0 || colPositions.length === 0) {
    throw fail('empty selection');
  }
  const selection: number[] = [];
  for (const c of colPositions) {
    for (const r of rowPositions) {
      selection.push(r + c * shape.rows);
    }
  }
  return {
    selection,
    shape: { rows: rowPositions.length, cols: colPositions.length },
    key: label,
    special,
  };
}

function resolveAxis(
  key: IndexKey,
  length: number,
  axis: number,
  fail: (detail: string) => DimensionMismatch
): ResolvedAxis {
  const position = (i: number): number => {
    if (!Number.isInteger(i)) throw fail(`index ${i} is not an integer`);
    const wrapped = i < 0 ? i + length : i;
    if (wrapped < 0 || wrapped >= length) {
      throw fail(`index ${i} out of bounds for axis ${axis} with size ${length}`);
    }
    return wrapped;
  };

  if (typeof key === 'number') {
    return { positions: [position(key)], advanced: false, single: true };
  }
  if (key === 'all') {
    return { positions: sliceIndices({}, length), advanced: false, single: false };
  }
  if (isSlice(key)) {
    return { positions: sliceIndices(key, length), advanced: false, single: false };
  }
  if (isBooleanMask(key)) {
    throw fail('a boolean mask must be the only key');
  }
  const items: readonly unknown[] = key;
  if (items.every((item): item is boolean => typeof item === 'boolean') && items.length > 0) {
    if (items.length !== length) {
      throw fail(`boolean mask of length ${items.length} for axis ${axis} with size ${length}`);
    }
    const positions: number[] = [];
    items.forEach((selected, i) => {
      if (selected) positions.push(i);
    });
    return { positions, advanced: true, single: false };
  }
  const positions = items.map((item) => {
    if (typeof item !== 'number') throw fail('lists must hold only integers or only booleans');
    return position(item);
  });
  return { positions, advanced: true, single: false };
}

/**
 * Select the `true` cells of a full-shape mask, in row-major order.
 * The result is a column vector.
 */
function resolveMask(
  shape: Shape,
  mask: BooleanMask,
  label: string,
  fail: (detail: string) => DimensionMismatch
): Selection {
  if (mask.length !== shape.rows || mask.some((row) => row.length !== shape.cols)) {
    throw fail('boolean mask must have the shape of the expression');
  }
  const selection: number[] = [];
  mask.forEach((row, i) => {
    row.forEach((selected, j) => {
      if (selected) selection.push(i + j * shape.rows);
    });
  });
  if (selection.length === 0) throw fail('empty selection');
  return { selection, shape: { rows: selection.length, cols: 1 }, key: label, special: true };
}
