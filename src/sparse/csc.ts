/**
 * Compressed Sparse Column (CSC) matrix format.
 *
 * Gradient blocks are stored in this format: most Jacobians of affine atoms
 * are permutations, selections or Kronecker products with an identity.
 *
 * For an m×n matrix with nnz non-zeros:
 * - colPtr has length n + 1
 * - rowIdx and values have length nnz, sorted by row within each column
 */
export interface CscMatrix {
  /** Number of rows */
  readonly nrows: number;
  /** Number of columns */
  readonly ncols: number;
  /** Column pointers (length ncols + 1) */
  readonly colPtr: Uint32Array;
  /** Row indices (length nnz) */
  readonly rowIdx: Uint32Array;
  /** Non-zero values (length nnz) */
  readonly values: Float64Array;
}

/**
 * Create an all-zero CSC matrix.
 */
export function cscEmpty(nrows: number, ncols: number): CscMatrix {
  return {
    nrows,
    ncols,
    colPtr: new Uint32Array(ncols + 1),
    rowIdx: new Uint32Array(0),
    values: new Float64Array(0),
  };
}

/**
 * Create a CSC identity matrix.
 */
export function cscIdentity(n: number): CscMatrix {
  return cscDiag(new Float64Array(n).fill(1));
}

/**
 * Create CSC matrix from triplets (row, col, value).
 *
 * Duplicates at the same position are summed; explicit zeros are dropped.
 */
export function cscFromTriplets(
  nrows: number,
  ncols: number,
  rows: readonly number[],
  cols: readonly number[],
  vals: readonly number[]
): CscMatrix {
  if (rows.length !== cols.length || cols.length !== vals.length) {
    throw new Error('Triplet arrays must have same length');
  }

  const order = rows.map((_, i) => i);
  order.sort((a, b) => cols[a] - cols[b] || rows[a] - rows[b]);

  const mergedRows: number[] = [];
  const mergedCols: number[] = [];
  const mergedVals: number[] = [];
  for (const i of order) {
    const r = rows[i];
    const c = cols[i];
    if (r < 0 || r >= nrows || c < 0 || c >= ncols) {
      throw new Error(`Triplet (${r}, ${c}) outside a ${nrows}×${ncols} matrix`);
    }
    const last = mergedVals.length - 1;
    if (last >= 0 && mergedRows[last] === r && mergedCols[last] === c) {
      mergedVals[last] += vals[i];
    } else {
      mergedRows.push(r);
      mergedCols.push(c);
      mergedVals.push(vals[i]);
    }
  }

  const colPtr = new Uint32Array(ncols + 1);
  const rowIdx: number[] = [];
  const values: number[] = [];
  mergedVals.forEach((v, k) => {
    if (v === 0) return;
    rowIdx.push(mergedRows[k]);
    values.push(v);
    colPtr[mergedCols[k] + 1]++;
  });
  for (let c = 0; c < ncols; c++) {
    colPtr[c + 1] += colPtr[c];
  }

  return {
    nrows,
    ncols,
    colPtr,
    rowIdx: Uint32Array.from(rowIdx),
    values: Float64Array.from(values),
  };
}

/**
 * Create CSC matrix from dense array (column-major order).
 */
export function cscFromDense(nrows: number, ncols: number, data: Float64Array): CscMatrix {
  const rows: number[] = [];
  const cols: number[] = [];
  const vals: number[] = [];

  for (let c = 0; c < ncols; c++) {
    for (let r = 0; r < nrows; r++) {
      const v = data[c * nrows + r];
      if (v !== 0) {
        rows.push(r);
        cols.push(c);
        vals.push(v);
      }
    }
  }

  return cscFromTriplets(nrows, ncols, rows, cols, vals);
}

/**
 * Number of non-zero elements.
 */
export function cscNnz(A: CscMatrix): number {
  return A.values.length;
}

/**
 * Get element at (row, col). Returns 0 for elements not stored.
 */
export function cscGet(A: CscMatrix, row: number, col: number): number {
  for (let i = A.colPtr[col]; i < A.colPtr[col + 1]; i++) {
    if (A.rowIdx[i] === row) {
      return A.values[i];
    }
  }
  return 0;
}

/**
 * Scale matrix by scalar: result = scalar * A
 */
export function cscScale(A: CscMatrix, scalar: number): CscMatrix {
  if (scalar === 0) {
    return cscEmpty(A.nrows, A.ncols);
  }
  return {
    nrows: A.nrows,
    ncols: A.ncols,
    colPtr: A.colPtr, // Shared (immutable)
    rowIdx: A.rowIdx, // Shared (immutable)
    values: A.values.map((v) => scalar * v),
  };
}

/**
 * Add two matrices: result = A + B
 */
export function cscAdd(A: CscMatrix, B: CscMatrix): CscMatrix {
  if (A.nrows !== B.nrows || A.ncols !== B.ncols) {
    throw new Error(
      `Cannot add matrices with different shapes: ${A.nrows}×${A.ncols} vs ${B.nrows}×${B.ncols}`
    );
  }

  const rows: number[] = [];
  const cols: number[] = [];
  const vals: number[] = [];
  for (const M of [A, B]) {
    for (let c = 0; c < M.ncols; c++) {
      for (let i = M.colPtr[c]; i < M.colPtr[c + 1]; i++) {
        rows.push(M.rowIdx[i]);
        cols.push(c);
        vals.push(M.values[i]);
      }
    }
  }

  return cscFromTriplets(A.nrows, A.ncols, rows, cols, vals);
}

/**
 * Matrix-matrix multiplication: result = A * B
 */
export function cscMulMat(A: CscMatrix, B: CscMatrix): CscMatrix {
  if (A.ncols !== B.nrows) {
    throw new Error(`Cannot multiply: A has ${A.ncols} cols, B has ${B.nrows} rows`);
  }

  const rows: number[] = [];
  const cols: number[] = [];
  const vals: number[] = [];

  // For each column of B
  for (let c = 0; c < B.ncols; c++) {
    const colResult = new Float64Array(A.nrows);

    // Add A's column bRow scaled by B[bRow, c]
    for (let i = B.colPtr[c]; i < B.colPtr[c + 1]; i++) {
      const bRow = B.rowIdx[i];
      const bVal = B.values[i];
      for (let j = A.colPtr[bRow]; j < A.colPtr[bRow + 1]; j++) {
        colResult[A.rowIdx[j]] += A.values[j] * bVal;
      }
    }

    colResult.forEach((v, r) => {
      if (v !== 0) {
        rows.push(r);
        cols.push(c);
        vals.push(v);
      }
    });
  }

  return cscFromTriplets(A.nrows, B.ncols, rows, cols, vals);
}

/**
 * Create a diagonal matrix from vector.
 */
export function cscDiag(v: Float64Array): CscMatrix {
  const n = v.length;
  const rows: number[] = [];
  const vals: number[] = [];
  v.forEach((x, i) => {
    rows.push(i);
    vals.push(x);
  });
  return cscFromTriplets(n, n, rows, rows, vals);
}

/**
 * Convert CSC matrix to dense array (column-major order).
 */
export function cscToDense(A: CscMatrix): Float64Array {
  const result = new Float64Array(A.nrows * A.ncols);

  for (let c = 0; c < A.ncols; c++) {
    for (let i = A.colPtr[c]; i < A.colPtr[c + 1]; i++) {
      result[c * A.nrows + A.rowIdx[i]] = A.values[i];
    }
  }

  return result;
}

/**
 * Check if two matrices are equal within a tolerance.
 */
export function cscEquals(A: CscMatrix, B: CscMatrix, tol = 1e-10): boolean {
  if (A.nrows !== B.nrows || A.ncols !== B.ncols) {
    return false;
  }
  const a = cscToDense(A);
  const b = cscToDense(B);
  return a.every((v, i) => Math.abs(v - b[i]) <= tol);
}
