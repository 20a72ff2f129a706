/**
 * Coordinator-side reduction: element-wise sums of partial statistics and the
 * metrics derived from them.
 */

import { DegenerateLabelSpaceError, InvalidAveragingModeError } from './errors.js';
import type { AveragingMode, Matrix, NormalizeMode, TpFpTable } from './types.js';

/** `a / b`, with 0 wherever the quotient is NaN or infinite. */
export function safeDivide(a: number, b: number): number {
  const q = a / b;
  return Number.isFinite(q) ? q : 0;
}

/** NaN becomes 0 and ±Infinity the largest finite value of the same sign. */
export function nanToNum(v: number): number {
  if (Number.isNaN(v)) return 0;
  if (v === Infinity) return Number.MAX_VALUE;
  if (v === -Infinity) return -Number.MAX_VALUE;
  return v;
}

export function zeroMatrix(rows: number, cols: number = rows): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

export function sumTables(tables: readonly TpFpTable[], nclasses: number): TpFpTable {
  const total: TpFpTable = Array.from({ length: nclasses }, () => [0, 0]);
  for (const table of tables) {
    total.forEach((row, c) => {
      const [tp, fp] = table[c] ?? [0, 0];
      row[0] += tp;
      row[1] += fp;
    });
  }
  return total;
}

export function sumMatrices(matrices: readonly Matrix[], n: number): Matrix {
  const total = zeroMatrix(n);
  for (const m of matrices) {
    total.forEach((row, r) => {
      const other = m[r] ?? [];
      for (let c = 0; c < n; c++) {
        row[c] = (row[c] ?? 0) + (other[c] ?? 0);
      }
    });
  }
  return total;
}

/** Total over every cell of a matrix. */
export function matrixTotal(matrix: Matrix): number {
  return matrix.reduce((sum, row) => sum + row.reduce((s, v) => s + v, 0), 0);
}

/**
 * Reject label spaces precision is undefined for. `binary` with more than two
 * classes is checked before the single-class case.
 */
export function checkPrecisionLabelSpace(nclasses: number, average: AveragingMode): void {
  if (average === 'binary' && nclasses > 2) {
    throw new InvalidAveragingModeError(
      `Binary precision is undefined for more than two classes (got ${nclasses}); use 'macro' or 'micro'`,
    );
  }
  if (nclasses < 2) {
    throw new DegenerateLabelSpaceError(
      `Single-class precision is undefined (label space has ${nclasses} class)`,
    );
  }
}

/** TP / (TP + FP) per class, 0 for classes never predicted. */
export function perClassPrecision(table: TpFpTable): number[] {
  return table.map(([tp, fp]) => safeDivide(tp, tp + fp));
}

/**
 * Collapse a global TP/FP table into one precision value.
 *
 * - `binary`: precision of the second (positive) class
 * - `macro`: unweighted mean of per-class precision
 * - `micro`: pooled TP over pooled TP + FP
 */
export function precisionFromTable(table: TpFpTable, average: AveragingMode): number {
  checkPrecisionLabelSpace(table.length, average);

  switch (average) {
    case 'binary':
      return perClassPrecision(table)[1] ?? 0;
    case 'macro': {
      const perClass = perClassPrecision(table);
      return perClass.reduce((a, b) => a + b, 0) / perClass.length;
    }
    case 'micro': {
      const tp = table.reduce((sum, [t]) => sum + t, 0);
      const fp = table.reduce((sum, [, f]) => sum + f, 0);
      return safeDivide(tp, tp + fp);
    }
  }
}

/**
 * Normalize a confusion matrix by row sums (`'true'`), column sums (`'pred'`)
 * or the grand total (`'all'`). Cells whose divisor is zero become 0. Raw
 * counts only pass through {@link nanToNum}.
 */
export function normalizeMatrix(matrix: Matrix, mode: NormalizeMode): Matrix {
  if (mode === null) {
    return matrix.map((row) => row.map(nanToNum));
  }

  if (mode === 'true') {
    return matrix.map((row) => {
      const sum = row.reduce((a, b) => a + b, 0);
      return row.map((v) => safeDivide(v, sum));
    });
  }

  if (mode === 'pred') {
    const colSums = (matrix[0] ?? []).map((_, c) =>
      matrix.reduce((sum, row) => sum + (row[c] ?? 0), 0),
    );
    return matrix.map((row) => row.map((v, c) => safeDivide(v, colSums[c] ?? 0)));
  }

  const total = matrixTotal(matrix);
  return matrix.map((row) => row.map((v) => safeDivide(v, total)));
}
