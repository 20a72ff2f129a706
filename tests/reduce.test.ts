import { describe, expect, it } from 'vitest';
import { DegenerateLabelSpaceError, InvalidAveragingModeError } from '../src/errors.js';
import {
  checkPrecisionLabelSpace,
  matrixTotal,
  nanToNum,
  normalizeMatrix,
  perClassPrecision,
  precisionFromTable,
  safeDivide,
  sumMatrices,
  sumTables,
} from '../src/reduce.js';
import type { TpFpTable } from '../src/types.js';

describe('nanToNum', () => {
  it('replaces NaN and infinities', () => {
    expect(nanToNum(Number.NaN)).toBe(0);
    expect(nanToNum(Infinity)).toBe(Number.MAX_VALUE);
    expect(nanToNum(-Infinity)).toBe(-Number.MAX_VALUE);
    expect(nanToNum(-2.5)).toBe(-2.5);
  });
});

describe('safeDivide', () => {
  it('divides', () => {
    expect(safeDivide(1, 4)).toBe(0.25);
  });

  it('returns 0 for 0/0 and x/0', () => {
    expect(safeDivide(0, 0)).toBe(0);
    expect(safeDivide(3, 0)).toBe(0);
  });
});

describe('sumTables', () => {
  it('sums element-wise without touching the partials', () => {
    const a: TpFpTable = [
      [1, 0],
      [2, 1],
    ];
    const b: TpFpTable = [
      [0, 1],
      [1, 0],
    ];
    expect(sumTables([a, b], 2)).toEqual([
      [1, 1],
      [3, 1],
    ]);
    expect(a).toEqual([
      [1, 0],
      [2, 1],
    ]);
  });

  it('returns zeros when there is nothing to sum', () => {
    expect(sumTables([], 3)).toEqual([
      [0, 0],
      [0, 0],
      [0, 0],
    ]);
  });
});

describe('sumMatrices', () => {
  it('sums element-wise', () => {
    const total = sumMatrices(
      [
        [
          [1, 2],
          [3, 4],
        ],
        [
          [1, 0],
          [0, 1],
        ],
      ],
      2,
    );
    expect(total).toEqual([
      [2, 2],
      [3, 5],
    ]);
    expect(matrixTotal(total)).toBe(12);
  });
});

describe('precisionFromTable', () => {
  const table: TpFpTable = [
    [1, 0],
    [2, 1],
  ];

  it('binary returns the precision of the second class', () => {
    expect(precisionFromTable(table, 'binary')).toBeCloseTo(2 / 3);
  });

  it('macro averages per-class precision', () => {
    expect(precisionFromTable(table, 'macro')).toBeCloseTo(5 / 6);
  });

  it('micro pools true and false positives', () => {
    expect(precisionFromTable(table, 'micro')).toBe(0.75);
  });

  it('macro counts a never-predicted class as 0', () => {
    expect(
      precisionFromTable(
        [
          [1, 0],
          [0, 0],
        ],
        'macro',
      ),
    ).toBe(0.5);
  });

  it('micro is 0 when nothing was predicted inside the label space', () => {
    expect(
      precisionFromTable(
        [
          [0, 0],
          [0, 0],
        ],
        'micro',
      ),
    ).toBe(0);
  });

  it('rejects binary with more than two classes', () => {
    expect(() =>
      precisionFromTable(
        [
          [1, 0],
          [1, 0],
          [1, 0],
        ],
        'binary',
      ),
    ).toThrow(InvalidAveragingModeError);
  });

  it('rejects a single class', () => {
    expect(() => precisionFromTable([[1, 0]], 'macro')).toThrow(DegenerateLabelSpaceError);
    expect(() => precisionFromTable([[1, 0]], 'binary')).toThrow(DegenerateLabelSpaceError);
  });
});

describe('checkPrecisionLabelSpace', () => {
  it('checks the binary rule before the single-class rule', () => {
    expect(() => checkPrecisionLabelSpace(3, 'binary')).toThrow(
      'Binary precision is undefined for more than two classes',
    );
    expect(() => checkPrecisionLabelSpace(3, 'macro')).not.toThrow();
  });
});

describe('perClassPrecision', () => {
  it('divides TP by predictions per class', () => {
    expect(
      perClassPrecision([
        [3, 1],
        [0, 0],
      ]),
    ).toEqual([0.75, 0]);
  });
});

describe('normalizeMatrix', () => {
  it('normalizes by row sums and keeps all-zero rows at zero', () => {
    expect(
      normalizeMatrix(
        [
          [1, 1],
          [0, 0],
        ],
        'true',
      ),
    ).toEqual([
      [0.5, 0.5],
      [0, 0],
    ]);
  });

  it('normalizes by column sums', () => {
    expect(
      normalizeMatrix(
        [
          [1, 3],
          [1, 0],
        ],
        'pred',
      ),
    ).toEqual([
      [0.5, 1],
      [0.5, 0],
    ]);
  });

  it('normalizes by the grand total', () => {
    expect(
      normalizeMatrix(
        [
          [1, 3],
          [0, 0],
        ],
        'all',
      ),
    ).toEqual([
      [0.25, 0.75],
      [0, 0],
    ]);
  });

  it('gives zeros for an all-zero matrix', () => {
    expect(
      normalizeMatrix(
        [
          [0, 0],
          [0, 0],
        ],
        'all',
      ),
    ).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });

  it('leaves counts alone without a mode, apart from NaN', () => {
    expect(normalizeMatrix([[Number.NaN, 2]], null)).toEqual([[0, 2]]);
  });

  it('keeps raw counts finite', () => {
    expect(normalizeMatrix([[Infinity, -Infinity, 3]], null)).toEqual([
      [Number.MAX_VALUE, -Number.MAX_VALUE, 3],
    ]);
  });
});
