import { describe, it, expect, beforeEach } from 'vitest';
import {
  variable,
  scalarVar,
  constant,
  castToConst,
  zeros,
  ones,
  eye,
  slice,
  evaluate,
  resetExprIds,
  VariableBuilder,
  getVariableId,
  isVariable,
  isConstant,
  getConstantData,
} from '../../src/index.js';
import { add, sub, neg, mul, div, transpose, index } from '../../src/atoms/index.js';
import { DimensionMismatch, DisciplineViolation, ExpressionError } from '../../src/error.js';

describe('Leaves', () => {
  beforeEach(() => {
    resetExprIds();
  });

  it('assigns increasing ids', () => {
    const x = variable(2);
    const y = variable(2);
    expect(x.id).toBe(0);
    expect(y.id).toBe(1);
    expect(getVariableId(y)).toBe(1);
  });

  it('builds variables with options', () => {
    const x = new VariableBuilder([2, 3]).name('X').nonneg().nonpos().build();
    expect(x.kind).toBe('variable');
    expect(x.shape).toEqual({ rows: 2, cols: 3 });
    expect(x.name()).toBe('X');
    expect(x.isNegative()).toBe(true);
    expect(x.isPositive()).toBe(false);
    expect(isVariable(x)).toBe(true);
  });

  it('rejects getVariableId on a constant', () => {
    expect(() => getVariableId(constant(1))).toThrow(ExpressionError);
  });

  it('builds constants of each shape', () => {
    expect(constant(5).shape).toEqual({ rows: 1, cols: 1 });
    expect(constant([1, 2, 3]).shape).toEqual({ rows: 3, cols: 1 });
    expect(
      constant([
        [1, 2, 3],
        [4, 5, 6],
      ]).shape
    ).toEqual({ rows: 2, cols: 3 });
    expect(isConstant(constant(5))).toBe(true);
  });

  it('stores matrices column-major', () => {
    const data = getConstantData(
      constant([
        [1, 2],
        [3, 4],
      ])
    );
    expect(data.type).toBe('dense');
    if (data.type === 'dense') {
      expect(Array.from(data.data)).toEqual([1, 3, 2, 4]);
      expect(data.flat).toBe(false);
    }
  });

  it('builds zeros, ones and eye', () => {
    expect(zeros(3).shape).toEqual({ rows: 3, cols: 1 });
    expect(Array.from(evaluate(ones(2, 2)) ?? [])).toEqual([1, 1, 1, 1]);
    expect(Array.from(evaluate(eye(2)) ?? [])).toEqual([1, 0, 0, 1]);
  });
});

describe('castToConst', () => {
  beforeEach(() => {
    resetExprIds();
  });

  it('passes expressions through', () => {
    const x = variable(2);
    expect(castToConst(x)).toBe(x.data);
    expect(castToConst(x.data)).toBe(x.data);
  });

  it('wraps a flat array as a one-dimensional column', () => {
    const c = castToConst([1, 2]);
    expect(c.kind).toBe('constant');
    if (c.kind === 'constant' && c.value.type === 'dense') {
      expect(c.value.shape).toEqual({ rows: 2, cols: 1 });
      expect(c.value.flat).toBe(true);
    }
  });

  it('rejects ragged input', () => {
    expect(() => castToConst([[1, 2], [3]])).toThrow(DimensionMismatch);
  });

  it('rejects empty input', () => {
    expect(() => castToConst([])).toThrow(DimensionMismatch);
  });
});

describe('Affine atoms', () => {
  beforeEach(() => {
    resetExprIds();
  });

  describe('add', () => {
    it('adds two expressions', () => {
      const z = add(variable(3), variable(3));
      expect(z.kind).toBe('add');
      expect(z.shape).toEqual({ rows: 3, cols: 1 });
    });

    it('promotes a scalar on either side', () => {
      const x = variable([2, 3]);
      expect(add(x, 1).shape).toEqual({ rows: 2, cols: 3 });
      expect(add(2, x).shape).toEqual({ rows: 2, cols: 3 });
    });

    it('rejects incompatible shapes', () => {
      try {
        add(variable(3), variable(2));
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(DimensionMismatch);
        if (e instanceof DimensionMismatch) {
          expect(e.operator).toBe('add');
          expect(e.left).toBe('(3, 1)');
          expect(e.right).toBe('(2, 1)');
        }
      }
    });
  });

  describe('sub and neg', () => {
    it('sub is add of the negation', () => {
      const z = sub(variable(2), variable(2));
      expect(z.kind).toBe('add');
      const right = z.data.kind === 'add' ? z.data.right : undefined;
      expect(right?.kind).toBe('neg');
    });

    it('neg keeps the shape', () => {
      expect(neg(variable([2, 3])).shape).toEqual({ rows: 2, cols: 3 });
    });
  });

  describe('mul', () => {
    it('constant on the left is a mul node', () => {
      const A = constant([
        [1, 2, 3],
        [4, 5, 6],
      ]);
      const z = mul(A, variable(3));
      expect(z.kind).toBe('mul');
      expect(z.shape).toEqual({ rows: 2, cols: 1 });
    });

    it('moves a scalar constant to the left', () => {
      const z = mul(variable(3), 2);
      expect(z.kind).toBe('mul');
      const left = z.data.kind === 'mul' ? z.data.left : undefined;
      expect(left?.kind).toBe('constant');
      expect(z.shape).toEqual({ rows: 3, cols: 1 });
    });

    it('keeps a matrix constant on the right as rmul', () => {
      const X = variable([2, 3]);
      const C = constant([
        [1, 2],
        [3, 4],
        [5, 6],
      ]);
      const z = mul(X, C);
      expect(z.kind).toBe('rmul');
      expect(z.shape).toEqual({ rows: 2, cols: 2 });
    });

    it('treats a flat array matching the rows as a row', () => {
      const z = mul([1, 2, 3], variable(3));
      expect(z.shape).toEqual({ rows: 1, cols: 1 });
      const left = z.data.kind === 'mul' ? z.data.left : undefined;
      expect(left?.kind).toBe('transpose');
    });

    it('keeps a flat array as a column when the rows differ', () => {
      const z = mul([1, 2, 3], scalarVar());
      expect(z.shape).toEqual({ rows: 3, cols: 1 });
      const left = z.data.kind === 'mul' ? z.data.left : undefined;
      expect(left?.kind).toBe('constant');
    });

    it('rejects two non-constant operands', () => {
      expect(() => mul(variable(2), variable(2))).toThrow(
        'DCP violation in mul: cannot multiply two non-constant expressions'
      );
    });

    it('rejects mismatched inner dimensions', () => {
      const A = constant([
        [1, 2, 3],
        [4, 5, 6],
      ]);
      expect(() => mul(A, variable(2))).toThrow(DimensionMismatch);
    });
  });

  describe('div', () => {
    it('keeps the numerator shape', () => {
      expect(div(variable([2, 2]), 2).shape).toEqual({ rows: 2, cols: 2 });
    });

    it('rejects a non-scalar divisor', () => {
      expect(() => div(variable(2), [1, 2])).toThrow(DisciplineViolation);
    });

    it('rejects a non-constant divisor', () => {
      expect(() => div(variable(2), scalarVar())).toThrow(DisciplineViolation);
    });

    it('rejects division by zero', () => {
      expect(() => div(variable(2), 0)).toThrow('DCP violation in div: division by zero');
    });

    it('rejects a constant divisor that sums to zero', () => {
      const x = variable(2);
      expect(() => div(x, sub(constant(1), 1))).toThrow('DCP violation in div: division by zero');
      expect(() => x.div(constant(1).sub(1))).toThrow(DisciplineViolation);
    });

    it('accepts a constant divisor that sums to a non-zero value', () => {
      const x = variable(2);
      const z = div(x, sub(constant(3), 1));
      const v = new Map([[x.id, new Float64Array([1, 4])]]);
      expect(Array.from(evaluate(z, v) ?? [])).toEqual([0.5, 2]);
    });
  });

  describe('transpose', () => {
    it('swaps the shape', () => {
      const z = transpose(variable([2, 3]));
      expect(z.kind).toBe('transpose');
      expect(z.shape).toEqual({ rows: 3, cols: 2 });
    });

    it('returns scalar nodes unchanged', () => {
      const c = castToConst(4);
      expect(transpose(c).data).toBe(c);
    });
  });

  describe('index', () => {
    it('slices a vector', () => {
      const z = index(variable(5), slice(1, 3));
      expect(z.kind).toBe('index');
      expect(z.shape).toEqual({ rows: 2, cols: 1 });
    });

    it('selects rows and columns of a matrix', () => {
      const A = variable([3, 4]);
      expect(A.index('all', 1).shape).toEqual({ rows: 3, cols: 1 });
      expect(A.index(0, 'all').shape).toEqual({ rows: 1, cols: 4 });
      expect(A.index(slice(0, 2), slice(1, 4)).shape).toEqual({ rows: 2, cols: 3 });
    });

    it('records whether the key is special', () => {
      const A = variable([3, 4]);
      const simple = A.index(0, 'all').data;
      const fancy = A.index([0, 2], [1, 3]).data;
      expect(simple.kind === 'index' && simple.special).toBe(false);
      expect(fancy.kind === 'index' && fancy.special).toBe(true);
    });

    it('rejects keys out of bounds', () => {
      expect(() => index(variable(3), 5)).toThrow(DimensionMismatch);
    });
  });
});
