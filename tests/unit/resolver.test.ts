import { describe, it, expect } from 'vitest';
import type { Expr } from '../../src/expression/expr.js';
import { ARITHMETIC_SIGNATURES, EQUALITY_SIGNATURES } from '../../src/expression/operators.js';
import { findBestOverload, promote } from '../../src/expression/resolver.js';
import { INT, NULL_TYPE, STRING, primitive, typeName, type TypeRef } from '../../src/expression/type-system.js';

function param(type: TypeRef): Expr {
  return { kind: 'parameter', type, depth: 0, pos: 0 };
}

function intLiteral(value: number): Expr {
  return { kind: 'constant', type: INT, value, literal: { kind: 'integer', value }, pos: 0 };
}

const nullConstant: Expr = { kind: 'constant', type: NULL_TYPE, value: null, pos: 0 };

describe('promote()', () => {
  it('returns the expression itself when the types match', () => {
    const e = param(INT);
    expect(promote(e, INT)).toBe(e);
  });

  it('wraps an implicit conversion in a convert node', () => {
    const e = param(INT);
    expect(promote(e, primitive('long'))).toEqual({
      kind: 'convert',
      type: primitive('long'),
      operand: e,
      explicit: false,
      pos: 0,
    });
  });

  it('retypes numeric literals instead of converting them', () => {
    expect(promote(intLiteral(7), primitive('byte'))).toEqual({
      kind: 'constant',
      type: primitive('byte'),
      value: 7,
      literal: { kind: 'integer', value: 7 },
      pos: 0,
    });
  });

  it('types a null constant as the target when the target accepts null', () => {
    expect(promote(nullConstant, primitive('int', true))).toEqual({ ...nullConstant, type: primitive('int', true) });
    expect(promote(nullConstant, INT)).toBeUndefined();
  });

  it('returns undefined without an implicit conversion', () => {
    expect(promote(param(STRING), INT)).toBeUndefined();
    expect(promote(param(primitive('long')), INT)).toBeUndefined();
  });
});

describe('findBestOverload()', () => {
  it('picks the exact signature for matching operands', () => {
    const result = findBestOverload(ARITHMETIC_SIGNATURES, [param(INT), param(INT)]);
    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(result.signature.params.map(typeName)).toEqual(['int', 'int']);
    expect(typeName(result.signature.result)).toBe('int');
  });

  it('widens the narrower operand', () => {
    const result = findBestOverload(ARITHMETIC_SIGNATURES, [param(INT), param(primitive('long'))]);
    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(result.signature.params.map(typeName)).toEqual(['long', 'long']);
    expect(result.args[0]).toMatchObject({ kind: 'convert', type: primitive('long') });
  });

  it('picks the lifted signature for a nullable operand', () => {
    const result = findBestOverload(ARITHMETIC_SIGNATURES, [param(primitive('int', true)), param(INT)]);
    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(typeName(result.signature.result)).toBe('int?');
  });

  it('lets a literal adopt the other operand type', () => {
    const result = findBestOverload(ARITHMETIC_SIGNATURES, [intLiteral(5), param(primitive('ulong'))]);
    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(typeName(result.signature.result)).toBe('ulong');
    expect(result.args[0]).toMatchObject({ kind: 'constant', type: primitive('ulong'), value: 5 });
  });

  it('reports ambiguity between unrelated widenings', () => {
    const result = findBestOverload(ARITHMETIC_SIGNATURES, [param(primitive('ulong')), param(INT)]);
    expect(result.kind).toBe('ambiguous');
  });

  it('reports no match for incompatible operands', () => {
    expect(findBestOverload(ARITHMETIC_SIGNATURES, [param(STRING), param(INT)]).kind).toBe('none');
    expect(findBestOverload(EQUALITY_SIGNATURES, [param(STRING), param(INT)]).kind).toBe('none');
  });

  it('rejects candidates of the wrong arity', () => {
    expect(findBestOverload(ARITHMETIC_SIGNATURES, [param(INT)]).kind).toBe('none');
  });
});
