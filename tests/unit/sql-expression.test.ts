import { describe, it, expect } from 'vitest';
import { parseExpression, parsePredicate } from '../../src/expression/dynamic.js';
import { compileSqlExpression, pgType, quoteIdentifier, type SqlParams } from '../../src/query/sql-expression.js';
import { parseTypeName } from '../../src/expression/type-system.js';
import { UnsupportedExpressionError } from '../../src/errors.js';
import { conferenceEntity } from './helpers/fixtures.js';

function sql(text: string, ...values: unknown[]): { sql: string; params: unknown[] } {
  const ctx: SqlParams = { params: [], counter: { n: 0 } };
  const expr = parsePredicate(conferenceEntity, text, ...values).expr;
  return { sql: compileSqlExpression(expr, ctx), params: ctx.params };
}

describe('compileSqlExpression()', () => {
  it('compiles a comparison to a column and a typed parameter', () => {
    expect(sql('ConferenceId < 100')).toEqual({ sql: '("conference_id" < $1::integer)', params: [100] });
  });

  it('numbers parameters across the whole expression', () => {
    expect(sql('Status == 1 && Name.StartsWith("Node")')).toEqual({
      sql: '(("status" = $1::integer) AND starts_with("name", $2::text))',
      params: [1, 'Node'],
    });
  });

  it('keeps boolean constants inline', () => {
    expect(sql('true || Status == @0', 2)).toEqual({ sql: '(TRUE OR ("status" = $1::integer))', params: [2] });
  });

  it('compiles null comparisons to IS NULL', () => {
    expect(sql('Name == null').sql).toBe('("name" IS NULL)');
    expect(sql('Rating != null').sql).toBe('("rating" IS NOT NULL)');
  });

  it('compares nullable operands with IS DISTINCT FROM', () => {
    expect(sql('Name != "x"').sql).toBe('("name" IS DISTINCT FROM $1::text)');
    expect(sql('Name + "!" == "x!"').sql).toBe('(concat("name", $1::text) IS NOT DISTINCT FROM $2::text)');
  });

  it('treats an unknown nullable comparison as false', () => {
    expect(sql('Rating > 3')).toEqual({ sql: 'COALESCE("rating" > $1::double precision, FALSE)', params: [3] });
  });

  it('compares text under the C collation', () => {
    expect(sql('Name < "m"')).toEqual({ sql: 'COALESCE("name" COLLATE "C" < $1::text, FALSE)', params: ['m'] });
  });

  it('translates members through their SQL templates', () => {
    expect(sql('Name.Length > 3').sql).toBe('(char_length("name") > $1::integer)');
    expect(sql('StartDate.Year == 2024').sql).toBe(
      '(CAST(EXTRACT(YEAR FROM "start_date") AS integer) = $1::integer)',
    );
  });

  it('translates Contains over arrays to ANY', () => {
    expect(sql('Tags.Contains("node")')).toEqual({ sql: '($1::text = ANY("tags"))', params: ['node'] });
    expect(sql('[1, 2].Contains(Status)')).toEqual({ sql: '("status" = ANY($1::integer[]))', params: [[1, 2]] });
  });

  it('casts explicit conversions', () => {
    expect(sql('long(Status) == 5').sql).toBe('(CAST("status" AS bigint) = $1::bigint)');
  });

  it('negates with NOT', () => {
    expect(sql('!(Status == 1)').sql).toBe('(NOT ("status" = $1::integer))');
  });

  it('compiles conditionals to CASE', () => {
    const ctx: SqlParams = { params: [], counter: { n: 0 } };
    const expr = parseExpression('Status == 1 ? Name : "none"', { it: conferenceEntity }).expr;
    expect(compileSqlExpression(expr, ctx)).toBe('(CASE WHEN ("status" = $1::integer) THEN "name" ELSE $2::text END)');
    expect(ctx.params).toEqual([1, 'none']);
  });

  it('rejects aggregates with a predicate', () => {
    expect(() => sql('Tags.Any(it == "x")')).toThrow(UnsupportedExpressionError);
    expect(() => sql('Tags.Any(it == "x")')).toThrow("Aggregate 'Any' cannot be translated to SQL");
  });

  it('rejects projections', () => {
    const ctx: SqlParams = { params: [], counter: { n: 0 } };
    const expr = parseExpression('new(Name)', { it: conferenceEntity }).expr;
    expect(() => compileSqlExpression(expr, ctx)).toThrow('A new(...) projection cannot be translated to SQL');
  });
});

describe('pgType() and quoteIdentifier()', () => {
  it('maps primitive and array types', () => {
    expect(pgType(parseTypeName('DateTime?'))).toBe('timestamptz');
    expect(pgType(parseTypeName('string[]'))).toBe('text[]');
    expect(pgType(parseTypeName('object'))).toBeNull();
  });

  it('doubles embedded quotes', () => {
    expect(quoteIdentifier('a"b')).toBe('"a""b"');
  });
});
