import { describe, it, expect } from 'vitest';
import {
  parseExpression,
  parseOrdering,
  parsePredicate,
  parseProjection,
} from '../../src/expression/dynamic.js';
import { DynamicRecord } from '../../src/expression/record-types.js';
import { typeName } from '../../src/expression/type-system.js';
import { IncompatibleOperandsError, ParseError, UnknownMemberError } from '../../src/errors.js';
import { conferenceEntity, makeConference } from './helpers/fixtures.js';

function evaluate(text: string, it = makeConference()): unknown {
  return parseExpression(text, { it: conferenceEntity }).evaluate(it);
}

function failure(text: string): ParseError {
  try {
    parseExpression(text, { it: conferenceEntity });
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected '${text}' to fail`);
}

describe('parsePredicate()', () => {
  it('binds entity fields case-insensitively', () => {
    const p = parsePredicate(conferenceEntity, 'ConferenceId < 100');
    expect(p.test(makeConference({ conferenceId: 50 }))).toBe(true);
    expect(p.test(makeConference({ conferenceId: 150 }))).toBe(false);
  });

  it('substitutes positional values', () => {
    const p = parsePredicate(conferenceEntity, 'Status == @0 && Name.StartsWith({1})', 1, 'Node');
    expect(p.test(makeConference())).toBe(true);
    expect(p.test(makeConference({ status: 2 }))).toBe(false);
  });

  it('treats a null result as false', () => {
    expect(parsePredicate(conferenceEntity, 'Rating > 3').test(makeConference())).toBe(false);
  });

  it('requires a boolean expression', () => {
    expect(() => parsePredicate(conferenceEntity, 'Status + 1')).toThrow("Expression of type 'bool' expected");
  });

  it('reports unknown fields with the entity name', () => {
    try {
      parsePredicate(conferenceEntity, 'Venue == "x"');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownMemberError);
      expect((err as UnknownMemberError).message).toBe("No property or field 'Venue' exists in type 'Conference'");
      expect((err as UnknownMemberError).position).toBe(0);
    }
  });
});

describe('parseExpression() arithmetic', () => {
  it('follows operator precedence', () => {
    expect(evaluate('1 + 2 * 3')).toBe(7);
  });

  it('truncates integer division toward zero', () => {
    expect(evaluate('7 / 2')).toBe(3);
    expect(evaluate('-7 / 2')).toBe(-3);
    expect(evaluate('7 % 3')).toBe(1);
  });

  it('uses floating division when either operand is real', () => {
    expect(evaluate('7.0 / 2')).toBe(3.5);
    expect(evaluate('1.0 / 0')).toBe(Infinity);
  });

  it('throws on integral division by zero', () => {
    expect(() => evaluate('1 / 0')).toThrow('Attempted to divide by zero.');
  });

  it('wraps int overflow', () => {
    expect(evaluate('2147483647 + 1')).toBe(-2147483648);
  });

  it('keeps the exact low 32 bits of int and uint products', () => {
    expect(evaluate('2147483647 * 2147483647')).toBe(1);
    expect(evaluate('ParticipantsNum * ParticipantsNum', makeConference({ participantsNum: 2147483647 }))).toBe(1);
    expect(evaluate('4294967295U * 4294967295U')).toBe(1);
    expect(evaluate('65536 * 65536')).toBe(0);
  });

  it.each([
    ['7 + 2L', 'long', 7 + 2],
    ['7 / 2L', 'long', Math.trunc(7 / 2)],
    ['7 * 2.5', 'double', 7 * 2.5],
    ['3L * 1.5', 'double', 3 * 1.5],
    ['10 % 4.0', 'double', 10 % 4.0],
    ['5.5m - 2', 'decimal', 5.5 - 2],
    ['1.5f + 1', 'float', Math.fround(1.5 + 1)],
    ['ParticipantsNum * 2L', 'long', 50 * 2],
    ['ParticipantsNum / 4.0', 'double', 50 / 4.0],
    ['ParticipantsNum - 0.25m', 'decimal', 50 - 0.25],
  ])('evaluates %s as %s like native arithmetic', (text, type, expected) => {
    const compiled = parseExpression(text, { it: conferenceEntity });
    expect(typeName(compiled.type)).toBe(type);
    expect(compiled.evaluate(makeConference())).toBe(expected);
  });

  it('concatenates when either operand is a string', () => {
    expect(evaluate('"a" + 1')).toBe('a1');
    expect(evaluate('Name & "!"')).toBe('Node Summit!');
  });

  it('reports incompatible operands', () => {
    const err = failure('Name - 1');
    expect(err).toBeInstanceOf(IncompatibleOperandsError);
    expect(err.message).toBe("Operator '-' incompatible with operand types 'string' and 'int'");
    expect(err.position).toBe(5);
  });
});

describe('parseExpression() determinism', () => {
  it('binds identical text and values to equal trees', () => {
    const text = 'Status == @0 && Name.StartsWith(@1) || ParticipantsNum * 2L > 100';
    const bind = () => parseExpression(text, { it: conferenceEntity, values: [1, 'Node'] }).expr;
    expect(bind()).toEqual(bind());
  });
});

describe('parseExpression() nulls', () => {
  it('applies three-valued logic to && and ||', () => {
    expect(evaluate('null && false')).toBe(false);
    expect(evaluate('null && true')).toBeNull();
    expect(evaluate('null || true')).toBe(true);
  });

  it('propagates null through lifted operators', () => {
    expect(evaluate('Rating + 1')).toBeNull();
    expect(evaluate('Rating == null')).toBe(true);
    expect(evaluate('Rating.HasValue')).toBe(false);
    expect(evaluate('Rating + 1', makeConference({ rating: 4.5 }))).toBe(5.5);
  });

  it('lifts a value-type branch when the other branch is null', () => {
    const e = parseExpression('Status == 1 ? 10 : null', { it: conferenceEntity });
    expect(typeName(e.type)).toBe('int?');
    expect(e.evaluate(makeConference())).toBe(10);
    expect(e.evaluate(makeConference({ status: 2 }))).toBeNull();
  });
});

describe('parseExpression() members', () => {
  it('reads string properties and methods', () => {
    expect(evaluate('Name.Length')).toBe(11);
    expect(evaluate('Name.Substring(5)')).toBe('Summit');
    expect(evaluate('Name.IndexOf("Summit")')).toBe(5);
    expect(evaluate('Name[0]')).toBe('N');
    expect(evaluate('Name.ToUpper()')).toBe('NODE SUMMIT');
  });

  it('reads DateTime parts in UTC', () => {
    expect(evaluate('StartDate.Year')).toBe(2024);
    expect(evaluate('StartDate.Month')).toBe(5);
    expect(evaluate('StartDate.Hour')).toBe(9);
  });

  it('subtracts dates into a TimeSpan', () => {
    expect(evaluate('(StartDate - DateTime(2024, 5, 10)).TotalHours')).toBe(9.5);
  });

  it('calls Math functions, rounding midpoints away from zero', () => {
    expect(evaluate('Math.Round(2.5)')).toBe(3);
    expect(evaluate('Math.Round(-2.5)')).toBe(-3);
    expect(evaluate('Math.Abs(-3)')).toBe(3);
    expect(evaluate('Math.Max(1, 2.5)')).toBe(2.5);
  });

  it('reports an unknown method', () => {
    expect(failure('Name.Reverse()').message).toBe("No applicable method 'Reverse' exists in type 'string'");
  });
});

describe('parseExpression() sequences', () => {
  it('evaluates aggregates with an implicit it', () => {
    expect(evaluate('Tags.Count(Length > 4)')).toBe(1);
    expect(evaluate('Tags.Max(Length)')).toBe(10);
    expect(evaluate('Tags.Sum(Length)')).toBe(14);
    expect(evaluate('Tags.Average(Length)')).toBe(7);
    expect(evaluate('Tags.Any(it == "node")')).toBe(true);
    expect(evaluate('Tags.All(StartsWith("n"))')).toBe(false);
  });

  it('returns the first element or throws on an empty match', () => {
    expect(evaluate('Tags.First()')).toBe('node');
    expect(() => evaluate('Tags.First(it == "x")')).toThrow('Sequence contains no elements');
  });

  it('tests membership of an array literal', () => {
    expect(evaluate('[1, 2, 3].Contains(Status)')).toBe(true);
    expect(evaluate('[2, 3].Contains(Status)')).toBe(false);
  });

  it('rejects an unknown aggregate', () => {
    expect(failure('Tags.Reverse()').message).toBe("No applicable aggregate method 'Reverse' exists in type 'string[]'");
  });
});

describe('parseExpression() conversions and conditionals', () => {
  it('applies explicit numeric conversions', () => {
    expect(evaluate('int(3.7)')).toBe(3);
    expect(evaluate('char(65)')).toBe('A');
  });

  it('rejects conversions between unrelated types', () => {
    expect(failure('int("a")').message).toBe("A value of type 'string' cannot be converted to type 'int'");
  });

  it('requires a boolean test', () => {
    const err = failure('1 ? 2 : 3');
    expect(err.message).toBe("The first expression must be of type 'bool'");
    expect(err.position).toBe(0);
  });

  it('rejects branches without a common type', () => {
    expect(failure('true ? 1 : "a"').message).toBe("Neither of the types 'int' and 'string' converts to the other");
  });

  it('checks a requested result type', () => {
    expect(() => parseExpression('"a"', { resultType: 'int' })).toThrow("Expression of type 'int' expected");
    expect(parseExpression('1', { resultType: 'long?' }).evaluate()).toBe(1);
  });

  it('resolves named externals', () => {
    expect(parseExpression('@limit * 2', { externals: { limit: 21 } }).evaluate()).toBe(42);
  });
});

describe('parseOrdering()', () => {
  it('sorts by every key in order', () => {
    const items = [
      makeConference({ conferenceId: 3, status: 1 }),
      makeConference({ conferenceId: 5, status: 2 }),
      makeConference({ conferenceId: 9, status: 1 }),
    ];
    const ordering = parseOrdering(conferenceEntity, 'Status, ConferenceId desc');
    expect(ordering.sort(items).map((c) => c.conferenceId)).toEqual([9, 3, 5]);
  });

  it('sorts nulls first when ascending', () => {
    const items = [makeConference({ conferenceId: 1, rating: 2 }), makeConference({ conferenceId: 2, rating: null })];
    expect(parseOrdering(conferenceEntity, 'Rating').sort(items).map((c) => c.conferenceId)).toEqual([2, 1]);
  });
});

describe('parseProjection()', () => {
  it('builds records with inferred and explicit names', () => {
    const projection = parseProjection(conferenceEntity, 'new(Name, Status as State)');
    const record = projection.project(makeConference());
    expect(record).toBeInstanceOf(DynamicRecord);
    if (!(record instanceof DynamicRecord)) return;
    expect(record.get('Name')).toBe('Node Summit');
    expect(record.get('state')).toBe(1);
    expect(record.toJSON()).toEqual({ name: 'Node Summit', State: 1 });
  });

  it('gives equal projections the same record type', () => {
    const a = parseProjection(conferenceEntity, 'new(Status as State, Name)').project(makeConference());
    const b = parseProjection(conferenceEntity, 'new(Name, Status as State)').project(makeConference());
    expect(a).toBeInstanceOf(DynamicRecord);
    expect(b).toBeInstanceOf(DynamicRecord);
    if (!(a instanceof DynamicRecord) || !(b instanceof DynamicRecord)) return;
    expect(a.recordType).toBe(b.recordType);
    expect(a.equals(b)).toBe(true);
  });

  it('rejects a duplicate property name', () => {
    const err = failure('new(Name, Name)');
    expect(err.message).toBe("The property 'name' was defined more than once");
    expect(err.position).toBe(10);
  });
});
