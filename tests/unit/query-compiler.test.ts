import { describe, it, expect } from 'vitest';
import { bindOrderings, parsePredicate } from '../../src/expression/dynamic.js';
import { parseOrderingSyntax } from '../../src/expression/parser.js';
import {
  compileCountQuery,
  compileDeleteByKeyQuery,
  compileDeleteQuery,
  compileExistsQuery,
  compileInsertQuery,
  compileSelectQuery,
  compileUpdateQuery,
} from '../../src/query/compiler.js';
import { conferenceEntity, makeConference } from './helpers/fixtures.js';

const COLUMNS = '"conference_id", "name", "status", "participants_num", "rating", "start_date", "tags"';

function where(text: string, ...values: unknown[]) {
  return parsePredicate(conferenceEntity, text, ...values).expr;
}

function orderings(text: string) {
  return bindOrderings(conferenceEntity, parseOrderingSyntax(text)).keys;
}

describe('compileSelectQuery', () => {
  it('selects every column without a filter', () => {
    const { sql, params } = compileSelectQuery(conferenceEntity);
    expect(sql).toBe(`SELECT ${COLUMNS}\nFROM "conference"`);
    expect(params).toEqual([]);
  });

  it('adds the WHERE clause', () => {
    const { sql, params } = compileSelectQuery(conferenceEntity, { where: where('ParticipantsNum < @0', 100) });
    expect(sql).toBe(`SELECT ${COLUMNS}\nFROM "conference"\nWHERE ("participants_num" < $1::integer)`);
    expect(params).toEqual([100]);
  });

  it('orders with null placement and a key tie-breaker', () => {
    const { sql } = compileSelectQuery(conferenceEntity, { orderings: orderings('Status, Rating desc') });
    expect(sql.split('\n')[2]).toBe(
      'ORDER BY "status" ASC NULLS FIRST, "rating" DESC NULLS LAST, "conference_id" ASC',
    );
  });

  it('omits the tie-breaker when the key is already ordered', () => {
    const { sql } = compileSelectQuery(conferenceEntity, { orderings: orderings('ConferenceId desc') });
    expect(sql.split('\n')[2]).toBe('ORDER BY "conference_id" DESC NULLS LAST');
  });

  it('orders by the key alone when limited without orderings', () => {
    const { sql, params } = compileSelectQuery(conferenceEntity, { limit: 10, offset: 20 });
    expect(sql.split('\n').slice(2)).toEqual(['ORDER BY "conference_id" ASC', 'LIMIT $1', 'OFFSET $2']);
    expect(params).toEqual([10, 20]);
  });

  it('numbers limit parameters after the filter parameters', () => {
    const { sql, params } = compileSelectQuery(conferenceEntity, {
      where: where('Status == 1'),
      orderings: orderings('Name'),
      limit: 3,
    });
    expect(sql.split('\n').slice(2)).toEqual([
      'WHERE ("status" = $1::integer)',
      'ORDER BY "name" COLLATE "C" ASC NULLS FIRST, "conference_id" ASC',
      'LIMIT $2',
    ]);
    expect(params).toEqual([1, 3]);
  });
});

describe('compileCountQuery and compileExistsQuery', () => {
  it('counts matching rows', () => {
    const { sql, params } = compileCountQuery(conferenceEntity, where('Status == 2'));
    expect(sql).toBe('SELECT COUNT(*) AS count\nFROM "conference"\nWHERE ("status" = $1::integer)');
    expect(params).toEqual([2]);
  });

  it('counts every row without a filter', () => {
    expect(compileCountQuery(conferenceEntity).sql).toBe('SELECT COUNT(*) AS count\nFROM "conference"');
  });

  it('wraps the filter in EXISTS', () => {
    expect(compileExistsQuery(conferenceEntity, where('Status == 2')).sql).toBe(
      'SELECT EXISTS (SELECT 1 FROM "conference" WHERE ("status" = $1::integer)) AS exists',
    );
    expect(compileExistsQuery(conferenceEntity).sql).toBe('SELECT EXISTS (SELECT 1 FROM "conference") AS exists');
  });
});

describe('write statements', () => {
  it('inserts every column but a generated key', () => {
    const c = makeConference();
    const { sql, params } = compileInsertQuery(conferenceEntity, c);
    expect(sql).toBe(
      [
        'INSERT INTO "conference" ("name", "status", "participants_num", "rating", "start_date", "tags")',
        'VALUES ($1, $2, $3, $4, $5, $6)',
        `RETURNING ${COLUMNS}`,
      ].join('\n'),
    );
    expect(params).toEqual(['Node Summit', 1, 50, null, c.startDate, ['node', 'typescript']]);
  });

  it('updates by key', () => {
    const { sql, params } = compileUpdateQuery(conferenceEntity, makeConference({ conferenceId: 7 }));
    expect(sql.split('\n').slice(0, 3)).toEqual([
      'UPDATE "conference"',
      'SET "name" = $1, "status" = $2, "participants_num" = $3, "rating" = $4, "start_date" = $5, "tags" = $6',
      'WHERE "conference_id" = $7',
    ]);
    expect(params[6]).toBe(7);
  });

  it('deletes by key or by predicate', () => {
    expect(compileDeleteByKeyQuery(conferenceEntity, 7)).toEqual({
      sql: 'DELETE FROM "conference"\nWHERE "conference_id" = $1',
      params: [7],
    });
    expect(compileDeleteQuery(conferenceEntity, where('ConferenceId == @0', 47))).toEqual({
      sql: 'DELETE FROM "conference"\nWHERE ("conference_id" = $1::integer)',
      params: [47],
    });
  });
});
