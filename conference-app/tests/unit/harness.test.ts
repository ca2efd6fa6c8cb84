import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import type { Logger } from 'pino';
import { runHarness } from '../../src/harness.js';
import {
  createConferenceRepository,
  createInMemoryConferenceRepository,
} from '../../src/repositories/conference-repository.js';
import { ConferenceStatus } from '../../src/domain/conference.js';
import { makeConference } from './helpers/conferences.js';

function makeLogger() {
  const info = vi.fn();
  const warn = vi.fn();
  return { logger: { info, warn } as unknown as Logger, info, warn };
}

const { Open, Closed } = ConferenceStatus;

function seededRepository() {
  return createInMemoryConferenceRepository([
    makeConference({ conferenceId: 10, name: 'Alpha Summit', status: Closed, participantsNum: 40 }),
    makeConference({ conferenceId: 47, name: 'Beta', status: Open, participantsNum: 20 }),
    makeConference({ conferenceId: 48, name: 'Gamma', status: Open, participantsNum: 99 }),
    makeConference({ conferenceId: 120, name: 'Delta', status: Closed, participantsNum: 300 }),
    makeConference({ conferenceId: 200, name: 'Cloud Summit', status: Closed, participantsNum: 1 }),
  ]);
}

describe('runHarness', () => {
  it('walks through every repository operation', async () => {
    const { logger } = makeLogger();
    const summary = await runHarness(seededRepository(), logger);
    expect(summary).toEqual({
      count: 5,
      findAll: 4,
      sqlQuery: null,
      findOne: { before: 99, after: 100 },
      countAfterDelete: 4,
      whereAnd: 3,
      orderBy: [48, 120, 10],
      paging: { items: 3, totalCount: 3 },
      dynamicQuery: [48],
    });
  });

  it('logs one line per step', async () => {
    const { logger, info } = makeLogger();
    await runHarness(seededRepository(), logger);
    expect(info.mock.calls.map((call) => call[1])).toEqual([
      'count',
      'findAll',
      'findOne/update',
      'deleteWhere',
      'findAll where/whereAnd/limit',
      'findAll orderBy/thenByDescending',
      'findPage',
      'findAll dynamic query',
    ]);
    expect(info).toHaveBeenCalledWith({ ids: [48, 120, 10] }, 'findAll orderBy/thenByDescending');
  });

  it('warns and carries on when the conference to update is missing', async () => {
    const { logger, warn } = makeLogger();
    const summary = await runHarness(seededRepository(), logger, { findOneId: 999, pageSize: 2 });
    expect(summary.findOne).toBeNull();
    expect(summary.paging).toEqual({ items: 2, totalCount: 3 });
    expect(warn).toHaveBeenCalledWith({ conferenceId: 999 }, 'findOne: no such conference');
  });

  it('runs the raw SQL step against PostgreSQL', async () => {
    const queryFn = vi.fn(async (sql: string) =>
      sql.startsWith('SELECT COUNT(*)') ? { rows: [{ count: '0' }], rowCount: 1 } : { rows: [], rowCount: 0 },
    );
    const pool = { query: queryFn } as unknown as pg.Pool;
    const { logger } = makeLogger();
    const summary = await runHarness(createConferenceRepository(pool), logger);
    expect(summary.sqlQuery).toBe(0);
    expect(summary.count).toBe(0);
    expect(queryFn).toHaveBeenCalledWith('SELECT * FROM conference WHERE participants_num < $1', [100]);
  });
});
