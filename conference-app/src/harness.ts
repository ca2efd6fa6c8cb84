import type { Logger } from 'pino';
import { PostgresRepository, field, predicate, query } from '../../src/index.js';
import type { Conference } from './domain/conference.js';
import { findConferenceById, type ConferenceRepository } from './repositories/conference-repository.js';

export interface HarnessOptions {
  /** Conference read back by key and updated. */
  findOneId: number;
  /** Conference removed by predicate. */
  deleteId: number;
  pageIndex: number;
  pageSize: number;
}

export interface HarnessSummary {
  count: number;
  findAll: number;
  /** Null when the repository has no SQL store behind it. */
  sqlQuery: number | null;
  /** Participants before and after the update; null when the conference does not exist. */
  findOne: { before: number; after: number } | null;
  countAfterDelete: number;
  whereAnd: number;
  orderBy: number[];
  paging: { items: number; totalCount: number };
  dynamicQuery: number[];
}

const DEFAULT_OPTIONS: HarnessOptions = { findOneId: 48, deleteId: 47, pageIndex: 1, pageSize: 20 };

/**
 * Walks the repository through one of each operation, logging a line per
 * step. Mutates the store: one conference gains a participant and another
 * is deleted.
 */
export async function runHarness(
  repository: ConferenceRepository,
  logger: Logger,
  options: Partial<HarnessOptions> = {},
): Promise<HarnessSummary> {
  const { findOneId, deleteId, pageIndex, pageSize } = { ...DEFAULT_OPTIONS, ...options };

  const count = await repository.count();
  logger.info({ count }, 'count');

  const small = await repository.findAll(query<Conference>().where(field<Conference>('participantsNum').lt(100)));
  logger.info({ count: small.length }, 'findAll');

  let sqlQuery: number | null = null;
  if (repository instanceof PostgresRepository) {
    const rows = await repository.sqlQuery('SELECT * FROM conference WHERE participants_num < $1', [100]);
    sqlQuery = rows.length;
    logger.info({ count: sqlQuery }, 'sqlQuery');
  }

  let findOne: HarnessSummary['findOne'] = null;
  const conference = await findConferenceById(repository, findOneId);
  if (conference === null) {
    logger.warn({ conferenceId: findOneId }, 'findOne: no such conference');
  } else {
    const before = conference.participantsNum;
    await repository.update({ ...conference, participantsNum: before + 1 });
    const reloaded = await findConferenceById(repository, findOneId);
    findOne = { before, after: reloaded?.participantsNum ?? before };
    logger.info(findOne, 'findOne/update');
  }

  await repository.deleteWhere(predicate<Conference>('ConferenceId == @0', deleteId));
  const countAfterDelete = await repository.count();
  logger.info({ count: countAfterDelete }, 'deleteWhere');

  const combined = query<Conference>()
    .where(field<Conference>('conferenceId').lt(150).or(field<Conference>('name').contains('Summit')))
    .whereAnd(field<Conference>('status').eq(2))
    .take(3);
  const whereAnd = (await repository.findAll(combined)).length;
  logger.info({ count: whereAnd }, 'findAll where/whereAnd/limit');

  const ordered = query<Conference>().where('ParticipantsNum > 1').orderBy('Status').thenByDescending('ConferenceId');
  const orderBy = (await repository.findAll(ordered)).map((c) => c.conferenceId);
  logger.info({ ids: orderBy }, 'findAll orderBy/thenByDescending');

  const page = await repository.findPage(ordered, pageIndex, pageSize);
  const paging = { items: page.items.length, totalCount: page.totalCount };
  logger.info(paging, 'findPage');

  const dynamic = query<Conference>().where('ConferenceId < 100').whereAnd('Status = {0}', 1).orderBy('ConferenceId DESC');
  const dynamicQuery = (await repository.findAll(dynamic)).map((c) => c.conferenceId);
  logger.info({ ids: dynamicQuery }, 'findAll dynamic query');

  return { count, findAll: small.length, sqlQuery, findOne, countAfterDelete, whereAnd, orderBy, paging, dynamicQuery };
}
