import type pg from 'pg';
import type { Logger } from 'pino';
import { InMemoryRepository, PostgresRepository, field, type Repository } from '../../../src/index.js';
import { conferenceEntity, type Conference } from '../domain/conference.js';

export type ConferenceRepository = Repository<Conference>;

export function createConferenceRepository(pool: pg.Pool, logger?: Logger): PostgresRepository<Conference> {
  return new PostgresRepository<Conference>({
    pool,
    entity: conferenceEntity,
    ...(logger !== undefined ? { logger } : {}),
  });
}

export function createInMemoryConferenceRepository(items: Iterable<Conference> = []): InMemoryRepository<Conference> {
  return new InMemoryRepository<Conference>({ entity: conferenceEntity, items });
}

export function findConferenceById(repository: ConferenceRepository, conferenceId: number): Promise<Conference | null> {
  return repository.findOne(field<Conference>('conferenceId').eq(conferenceId));
}
