import { describe, it, expect, vi } from 'vitest';
import type { Logger } from 'pino';
import { InMemoryRepository } from '../../src/repository/in-memory-repository.js';
import { defineEntity } from '../../src/entity/schema.js';
import { field, predicate } from '../../src/query/predicate.js';
import { FilterExpression } from '../../src/query/filter-expression.js';
import { query } from '../../src/query/query-object.js';
import {
  ArgumentError,
  EntityNotFoundError,
  NonUniqueResultError,
  ParseError,
  RepositoryError,
} from '../../src/errors.js';
import { DynamicRecord } from '../../src/expression/record-types.js';
import { conferenceEntity, makeConference, type Conference } from './helpers/fixtures.js';

function seeded(): InMemoryRepository<Conference> {
  return new InMemoryRepository({
    entity: conferenceEntity,
    items: [
      makeConference({ conferenceId: 1, name: 'Alpha', status: 1, participantsNum: 10 }),
      makeConference({ conferenceId: 2, name: 'Beta', status: 2, participantsNum: 120 }),
      makeConference({ conferenceId: 3, name: 'Gamma', status: 1, participantsNum: 60 }),
    ],
  });
}

describe('InMemoryRepository CRUD', () => {
  it('generates keys after the largest seeded key', async () => {
    const repo = seeded();
    const created = await repo.create(makeConference({ conferenceId: 0, name: 'Delta' }));
    expect(created.conferenceId).toBe(4);
    expect(await repo.count()).toBe(4);
  });

  it('stores copies', async () => {
    const repo = seeded();
    const input = makeConference({ name: 'Delta' });
    const created = await repo.create(input);
    created.name = 'changed';
    input.name = 'changed too';
    const loaded = await repo.findOne(field<Conference>('conferenceId').eq(created.conferenceId));
    expect(loaded?.name).toBe('Delta');
  });

  it('does not share arrays or dates with callers', async () => {
    const repo = seeded();
    const input = makeConference({ conferenceId: 0, name: 'Delta' });
    const created = await repo.create(input);
    input.tags.push('from-input');
    created.startDate.setUTCFullYear(2000);

    const [first] = await repo.findAll(query<Conference>().where('ConferenceId == 1'));
    first?.tags.push('mutated');
    first?.startDate.setUTCFullYear(2001);

    const reloaded = await repo.findAll(
      query<Conference>().where('ConferenceId == 1 || ConferenceId == 4').orderBy('ConferenceId'),
    );
    expect(reloaded.map((c) => c.tags)).toEqual([
      ['node', 'typescript'],
      ['node', 'typescript'],
    ]);
    expect(reloaded.map((c) => c.startDate.toISOString())).toEqual([
      '2024-05-10T09:30:00.000Z',
      '2024-05-10T09:30:00.000Z',
    ]);
  });

  it('rejects a duplicate key when keys are not generated', async () => {
    interface Tag {
      code: string;
    }
    const tagEntity = defineEntity<Tag>({ name: 'Tag', table: 'tag', key: 'code', fields: { code: 'string' } });
    const repo = new InMemoryRepository({ entity: tagEntity, items: [{ code: 'node' }] });
    await expect(repo.create({ code: 'node' })).rejects.toThrow(RepositoryError);
    await expect(repo.create({ code: 'node' })).rejects.toThrow('Tag with key node already exists');
    await expect(repo.create({ code: 'deno' })).resolves.toEqual({ code: 'deno' });
  });

  it('updates an existing entity', async () => {
    const repo = seeded();
    const updated = await repo.update(makeConference({ conferenceId: 2, name: 'Beta 2' }));
    expect(updated.name).toBe('Beta 2');
    expect((await repo.findOne('ConferenceId == 2'))?.name).toBe('Beta 2');
  });

  it('rejects updating or deleting a missing key', async () => {
    const repo = seeded();
    await expect(repo.update(makeConference({ conferenceId: 9 }))).rejects.toThrow(EntityNotFoundError);
    await expect(repo.delete(makeConference({ conferenceId: 9 }))).rejects.toThrow('Conference with key 9 not found');
  });

  it('deletes by key', async () => {
    const repo = seeded();
    await repo.delete(makeConference({ conferenceId: 1 }));
    expect(await repo.exists('ConferenceId == 1')).toBe(false);
  });
});

describe('InMemoryRepository.deleteWhere', () => {
  it('removes every match and returns the number removed', async () => {
    const repo = seeded();
    expect(await repo.deleteWhere('Status == @0', 1)).toBe(2);
    expect(await repo.count()).toBe(1);
  });

  it('returns 0 when nothing matches', async () => {
    expect(await seeded().deleteWhere(predicate<Conference>('Status == 9'))).toBe(0);
  });

  it('leaves the store intact when the predicate throws partway through', async () => {
    const repo = seeded();
    await expect(repo.deleteWhere('100 / (ConferenceId - 2) != 7')).rejects.toThrow(RangeError);
    expect(await repo.count()).toBe(3);
  });

  it('rejects an empty filter', async () => {
    await expect(seeded().deleteWhere(FilterExpression.empty<Conference>())).rejects.toThrow(ArgumentError);
  });
});

describe('InMemoryRepository queries', () => {
  it('finds one match or null', async () => {
    const repo = seeded();
    expect((await repo.findOne('Name == "Gamma"'))?.conferenceId).toBe(3);
    expect(await repo.findOne('Name == "Zeta"')).toBeNull();
  });

  it('rejects several matches in findOne', async () => {
    await expect(seeded().findOne('Status == 1')).rejects.toThrow(NonUniqueResultError);
  });

  it('surfaces parse errors from predicate text', async () => {
    await expect(seeded().count('Status ==')).rejects.toThrow(ParseError);
  });

  it('runs queries with ordering and limit', async () => {
    const q = query<Conference>().where('ParticipantsNum < 100').orderByDescending('ParticipantsNum');
    expect((await seeded().findAll(q)).map((c) => c.conferenceId)).toEqual([3, 1]);
  });

  it('pages with the filtered total', async () => {
    const page = await seeded().findPage(query<Conference>().where('Status == 1').orderBy('ConferenceId'), 2, 1);
    expect(page.items.map((c) => c.conferenceId)).toEqual([3]);
    expect(page.totalCount).toBe(2);
    expect(page.pageIndex).toBe(2);
    expect(page.pageSize).toBe(1);
  });

  it('counts and checks existence', async () => {
    const repo = seeded();
    expect(await repo.count('Status == 1')).toBe(2);
    expect(await repo.exists(field<Conference>('participantsNum').gt(100))).toBe(true);
  });

  it('projects results', async () => {
    const [first] = await seeded().select(query<Conference>().orderBy('Name desc').take(1), 'new(Name, Status)');
    expect(first).toBeInstanceOf(DynamicRecord);
    expect(first instanceof DynamicRecord ? first.toJSON() : null).toEqual({ name: 'Gamma', status: 1 });
  });

  it('logs queries at debug level', async () => {
    const debug = vi.fn();
    const logger = { debug } as unknown as Logger;
    const repo = new InMemoryRepository({ entity: conferenceEntity, logger });
    await repo.findAll(query<Conference>().orderBy('Name').take(2));
    expect(debug).toHaveBeenCalledWith({ entity: 'Conference', orderings: 1, limit: 2 }, 'query');
  });
});
