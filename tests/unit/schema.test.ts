import { describe, it, expect } from 'vitest';
import { defineEntity, toSnakeCase } from '../../src/entity/schema.js';
import { typeName } from '../../src/expression/type-system.js';
import { ArgumentError } from '../../src/errors.js';
import { conferenceEntity } from './helpers/fixtures.js';

interface Session {
  sessionId: number;
  title: string;
  room: string;
}

interface Track {
  trackId: number;
  sessions: Session[];
}

const sessionEntity = defineEntity<Session>({
  name: 'Session',
  table: 'session',
  key: 'sessionId',
  fields: { sessionId: 'int', title: 'string', room: { type: 'string', column: 'room_name' } },
});

describe('toSnakeCase', () => {
  it('splits camel case and acronyms', () => {
    expect(toSnakeCase('participantsNum')).toBe('participants_num');
    expect(toSnakeCase('conferenceId')).toBe('conference_id');
    expect(toSnakeCase('HTTPServer')).toBe('http_server');
    expect(toSnakeCase('name')).toBe('name');
  });
});

describe('defineEntity', () => {
  it('derives columns and types from the field map', () => {
    expect(conferenceEntity.fields.map((f) => [f.property, f.column, typeName(f.type)])).toEqual([
      ['conferenceId', 'conference_id', 'int'],
      ['name', 'name', 'string'],
      ['status', 'status', 'int'],
      ['participantsNum', 'participants_num', 'int'],
      ['rating', 'rating', 'double?'],
      ['startDate', 'start_date', 'DateTime'],
      ['tags', 'tags', 'string[]'],
    ]);
    expect(conferenceEntity.keyField.column).toBe('conference_id');
    expect(conferenceEntity.generatedKey).toBe(true);
  });

  it('honours an explicit column name', () => {
    expect(sessionEntity.field('ROOM')?.column).toBe('room_name');
    expect(sessionEntity.generatedKey).toBe(false);
  });

  it('types a nested entity field as a sequence without a column', () => {
    const track = defineEntity<Track>({
      name: 'Track',
      table: 'track',
      key: 'trackId',
      fields: { trackId: 'int', sessions: sessionEntity },
    });
    expect(typeName(track.field('sessions')?.type ?? track.keyField.type)).toBe('Session[]');
    expect(track.columns.map((f) => f.column)).toEqual(['track_id']);
  });

  it('rejects an unknown type name with the field name', () => {
    expect(() =>
      defineEntity<Session>({ name: 'Session', table: 'session', key: 'sessionId', fields: { sessionId: 'int', title: 'Text' } }),
    ).toThrow("Field 'title': Unknown type name 'Text'");
  });

  it('rejects a key that is not a field', () => {
    expect(() =>
      defineEntity<Session>({ name: 'Session', table: 'session', key: 'sessionId', fields: { title: 'string' } }),
    ).toThrow(ArgumentError);
  });

  it('rejects a blank table name', () => {
    expect(() => defineEntity<Session>({ name: 'Session', table: ' ', key: 'sessionId', fields: { sessionId: 'int' } })).toThrow(
      'Entity table must be a non-empty string',
    );
  });
});

describe('EntityType', () => {
  it('materializes with zero values for absent fields', () => {
    expect(conferenceEntity.materialize({ conferenceId: 3, name: 'X' })).toEqual({
      conferenceId: 3,
      name: 'X',
      status: 0,
      participantsNum: 0,
      rating: null,
      startDate: new Date('0001-01-01T00:00:00Z'),
      tags: null,
    });
  });

  it('reads the key of an entity', () => {
    expect(sessionEntity.keyOf({ sessionId: 8, title: 't', room: 'r' })).toBe(8);
  });

  it('describes itself', () => {
    expect(sessionEntity.toString()).toBe('Session(sessionId: int, title: string, room: string)');
  });
});
