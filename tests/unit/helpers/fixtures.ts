import { defineEntity } from '../../../src/entity/schema.js';

export interface Conference {
  conferenceId: number;
  name: string;
  status: number;
  participantsNum: number;
  rating: number | null;
  startDate: Date;
  tags: string[];
}

export const conferenceEntity = defineEntity<Conference>({
  name: 'Conference',
  table: 'conference',
  key: 'conferenceId',
  generatedKey: true,
  fields: {
    conferenceId: 'int',
    name: 'string',
    status: 'int',
    participantsNum: 'int',
    rating: 'double?',
    startDate: 'DateTime',
    tags: 'string[]',
  },
});

export function makeConference(overrides: Partial<Conference> = {}): Conference {
  return {
    conferenceId: 1,
    name: 'Node Summit',
    status: 1,
    participantsNum: 50,
    rating: null,
    startDate: new Date('2024-05-10T09:30:00Z'),
    tags: ['node', 'typescript'],
    ...overrides,
  };
}
