import { defineEntity } from '../../../src/index.js';

export const ConferenceStatus = {
  Draft: 0,
  Open: 1,
  Closed: 2,
} as const;

export type ConferenceStatus = (typeof ConferenceStatus)[keyof typeof ConferenceStatus];

export interface Conference {
  conferenceId: number;
  name: string;
  location: string | null;
  participantsNum: number;
  status: number;
  startDate: Date;
  endDate: Date | null;
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
    location: 'string',
    participantsNum: 'int',
    status: 'int',
    startDate: 'DateTime',
    endDate: 'DateTime?',
    tags: 'string[]',
  },
});
