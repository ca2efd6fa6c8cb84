import { ConferenceStatus, type Conference } from '../../../src/domain/conference.js';

export function makeConference(overrides: Partial<Conference> = {}): Conference {
  return {
    conferenceId: 1,
    name: 'Node Summit',
    location: 'Berlin',
    participantsNum: 50,
    status: ConferenceStatus.Open,
    startDate: new Date('2024-05-10T09:00:00Z'),
    endDate: null,
    tags: ['node'],
    ...overrides,
  };
}

export const SEED: readonly Conference[] = [
  makeConference({ conferenceId: 1 }),
  makeConference({ conferenceId: 2, name: 'Rust Days', location: null, participantsNum: 150, status: ConferenceStatus.Closed }),
  makeConference({ conferenceId: 3, name: 'Cloud Summit', participantsNum: 80, status: ConferenceStatus.Closed }),
];
