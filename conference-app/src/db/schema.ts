import type pg from 'pg';

export const CREATE_CONFERENCE_TABLE = `
CREATE TABLE IF NOT EXISTS conference (
  conference_id    SERIAL       PRIMARY KEY,
  name             TEXT         NOT NULL,
  location         TEXT,
  participants_num INTEGER      NOT NULL DEFAULT 0,
  status           INTEGER      NOT NULL DEFAULT 0,
  start_date       TIMESTAMPTZ  NOT NULL,
  end_date         TIMESTAMPTZ,
  tags             TEXT[]       NOT NULL DEFAULT '{}'
);
`;

export const CREATE_CONFERENCE_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_conference_status ON conference (status, conference_id);
CREATE INDEX IF NOT EXISTS idx_conference_start_date ON conference (start_date);
`;

/** Idempotent; safe to run on every start. */
export async function applySchema(pool: pg.Pool): Promise<void> {
  await pool.query(CREATE_CONFERENCE_TABLE);
  await pool.query(CREATE_CONFERENCE_INDEXES);
}
