/**
 * PostgreSQL Import Job
 *
 * Loads teams, people and their readings with one session. Teams go through
 * an IntegrityCache, people are find-or-created for their id, and readings
 * are batched.
 *
 * Expects:
 *   CREATE TABLE teams (code TEXT PRIMARY KEY, name TEXT);
 *   CREATE TABLE people (id SERIAL PRIMARY KEY, email TEXT UNIQUE, team_code TEXT);
 *   CREATE TABLE readings (id SERIAL PRIMARY KEY, person_id INT, value NUMERIC);
 *
 * Run with DATABASE_URL (or PGHOST/PGDATABASE/...) set.
 */

import { connectionConfigFromEnv } from '@pgsession/core';
import { BulkInserter, IntegrityCache, createPgSession } from '@pgsession/postgresql';

interface SourceRecord {
  email: string;
  team: { code: string; name: string };
  readings: number[];
}

const records: SourceRecord[] = [
  { email: 'nano@example.com', team: { code: 'ops', name: 'Operations' }, readings: [21.5, 22.1] },
  { email: 'ada@example.com', team: { code: 'ops', name: 'Operations' }, readings: [19.8] },
  { email: 'linus@example.com', team: { code: 'lab', name: 'Lab' }, readings: [23.4] },
];

async function main() {
  const session = createPgSession(connectionConfigFromEnv());

  await session.run(async (db) => {
    const teams = new IntegrityCache();
    const readings = new BulkInserter(db, 'readings', ['person_id', 'value'], { batchSize: 500 });

    for (const record of records) {
      await teams.create(db, 'teams', { code: record.team.code, name: record.team.name }, 'code');

      const personId = await db.conditionalCreate(
        'people',
        { email: record.email, team_code: record.team.code },
        'id',
      );
      if (typeof personId !== 'number') {
        throw new Error(`Unexpected id for ${record.email}`);
      }

      for (const value of record.readings) {
        await readings.add([personId, value]);
      }
    }

    await readings.flush();
    console.log(`Imported ${readings.insertedRows} readings across ${teams.size('teams')} teams`);
  });
}

main().catch((error: unknown) => {
  console.error('Import failed:', error);
  process.exitCode = 1;
});
