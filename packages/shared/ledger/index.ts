/**
 * Registration Ledger — local history of registered jobs
 *
 * SQLite via better-sqlite3 (synchronous, zero-ops). The orchestrator writes
 * one row per registered job; `bakeline history` reads them back.
 */

import { randomUUID } from 'crypto';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import type { RegistrationRecord } from '../types/index.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS registrations (
    registration_id TEXT PRIMARY KEY,
    job_id          TEXT NOT NULL,
    recipe_id       TEXT NOT NULL,
    job_name        TEXT NOT NULL,
    bakery_id       TEXT NOT NULL,
    project         TEXT NOT NULL,
    run_id          TEXT,
    correlation_id  TEXT,
    registered_at   TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_registrations_recipe ON registrations (recipe_id);
`;

interface RegistrationRow {
  registration_id: string;
  job_id: string;
  recipe_id: string;
  job_name: string;
  bakery_id: string;
  project: string;
  run_id: string | null;
  correlation_id: string | null;
  registered_at: string;
}

export type NewRegistration = Omit<RegistrationRecord, 'registrationId' | 'registeredAt'>;

export class RegistrationLedger {
  private db: Database.Database;

  /** Pass ':memory:' for a throwaway ledger. */
  constructor(dbPath = ':memory:') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
  }

  record(entry: NewRegistration): RegistrationRecord {
    const record: RegistrationRecord = {
      ...entry,
      registrationId: randomUUID(),
      registeredAt: new Date().toISOString(),
    };

    this.db.prepare(`
      INSERT INTO registrations (registration_id, job_id, recipe_id, job_name, bakery_id, project, run_id, correlation_id, registered_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.registrationId, record.jobId, record.recipeId, record.jobName,
      record.bakeryId, record.project, record.runId, record.correlationId, record.registeredAt
    );

    return record;
  }

  get(registrationId: string): RegistrationRecord | null {
    const row = this.db
      .prepare<[string], RegistrationRow>('SELECT * FROM registrations WHERE registration_id = ?')
      .get(registrationId);
    return row ? mapRow(row) : null;
  }

  /**
   * List registrations, newest first.
   */
  list(limit = 50): RegistrationRecord[] {
    return this.db
      .prepare<[number], RegistrationRow>('SELECT * FROM registrations ORDER BY registered_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map(mapRow);
  }

  /**
   * Registration history of one recipe id, newest first.
   */
  history(recipeId: string, limit = 20): RegistrationRecord[] {
    return this.db
      .prepare<[string, number], RegistrationRow>(
        'SELECT * FROM registrations WHERE recipe_id = ? ORDER BY registered_at DESC, rowid DESC LIMIT ?'
      )
      .all(recipeId, limit)
      .map(mapRow);
  }

  close(): void {
    this.db.close();
  }
}

function mapRow(row: RegistrationRow): RegistrationRecord {
  return {
    registrationId: row.registration_id,
    jobId: row.job_id,
    recipeId: row.recipe_id,
    jobName: row.job_name,
    bakeryId: row.bakery_id,
    project: row.project,
    runId: row.run_id,
    correlationId: row.correlation_id,
    registeredAt: row.registered_at,
  };
}
