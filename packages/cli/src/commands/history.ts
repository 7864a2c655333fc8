/**
 * bakeline history — registrations recorded in the local ledger.
 */

import { existsSync } from 'fs';
import { RegistrationLedger } from '../../../shared/index.js';
import type { RegistrationRecord } from '../../../shared/index.js';

export interface HistoryOptions {
  dbPath: string;
  recipeId?: string;
  limit?: number;
}

export interface HistoryResult {
  records: RegistrationRecord[];
  report: string;
}

export function formatRecord(r: RegistrationRecord): string {
  const run = r.runId ? `  run ${r.runId} (${r.correlationId ?? '-'})` : '';
  return `  ${r.registeredAt}  ${r.recipeId}  job ${r.jobId}  ${r.bakeryId}/${r.project}${run}`;
}

export function history(opts: HistoryOptions): HistoryResult {
  if (!existsSync(opts.dbPath)) {
    return { records: [], report: `No registration ledger at ${opts.dbPath}.` };
  }

  const ledger = new RegistrationLedger(opts.dbPath);
  let records: RegistrationRecord[];
  try {
    records = opts.recipeId
      ? ledger.history(opts.recipeId, opts.limit)
      : ledger.list(opts.limit);
  } finally {
    ledger.close();
  }

  if (records.length === 0) {
    const scope = opts.recipeId ? ` for recipe "${opts.recipeId}"` : '';
    return { records, report: `No registrations recorded${scope}.` };
  }

  const report = [
    `Registrations (${records.length}):`,
    ...records.map(formatRecord),
  ].join('\n');
  return { records, report };
}
