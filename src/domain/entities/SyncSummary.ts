export type ReconciliationOutcome = 'created' | 'updated' | 'skipped' | 'error';

export interface SyncError {
  name: string;
  detail: string;
}

/**
 * Per-run summary: every area considered lands in exactly one list
 */
export interface SyncSummary {
  created: string[];
  updated: string[];
  skipped: string[];
  errors: SyncError[];
  /** True when the run was interrupted before every area was processed */
  interrupted: boolean;
}

export function emptySummary(): SyncSummary {
  return { created: [], updated: [], skipped: [], errors: [], interrupted: false };
}

export function recordOutcome(
  summary: SyncSummary,
  name: string,
  outcome: ReconciliationOutcome,
  detail?: string
): void {
  switch (outcome) {
    case 'created':
      summary.created.push(name);
      break;
    case 'updated':
      summary.updated.push(name);
      break;
    case 'skipped':
      summary.skipped.push(name);
      break;
    case 'error':
      summary.errors.push({ name, detail: detail ?? 'Unknown error' });
      break;
  }
}
