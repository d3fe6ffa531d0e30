import { StatusCounts } from '../../transactions/types/transaction.types';

export interface SweepReport {
  startedAt: Date;
  cutoff: Date;
  scanned: number;
  failed: number;
  /** Rows a callback settled between the scan and the conditional update. */
  skipped: number;
  errors: number;
}

export interface ReconciliationStats {
  counts: StatusCounts;
  staleThresholdMinutes: number;
  intervalMs: number;
  lastSweep: SweepReport | null;
}
