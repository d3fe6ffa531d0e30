import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { reconciliationConfig, ReconciliationConfig } from '../config/configuration';
import { TransactionsService } from '../transactions/transactions.service';
import { Transaction } from '../transactions/types/transaction.types';
import { ReconciliationStats, SweepReport } from './types/reconciliation.types';

export const STALE_FAILURE_MESSAGE =
  'No gateway confirmation received. Marked as failed by reconciliation sweep.';

@Injectable()
export class ReconciliationService {
  private lastSweep: SweepReport | null = null;

  constructor(
    private readonly transactionsService: TransactionsService,
    @Inject(reconciliationConfig.KEY)
    private readonly config: ReconciliationConfig,
    @InjectPinoLogger(ReconciliationService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Fails every INITIATED or PROCESSING row created at or before `now - threshold`, reading
   * `batchSize` rows at a time until none are left. Each row is expired with its own conditional
   * write, so a callback that lands mid-sweep keeps its status and the row is counted as skipped.
   */
  async sweep(now: Date = new Date()): Promise<SweepReport> {
    const cutoff = new Date(now.getTime() - this.config.staleMinutes * 60 * 1000);
    const report: SweepReport = {
      startedAt: now,
      cutoff,
      scanned: 0,
      failed: 0,
      skipped: 0,
      errors: 0,
    };

    // Rows whose update threw stay open and come back in later pages
    const seen = new Set<string>();

    for (;;) {
      const page = await this.transactionsService.findStale(cutoff, this.config.batchSize);
      const fresh = page.filter(candidate => !seen.has(candidate.txnid));
      if (fresh.length === 0) {
        break;
      }

      for (const candidate of fresh) {
        seen.add(candidate.txnid);
        report.scanned++;
        await this.expire(candidate, cutoff, now, report);
      }
    }

    this.lastSweep = report;
    this.logger.info(
      {
        cutoff: cutoff.toISOString(),
        scanned: report.scanned,
        failed: report.failed,
        skipped: report.skipped,
        errors: report.errors,
      },
      'Reconciliation sweep completed',
    );

    return report;
  }

  async getStats(): Promise<ReconciliationStats> {
    return {
      counts: await this.transactionsService.getStats(),
      staleThresholdMinutes: this.config.staleMinutes,
      intervalMs: this.config.intervalMs,
      lastSweep: this.lastSweep,
    };
  }

  private async expire(candidate: Transaction, cutoff: Date, now: Date, report: SweepReport): Promise<void> {
    try {
      const expired = await this.transactionsService.expireIfStale(
        candidate.txnid,
        cutoff,
        STALE_FAILURE_MESSAGE,
        now,
      );

      if (expired) {
        report.failed++;
        this.logger.warn(
          { txnid: candidate.txnid, previousStatus: candidate.status, createdAt: candidate.createdAt },
          'Stale transaction marked as failed',
        );
      } else {
        report.skipped++;
      }
    } catch (error) {
      report.errors++;
      this.logger.error({ err: error, txnid: candidate.txnid }, 'Failed to expire stale transaction');
    }
  }
}
