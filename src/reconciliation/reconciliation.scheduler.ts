import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { reconciliationConfig, ReconciliationConfig } from '../config/configuration';
import { ReconciliationService } from './reconciliation.service';

@Injectable()
export class ReconciliationScheduler implements OnModuleInit, OnModuleDestroy {
  private timer?: NodeJS.Timeout;
  private isRunning = false;

  constructor(
    private readonly reconciliationService: ReconciliationService,
    @Inject(reconciliationConfig.KEY)
    private readonly config: ReconciliationConfig,
    @InjectPinoLogger(ReconciliationScheduler.name)
    private readonly logger: PinoLogger,
  ) {}

  onModuleInit(): void {
    if (this.config.enabled) {
      this.start();
    } else {
      this.logger.info('Reconciliation sweep disabled');
    }
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.logger.info({ intervalMs: this.config.intervalMs }, 'Starting reconciliation sweep');
    this.timer = setInterval(() => void this.tick(), this.config.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info('Stopped reconciliation sweep');
    }
  }

  /** Skips the run when the previous one is still going. */
  async tick(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Previous reconciliation sweep still running, skipping');
      return;
    }

    this.isRunning = true;
    try {
      await this.reconciliationService.sweep();
    } catch (error) {
      this.logger.error({ err: error }, 'Reconciliation sweep failed');
    } finally {
      this.isRunning = false;
    }
  }
}
