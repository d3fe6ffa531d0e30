import { Controller, Get, Inject } from '@nestjs/common';
import {
  reconciliationConfig,
  ReconciliationConfig,
  storageConfig,
  StorageConfig,
} from '../config/configuration';

@Controller()
export class HealthController {
  constructor(
    @Inject(storageConfig.KEY)
    private readonly storage: StorageConfig,
    @Inject(reconciliationConfig.KEY)
    private readonly reconciliation: ReconciliationConfig,
  ) {}

  @Get()
  getRoot() {
    return {
      name: 'Payment Broker',
      version: '1.0.0',
      description: 'Hosted payment gateway broker with callback ingestion and reconciliation',
      endpoints: {
        initiate: 'POST /payments/initiate',
        webhook: 'POST /payment/webhook',
        success: 'POST /payment/success',
        failure: 'POST /payment/failure',
        transaction: 'GET /transactions/:txnid',
        transactionStats: 'GET /transactions/stats/summary',
        reconcile: 'POST /reconciliation/run',
        reconciliationStats: 'GET /reconciliation/stats',
        health: 'GET /health',
      },
    };
  }

  @Get('health')
  healthCheck() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor(process.uptime()),
      storage: this.storage.driver,
      reconciliation: {
        enabled: this.reconciliation.enabled,
        intervalMs: this.reconciliation.intervalMs,
        staleMinutes: this.reconciliation.staleMinutes,
      },
    };
  }
}
