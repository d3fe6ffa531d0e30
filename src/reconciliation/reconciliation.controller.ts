import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ReconciliationService } from './reconciliation.service';

@Controller('reconciliation')
export class ReconciliationController {
  constructor(private readonly reconciliationService: ReconciliationService) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  async run() {
    const report = await this.reconciliationService.sweep();
    return {
      success: true,
      message: `Reconciliation completed: ${report.failed} of ${report.scanned} stale transactions marked as failed`,
      data: report,
    };
  }

  @Get('stats')
  async getStats() {
    return {
      success: true,
      data: await this.reconciliationService.getStats(),
    };
  }
}
