import { Module } from '@nestjs/common';
import { MerchantsModule } from '../merchants/merchants.module';
import { LedgerService } from './ledger.service';

@Module({
  imports: [MerchantsModule],
  providers: [LedgerService],
  exports: [LedgerService],
})
export class LedgerModule {}
