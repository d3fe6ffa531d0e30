import { Module } from '@nestjs/common';
import { HashingModule } from '../hashing/hashing.module';
import { MerchantsModule } from '../merchants/merchants.module';
import { TransactionsModule } from '../transactions/transactions.module';
import { GatewayClient } from './gateway.client';
import { PaymentsController } from './payments.controller';
import { PaymentsService } from './payments.service';

@Module({
  imports: [HashingModule, MerchantsModule, TransactionsModule],
  controllers: [PaymentsController],
  providers: [PaymentsService, GatewayClient],
})
export class PaymentsModule {}
