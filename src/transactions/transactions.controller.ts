import { Controller, Get, Param } from '@nestjs/common';
import { TransactionsService } from './transactions.service';
import { merchantIdOf, orderIdOf, Transaction } from './types/transaction.types';

@Controller('transactions')
export class TransactionsController {
  constructor(private readonly transactionsService: TransactionsService) {}

  @Get('stats/summary')
  async getStats() {
    const stats = await this.transactionsService.getStats();
    return {
      success: true,
      data: stats,
    };
  }

  @Get(':txnid')
  async getTransaction(@Param('txnid') txnid: string) {
    const transaction = await this.transactionsService.getTransaction(txnid);
    return {
      success: true,
      data: this.present(transaction),
    };
  }

  private present(transaction: Transaction) {
    return {
      txnid: transaction.txnid,
      merchant_id: merchantIdOf(transaction),
      order_id: orderIdOf(transaction),
      amount: transaction.amount,
      status: transaction.status,
      hash_verified: transaction.hashVerified,
      review_required: transaction.reviewRequired,
      gateway_txn_id: transaction.gatewayTxnId ?? null,
      bank_ref_num: transaction.bankRefNum ?? null,
      payment_mode: transaction.paymentMode ?? null,
      gateway_status: transaction.gatewayStatus ?? null,
      error_message: transaction.errorMessage ?? null,
      rejected_callbacks: transaction.rejectedCallbacks ?? [],
      udfs: transaction.udfs.map(udf => udf ?? null),
      created_at: transaction.createdAt,
      updated_at: transaction.updatedAt,
    };
  }
}
