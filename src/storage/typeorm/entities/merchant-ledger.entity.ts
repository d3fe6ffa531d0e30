import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { SettlementStatus } from '../../../ledger/types/ledger.types';
import { TransactionStatus } from '../../../transactions/types/transaction.types';

@Entity('merchant_payment_ledger')
@Index(['merchantId', 'txnid'], { unique: true })
@Index(['merchantId', 'status'])
export class MerchantLedgerEntity {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ name: 'merchant_id', type: 'varchar', length: 50 })
  merchantId!: string;

  @Column({ type: 'varchar', length: 64 })
  txnid!: string;

  @Column({ name: 'order_id', type: 'varchar', length: 100 })
  orderId!: string;

  @Column({ type: 'numeric', precision: 12, scale: 2, nullable: true })
  amount!: string | null;

  @Column({ type: 'varchar', length: 20 })
  status!: TransactionStatus;

  @Column({ name: 'payment_mode', type: 'varchar', length: 50, nullable: true })
  paymentMode!: string | null;

  @Column({ name: 'bank_ref_num', type: 'varchar', length: 100, nullable: true })
  bankRefNum!: string | null;

  @Column({ name: 'gateway_txn_id', type: 'varchar', length: 100, nullable: true })
  gatewayTxnId!: string | null;

  @Column({ name: 'settlement_status', type: 'varchar', length: 20, default: SettlementStatus.PENDING })
  settlementStatus!: SettlementStatus;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
