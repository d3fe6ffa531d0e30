import { Column, Entity, Index, PrimaryGeneratedColumn, VersionColumn } from 'typeorm';
import { RejectedCallback, TransactionStatus } from '../../../transactions/types/transaction.types';

@Entity('payment_transactions')
@Index(['txnid'], { unique: true })
@Index(['status', 'createdAt'])
@Index(['reviewRequired'])
export class PaymentTransactionEntity {
  @PrimaryGeneratedColumn('increment', { type: 'bigint' })
  id!: string;

  @Column({ type: 'varchar', length: 64 })
  txnid!: string;

  @Column({ type: 'varchar', length: 20, default: TransactionStatus.INITIATED })
  status!: TransactionStatus;

  @Column({ type: 'numeric', precision: 12, scale: 2, nullable: true })
  amount!: string | null;

  @Column({ type: 'varchar', length: 128, nullable: true })
  hash!: string | null;

  @Column({ name: 'hash_verified', type: 'boolean', default: false })
  hashVerified!: boolean;

  @Column({ name: 'review_required', type: 'boolean', default: false })
  reviewRequired!: boolean;

  @Column({ name: 'first_name', type: 'varchar', length: 100, nullable: true })
  firstName!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  phone!: string | null;

  @Column({ name: 'product_info', type: 'varchar', length: 255, nullable: true })
  productInfo!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf1!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf2!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf3!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf4!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf5!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf6!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf7!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf8!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf9!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  udf10!: string | null;

  @Column({ name: 'gateway_txn_id', type: 'varchar', length: 100, nullable: true })
  gatewayTxnId!: string | null;

  @Column({ name: 'bank_ref_num', type: 'varchar', length: 100, nullable: true })
  bankRefNum!: string | null;

  @Column({ name: 'bank_name', type: 'varchar', length: 100, nullable: true })
  bankName!: string | null;

  @Column({ name: 'bank_code', type: 'varchar', length: 50, nullable: true })
  bankCode!: string | null;

  @Column({ name: 'card_type', type: 'varchar', length: 50, nullable: true })
  cardType!: string | null;

  @Column({ name: 'issuing_bank', type: 'varchar', length: 100, nullable: true })
  issuingBank!: string | null;

  @Column({ name: 'payment_mode', type: 'varchar', length: 50, nullable: true })
  paymentMode!: string | null;

  @Column({ name: 'payment_source', type: 'varchar', length: 50, nullable: true })
  paymentSource!: string | null;

  @Column({ name: 'auth_code', type: 'varchar', length: 50, nullable: true })
  authCode!: string | null;

  @Column({ name: 'gateway_status', type: 'varchar', length: 50, nullable: true })
  gatewayStatus!: string | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'raw_response', type: 'text', nullable: true })
  rawResponse!: string | null;

  @Column({ name: 'rejected_callbacks', type: 'jsonb', nullable: true })
  rejectedCallbacks!: RejectedCallback[] | null;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @VersionColumn({ name: 'version' })
  version!: number;
}
