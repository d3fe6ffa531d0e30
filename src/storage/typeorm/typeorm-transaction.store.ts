import { DataSource, QueryFailedError, Repository } from 'typeorm';
import { UdfTuple } from '../../hashing/types/hash.types';
import {
  InsertResult,
  TransactionStore,
  UpdateResult,
} from '../../transactions/transaction.store';
import { Transaction, TransactionStatus } from '../../transactions/types/transaction.types';
import { PaymentTransactionEntity } from './entities/payment-transaction.entity';

type TransactionColumns = Omit<PaymentTransactionEntity, 'id'>;

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

export function parseStatus(value: string): TransactionStatus {
  const status = Object.values(TransactionStatus).find(candidate => candidate === value);
  if (!status) {
    throw new Error(`Unknown transaction status in storage: ${value}`);
  }
  return status;
}

/**
 * PostgreSQL-backed store. Every write is a single conditional statement so that the webhook,
 * the redirect and the sweep can race on the same txnid without a lock.
 */
export class TypeOrmTransactionStore extends TransactionStore {
  private readonly repo: Repository<PaymentTransactionEntity>;

  constructor(dataSource: DataSource) {
    super();
    this.repo = dataSource.getRepository(PaymentTransactionEntity);
  }

  async findByTxnid(txnid: string): Promise<Transaction | null> {
    const entity = await this.repo.findOne({ where: { txnid } });
    return entity ? this.toDomain(entity) : null;
  }

  async insert(transaction: Transaction): Promise<InsertResult> {
    const columns = { ...this.toColumns(transaction), version: 1 };
    try {
      await this.repo.insert(columns);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { ok: false, reason: 'duplicate' };
      }
      throw error;
    }
    return { ok: true, transaction: { ...transaction, version: 1 } };
  }

  async update(transaction: Transaction, expectedVersion: number): Promise<UpdateResult> {
    const columns = { ...this.toColumns(transaction), version: expectedVersion + 1 };
    const result = await this.repo
      .createQueryBuilder()
      .update(PaymentTransactionEntity)
      .set(columns)
      .where('txnid = :txnid', { txnid: transaction.txnid })
      .andWhere('version = :version', { version: expectedVersion })
      .execute();

    if (result.affected !== 1) {
      return { ok: false, reason: 'stale' };
    }
    return { ok: true, transaction: { ...transaction, version: expectedVersion + 1 } };
  }

  async findStale(
    statuses: ReadonlyArray<TransactionStatus>,
    createdBefore: Date,
    limit: number,
  ): Promise<Transaction[]> {
    const entities = await this.repo
      .createQueryBuilder('t')
      .where('t.status IN (:...statuses)', { statuses: [...statuses] })
      .andWhere('t.created_at <= :cutoff', { cutoff: createdBefore })
      .orderBy('t.created_at', 'ASC')
      .limit(limit)
      .getMany();

    return entities.map(entity => this.toDomain(entity));
  }

  async expireIfStale(
    txnid: string,
    statuses: ReadonlyArray<TransactionStatus>,
    createdBefore: Date,
    message: string,
    now: Date,
  ): Promise<boolean> {
    const result = await this.repo
      .createQueryBuilder()
      .update(PaymentTransactionEntity)
      .set({
        status: TransactionStatus.FAILED,
        errorMessage: message,
        updatedAt: now,
        version: () => 'version + 1',
      })
      .where('txnid = :txnid', { txnid })
      .andWhere('status IN (:...statuses)', { statuses: [...statuses] })
      .andWhere('created_at <= :cutoff', { cutoff: createdBefore })
      .execute();

    return (result.affected ?? 0) > 0;
  }

  async countByStatus(): Promise<Map<TransactionStatus, number>> {
    const rows = await this.repo
      .createQueryBuilder('t')
      .select('t.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('t.status')
      .getRawMany<{ status: string; count: string }>();

    return new Map(rows.map(row => [parseStatus(row.status), parseInt(row.count, 10)]));
  }

  private toColumns(transaction: Transaction): TransactionColumns {
    const [udf1, udf2, udf3, udf4, udf5, udf6, udf7, udf8, udf9, udf10] = transaction.udfs.map(
      udf => udf ?? null,
    );

    return {
      txnid: transaction.txnid,
      status: transaction.status,
      amount: transaction.amount,
      hash: transaction.hash,
      hashVerified: transaction.hashVerified,
      reviewRequired: transaction.reviewRequired,
      firstName: transaction.firstName ?? null,
      email: transaction.email ?? null,
      phone: transaction.phone ?? null,
      productInfo: transaction.productInfo ?? null,
      udf1,
      udf2,
      udf3,
      udf4,
      udf5,
      udf6,
      udf7,
      udf8,
      udf9,
      udf10,
      gatewayTxnId: transaction.gatewayTxnId ?? null,
      bankRefNum: transaction.bankRefNum ?? null,
      bankName: transaction.bankName ?? null,
      bankCode: transaction.bankCode ?? null,
      cardType: transaction.cardType ?? null,
      issuingBank: transaction.issuingBank ?? null,
      paymentMode: transaction.paymentMode ?? null,
      paymentSource: transaction.paymentSource ?? null,
      authCode: transaction.authCode ?? null,
      gatewayStatus: transaction.gatewayStatus ?? null,
      errorMessage: transaction.errorMessage ?? null,
      rawResponse: transaction.rawResponse ?? null,
      rejectedCallbacks: transaction.rejectedCallbacks ?? null,
      createdAt: transaction.createdAt,
      updatedAt: transaction.updatedAt,
      version: transaction.version,
    };
  }

  private toDomain(entity: PaymentTransactionEntity): Transaction {
    const udfs: UdfTuple = [
      entity.udf1,
      entity.udf2,
      entity.udf3,
      entity.udf4,
      entity.udf5,
      entity.udf6,
      entity.udf7,
      entity.udf8,
      entity.udf9,
      entity.udf10,
    ];

    return {
      txnid: entity.txnid,
      udfs,
      amount: entity.amount,
      status: parseStatus(entity.status),
      hash: entity.hash,
      hashVerified: entity.hashVerified,
      reviewRequired: entity.reviewRequired,
      firstName: entity.firstName,
      email: entity.email,
      phone: entity.phone,
      productInfo: entity.productInfo,
      gatewayTxnId: entity.gatewayTxnId,
      bankRefNum: entity.bankRefNum,
      bankName: entity.bankName,
      bankCode: entity.bankCode,
      cardType: entity.cardType,
      issuingBank: entity.issuingBank,
      paymentMode: entity.paymentMode,
      paymentSource: entity.paymentSource,
      authCode: entity.authCode,
      gatewayStatus: entity.gatewayStatus,
      errorMessage: entity.errorMessage,
      rawResponse: entity.rawResponse,
      rejectedCallbacks: entity.rejectedCallbacks,
      version: entity.version,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
