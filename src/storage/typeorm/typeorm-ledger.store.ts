import { DataSource, Repository } from 'typeorm';
import { LedgerStore } from '../../ledger/ledger.store';
import { LedgerEntry, SettlementStatus } from '../../ledger/types/ledger.types';
import { MerchantLedgerEntity } from './entities/merchant-ledger.entity';
import { isUniqueViolation, parseStatus } from './typeorm-transaction.store';

export class TypeOrmLedgerStore extends LedgerStore {
  private readonly repo: Repository<MerchantLedgerEntity>;

  constructor(dataSource: DataSource) {
    super();
    this.repo = dataSource.getRepository(MerchantLedgerEntity);
  }

  async find(merchantId: string, txnid: string): Promise<LedgerEntry | null> {
    const entity = await this.repo.findOne({ where: { merchantId, txnid } });
    if (!entity) {
      return null;
    }

    return {
      merchantId: entity.merchantId,
      txnid: entity.txnid,
      orderId: entity.orderId,
      amount: entity.amount,
      status: parseStatus(entity.status),
      paymentMode: entity.paymentMode,
      bankRefNum: entity.bankRefNum,
      gatewayTxnId: entity.gatewayTxnId,
      settlementStatus: SettlementStatus.PENDING,
      notes: entity.notes,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  async insert(entry: LedgerEntry): Promise<boolean> {
    try {
      await this.repo.insert({ ...entry });
      return true;
    } catch (error) {
      if (isUniqueViolation(error)) {
        return false;
      }
      throw error;
    }
  }

  async update(entry: LedgerEntry): Promise<void> {
    await this.repo.update(
      { merchantId: entry.merchantId, txnid: entry.txnid },
      { status: entry.status, notes: entry.notes, updatedAt: entry.updatedAt },
    );
  }
}
