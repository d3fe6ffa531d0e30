import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { storageConfig, StorageConfig } from '../config/configuration';
import { LedgerStore } from '../ledger/ledger.store';
import { MerchantStore } from '../merchants/merchant.store';
import { TransactionStore } from '../transactions/transaction.store';
import { MemoryLedgerStore } from './memory/memory-ledger.store';
import { loadMerchantSeed, MemoryMerchantStore } from './memory/memory-merchant.store';
import { MemoryTransactionStore } from './memory/memory-transaction.store';
import { createDataSource } from './typeorm/typeorm.config';
import { TypeOrmLedgerStore } from './typeorm/typeorm-ledger.store';
import { TypeOrmMerchantStore } from './typeorm/typeorm-merchant.store';
import { TypeOrmTransactionStore } from './typeorm/typeorm-transaction.store';

export const STORAGE_DATA_SOURCE = 'STORAGE_DATA_SOURCE';

/**
 * Binds the three store tokens to either PostgreSQL (STORAGE_DRIVER=postgres) or the
 * in-process maps. The memory driver forgets everything on restart.
 */
@Global()
@Module({
  providers: [
    {
      provide: STORAGE_DATA_SOURCE,
      inject: [storageConfig.KEY],
      useFactory: async (config: StorageConfig): Promise<DataSource | null> =>
        config.driver === 'postgres' ? createDataSource(config).initialize() : null,
    },
    {
      provide: TransactionStore,
      inject: [STORAGE_DATA_SOURCE],
      useFactory: (dataSource: DataSource | null): TransactionStore =>
        dataSource ? new TypeOrmTransactionStore(dataSource) : new MemoryTransactionStore(),
    },
    {
      provide: MerchantStore,
      inject: [STORAGE_DATA_SOURCE, storageConfig.KEY],
      useFactory: (dataSource: DataSource | null, config: StorageConfig): MerchantStore => {
        if (dataSource) {
          return new TypeOrmMerchantStore(dataSource);
        }
        return new MemoryMerchantStore(config.merchantsFile ? loadMerchantSeed(config.merchantsFile) : []);
      },
    },
    {
      provide: LedgerStore,
      inject: [STORAGE_DATA_SOURCE],
      useFactory: (dataSource: DataSource | null): LedgerStore =>
        dataSource ? new TypeOrmLedgerStore(dataSource) : new MemoryLedgerStore(),
    },
  ],
  exports: [TransactionStore, MerchantStore, LedgerStore],
})
export class StorageModule implements OnApplicationShutdown {
  constructor(
    @Inject(STORAGE_DATA_SOURCE)
    private readonly dataSource: DataSource | null,
    @InjectPinoLogger(StorageModule.name)
    private readonly logger: PinoLogger,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    if (this.dataSource?.isInitialized) {
      await this.dataSource.destroy();
      this.logger.info('Database connection closed');
    }
  }
}
