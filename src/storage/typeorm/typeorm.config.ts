import { DataSource, DataSourceOptions } from 'typeorm';
import { StorageConfig } from '../../config/configuration';
import { MerchantLedgerEntity } from './entities/merchant-ledger.entity';
import { MerchantEntity } from './entities/merchant.entity';
import { PaymentTransactionEntity } from './entities/payment-transaction.entity';

export const STORAGE_ENTITIES = [PaymentTransactionEntity, MerchantEntity, MerchantLedgerEntity];

export const createTypeOrmConfig = (config: StorageConfig): DataSourceOptions => ({
  type: 'postgres',
  host: config.host,
  port: config.port,
  username: config.username,
  password: config.password,
  database: config.database,
  entities: STORAGE_ENTITIES,
  synchronize: config.synchronize,
  logging: config.logging,
  extra: {
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  },
});

export const createDataSource = (config: StorageConfig): DataSource =>
  new DataSource(createTypeOrmConfig(config));
