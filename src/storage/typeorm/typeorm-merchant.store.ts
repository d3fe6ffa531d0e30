import { DataSource, Repository } from 'typeorm';
import { MerchantStore } from '../../merchants/merchant.store';
import { Merchant, MerchantStatus } from '../../merchants/types/merchant.types';
import { MerchantEntity } from './entities/merchant.entity';

export class TypeOrmMerchantStore extends MerchantStore {
  private readonly repo: Repository<MerchantEntity>;

  constructor(dataSource: DataSource) {
    super();
    this.repo = dataSource.getRepository(MerchantEntity);
  }

  async findById(merchantId: string): Promise<Merchant | null> {
    const entity = await this.repo.findOne({ where: { merchantId } });
    if (!entity) {
      return null;
    }

    return {
      merchantId: entity.merchantId,
      name: entity.name,
      salt: entity.salt,
      status: entity.status === MerchantStatus.ACTIVE ? MerchantStatus.ACTIVE : MerchantStatus.INACTIVE,
    };
  }
}
