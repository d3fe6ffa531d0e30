import { plainToInstance } from 'class-transformer';
import { IsEnum, IsNotEmpty, IsString, validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import { MerchantStore } from '../../merchants/merchant.store';
import { Merchant, MerchantStatus } from '../../merchants/types/merchant.types';

class MerchantSeed {
  @IsString({ message: 'merchantId must be a string' })
  @IsNotEmpty({ message: 'merchantId is required' })
  merchantId!: string;

  @IsString({ message: 'name must be a string' })
  name!: string;

  @IsString({ message: 'salt must be a string' })
  @IsNotEmpty({ message: 'salt is required' })
  salt!: string;

  @IsEnum(MerchantStatus, { message: 'status must be ACTIVE or INACTIVE' })
  status!: MerchantStatus;
}

export function parseMerchantSeed(raw: unknown): Merchant[] {
  if (!Array.isArray(raw)) {
    throw new Error('Merchant seed must be a JSON array');
  }

  return raw.map((entry: unknown, index) => {
    const seed = plainToInstance(MerchantSeed, entry);
    const errors = validateSync(seed);
    if (errors.length > 0) {
      const reasons = errors.flatMap(error => Object.values(error.constraints ?? {}));
      throw new Error(`Invalid merchant seed entry ${index}: ${reasons.join('; ')}`);
    }
    return { merchantId: seed.merchantId, name: seed.name, salt: seed.salt, status: seed.status };
  });
}

export function loadMerchantSeed(path: string): Merchant[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseMerchantSeed(parsed);
}

export class MemoryMerchantStore extends MerchantStore {
  private readonly merchants: Map<string, Merchant>;

  constructor(merchants: ReadonlyArray<Merchant> = []) {
    super();
    this.merchants = new Map(merchants.map(merchant => [merchant.merchantId, { ...merchant }]));
  }

  async findById(merchantId: string): Promise<Merchant | null> {
    const merchant = this.merchants.get(merchantId);
    return merchant ? { ...merchant } : null;
  }
}
