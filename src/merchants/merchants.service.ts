import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { MerchantStore } from './merchant.store';
import { Merchant, MerchantStatus } from './types/merchant.types';

@Injectable()
export class MerchantsService {
  constructor(
    private readonly store: MerchantStore,
    @InjectPinoLogger(MerchantsService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Returns the merchant only when it exists and is ACTIVE.
   */
  async findActive(merchantId: string | null | undefined): Promise<Merchant | null> {
    if (!merchantId) {
      return null;
    }

    const merchant = await this.store.findById(merchantId);

    if (!merchant) {
      this.logger.warn({ merchantId }, 'Unknown merchant');
      return null;
    }

    if (merchant.status !== MerchantStatus.ACTIVE) {
      this.logger.warn({ merchantId, status: merchant.status }, 'Merchant is not active');
      return null;
    }

    return merchant;
  }
}
