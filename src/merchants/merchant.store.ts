import { Merchant } from './types/merchant.types';

/** Read-only view of the merchant directory. */
export abstract class MerchantStore {
  abstract findById(merchantId: string): Promise<Merchant | null>;
}
