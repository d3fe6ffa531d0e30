export enum MerchantStatus {
  ACTIVE = 'ACTIVE',
  INACTIVE = 'INACTIVE',
}

export interface Merchant {
  merchantId: string;
  name: string;
  /** Shared secret the merchant signs initiation requests with. Never logged. */
  salt: string;
  status: MerchantStatus;
}
