import { UdfTuple } from '../../hashing/types/hash.types';

export enum TransactionStatus {
  INITIATED = 'INITIATED',
  PROCESSING = 'PROCESSING',
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
  HASH_MISMATCH = 'HASH_MISMATCH',
}

export const OPEN_STATUSES: ReadonlyArray<TransactionStatus> = [
  TransactionStatus.INITIATED,
  TransactionStatus.PROCESSING,
];

export interface GatewayMetadata {
  gatewayTxnId?: string | null;
  bankRefNum?: string | null;
  bankName?: string | null;
  bankCode?: string | null;
  cardType?: string | null;
  issuingBank?: string | null;
  paymentMode?: string | null;
  paymentSource?: string | null;
  authCode?: string | null;
  gatewayStatus?: string | null;
  errorMessage?: string | null;
  rawResponse?: string | null;
}

export interface CustomerDetails {
  firstName?: string | null;
  email?: string | null;
  phone?: string | null;
  productInfo?: string | null;
}

/** An unverified callback refused because the row was already settled by a verified one. */
export interface RejectedCallback {
  receivedAt: string;
  gatewayStatus: string | null;
  hash: string | null;
  rawResponse: string | null;
}

export interface Transaction extends GatewayMetadata, CustomerDetails {
  txnid: string;
  udfs: UdfTuple;
  amount: string | null;
  status: TransactionStatus;
  hash: string | null;
  hashVerified: boolean;
  reviewRequired: boolean;
  /** Oldest first, keeping the last MAX_REJECTED_CALLBACKS. */
  rejectedCallbacks?: RejectedCallback[] | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export const merchantIdOf = (transaction: Pick<Transaction, 'udfs'>): string | null =>
  transaction.udfs[0] || null;

export const orderIdOf = (transaction: Pick<Transaction, 'udfs'>): string | null =>
  transaction.udfs[1] || null;

export type StatusCounts = Record<TransactionStatus, number> & { total: number };
