import { TransactionStatus } from '../../transactions/types/transaction.types';

export enum SettlementStatus {
  PENDING = 'PENDING',
}

export interface LedgerEntry {
  merchantId: string;
  txnid: string;
  orderId: string;
  amount: string | null;
  status: TransactionStatus;
  paymentMode: string | null;
  bankRefNum: string | null;
  gatewayTxnId: string | null;
  settlementStatus: SettlementStatus;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export enum RoutingAction {
  CREATED = 'CREATED',
  UPDATED = 'UPDATED',
  UNCHANGED = 'UNCHANGED',
}

export type RoutingResult =
  | { routed: true; action: RoutingAction; entry: LedgerEntry }
  | { routed: false; reason: 'MERCHANT_MISSING' | 'MERCHANT_INACTIVE' | 'NOT_SETTLED' };
