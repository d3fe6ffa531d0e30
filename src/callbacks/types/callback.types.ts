import { HashVerification } from '../../hashing/types/hash.types';
import { CallbackTransition } from '../../transactions/transaction-state';
import { TransactionStatus } from '../../transactions/types/transaction.types';

export enum RedirectOutcome {
  SUCCESS = 'success',
  FAILURE = 'failure',
}

export type IngestResult =
  | { stored: true; verification: HashVerification; transition: CallbackTransition }
  | { stored: false; reason: 'MISSING_TXNID' };

export interface OutcomeView {
  outcome: RedirectOutcome;
  txnid: string | null;
  amount: string | null;
  status: TransactionStatus | null;
  productInfo: string | null;
  firstName: string | null;
  gatewayTxnId: string | null;
  bankRefNum: string | null;
  paymentMode: string | null;
  errorMessage: string | null;
  suspiciousActivity: boolean;
}
