import { LedgerEntry } from './types/ledger.types';

export abstract class LedgerStore {
  abstract find(merchantId: string, txnid: string): Promise<LedgerEntry | null>;

  /** Resolves false when (merchantId, txnid) already has an entry. */
  abstract insert(entry: LedgerEntry): Promise<boolean>;

  abstract update(entry: LedgerEntry): Promise<void>;
}
