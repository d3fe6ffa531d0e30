import { LedgerStore } from '../../ledger/ledger.store';
import { LedgerEntry } from '../../ledger/types/ledger.types';

export class MemoryLedgerStore extends LedgerStore {
  private readonly entries = new Map<string, LedgerEntry>();

  async find(merchantId: string, txnid: string): Promise<LedgerEntry | null> {
    const entry = this.entries.get(this.keyOf(merchantId, txnid));
    return entry ? { ...entry } : null;
  }

  async insert(entry: LedgerEntry): Promise<boolean> {
    const key = this.keyOf(entry.merchantId, entry.txnid);
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, { ...entry });
    return true;
  }

  async update(entry: LedgerEntry): Promise<void> {
    this.entries.set(this.keyOf(entry.merchantId, entry.txnid), { ...entry });
  }

  private keyOf(merchantId: string, txnid: string): string {
    return `${merchantId}\u0000${txnid}`;
  }
}
