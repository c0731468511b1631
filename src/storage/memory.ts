/**
 * In-memory receipt store; the default for a session.
 */

import type { ReceiptFilter, StorageAdapter, TransactionReceipt } from '../core/types.js';

function copyReceipt(receipt: TransactionReceipt): TransactionReceipt {
  return {
    ...receipt,
    failure: receipt.failure ? { ...receipt.failure } : null,
    logs: receipt.logs.map(l => ({ ...l, fields: { ...l.fields } })),
  };
}

export class MemoryStorageAdapter implements StorageAdapter {
  private receipts = new Map<string, TransactionReceipt>();

  async saveReceipt(receipt: TransactionReceipt): Promise<void> {
    this.receipts.set(receipt.id, copyReceipt(receipt));
  }

  async getReceipt(id: string): Promise<TransactionReceipt | null> {
    const receipt = this.receipts.get(id);
    return receipt ? copyReceipt(receipt) : null;
  }

  async listReceipts(filter?: ReceiptFilter): Promise<TransactionReceipt[]> {
    let results = Array.from(this.receipts.values());
    if (filter) {
      if (filter.from) results = results.filter(r => r.from === filter.from);
      if (filter.to) results = results.filter(r => r.to === filter.to);
      if (filter.status) results = results.filter(r => r.status === filter.status);
    }
    return results.map(copyReceipt);
  }
}
