/**
 * World State: accounts, contract storage and event logs for one session.
 *
 * Every mutation is journaled so any frame can be rolled back to a snapshot.
 * Snapshots are journal lengths; `commit` drops the journal once a top-level
 * operation has finished.
 */

import type { ContractLogic } from './contract.js';
import { DispatchFailureError } from './errors.js';
import type { Address, EventLog, LogFilter } from './types.js';

interface AccountRecord {
  balance: bigint;
  nonce: number;
  code: ContractLogic | null;
  /** Implementation address this account is bound to */
  delegation: Address | null;
}

type JournalEntry =
  | { kind: 'account'; address: Address; previous: AccountRecord | undefined }
  | { kind: 'storage'; address: Address; key: string; previous: string | undefined }
  | { kind: 'log' };

const EMPTY_ACCOUNT: Readonly<AccountRecord> = { balance: 0n, nonce: 0, code: null, delegation: null };

export class WorldState {
  private accounts = new Map<Address, AccountRecord>();
  private storage = new Map<Address, Map<string, string>>();
  private logs: EventLog[] = [];
  private journal: JournalEntry[] = [];

  // ── Accounts ──

  getBalance(address: Address): bigint {
    return this.read(address).balance;
  }

  getNonce(address: Address): number {
    return this.read(address).nonce;
  }

  getCode(address: Address): ContractLogic | null {
    return this.read(address).code;
  }

  getDelegation(address: Address): Address | null {
    return this.read(address).delegation;
  }

  setBalance(address: Address, balance: bigint): void {
    if (balance < 0n) throw new RangeError(`balance cannot be negative: ${balance}`);
    this.update(address, { balance });
  }

  credit(address: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.update(address, { balance: this.getBalance(address) + amount });
  }

  debit(address: Address, amount: bigint): void {
    if (amount === 0n) return;
    const balance = this.getBalance(address);
    if (balance < amount) {
      throw new DispatchFailureError(`insufficient balance: ${address} holds ${balance}, needs ${amount}`);
    }
    this.update(address, { balance: balance - amount });
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.debit(from, amount);
    this.credit(to, amount);
  }

  incrementNonce(address: Address): void {
    this.update(address, { nonce: this.getNonce(address) + 1 });
  }

  setCode(address: Address, code: ContractLogic): void {
    this.update(address, { code });
  }

  setDelegation(address: Address, implementation: Address | null): void {
    this.update(address, { delegation: implementation });
  }

  // ── Contract Storage ──

  load(address: Address, key: string): string | undefined {
    return this.storage.get(address)?.get(key);
  }

  store(address: Address, key: string, value: string | undefined): void {
    let slots = this.storage.get(address);
    if (!slots) {
      slots = new Map();
      this.storage.set(address, slots);
    }
    this.journal.push({ kind: 'storage', address, key, previous: slots.get(key) });
    if (value === undefined) {
      slots.delete(key);
    } else {
      slots.set(key, value);
    }
  }

  // ── Logs ──

  appendLog(address: Address, name: string, fields: Record<string, string>): EventLog {
    const log: EventLog = { address, name, fields: { ...fields }, index: this.logs.length };
    this.logs.push(log);
    this.journal.push({ kind: 'log' });
    return log;
  }

  /** Number of logs recorded so far; pass to `logsSince` to collect a frame's events. */
  logCount(): number {
    return this.logs.length;
  }

  logsSince(index: number): EventLog[] {
    return this.logs.slice(index).map(copyLog);
  }

  getLogs(filter?: LogFilter): EventLog[] {
    let results = this.logs;
    if (filter?.address) results = results.filter(l => l.address === filter.address);
    if (filter?.name) results = results.filter(l => l.name === filter.name);
    return results.map(copyLog);
  }

  // ── Journal ──

  snapshot(): number {
    return this.journal.length;
  }

  revert(snapshot: number): void {
    if (snapshot > this.journal.length) {
      throw new RangeError(`unknown snapshot ${snapshot}`);
    }
    while (this.journal.length > snapshot) {
      const entry = this.journal.pop();
      if (entry) this.undo(entry);
    }
  }

  commit(): void {
    this.journal = [];
  }

  private undo(entry: JournalEntry): void {
    switch (entry.kind) {
      case 'account':
        if (entry.previous) {
          this.accounts.set(entry.address, entry.previous);
        } else {
          this.accounts.delete(entry.address);
        }
        break;
      case 'storage': {
        const slots = this.storage.get(entry.address);
        if (!slots) break;
        if (entry.previous === undefined) {
          slots.delete(entry.key);
        } else {
          slots.set(entry.key, entry.previous);
        }
        break;
      }
      case 'log':
        this.logs.pop();
        break;
    }
  }

  private read(address: Address): Readonly<AccountRecord> {
    return this.accounts.get(address) ?? EMPTY_ACCOUNT;
  }

  private update(address: Address, change: Partial<AccountRecord>): void {
    const previous = this.accounts.get(address);
    this.journal.push({ kind: 'account', address, previous });
    this.accounts.set(address, { ...(previous ?? EMPTY_ACCOUNT), ...change });
  }
}

function copyLog(log: EventLog): EventLog {
  return { ...log, fields: { ...log.fields } };
}
