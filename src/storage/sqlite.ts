/**
 * SQLite receipt store using better-sqlite3.
 * Defaults to an in-memory database that lives as long as the session.
 */

import Database from 'better-sqlite3';
import { parseJsonValue } from '../core/codec.js';
import { EXECUTION_ERROR_CODES } from '../core/errors.js';
import { ajv, errorsText } from '../core/schema.js';
import type { EventLog, ExecutionFailure, ReceiptFilter, StorageAdapter, TransactionReceipt } from '../core/types.js';

interface ReceiptRow {
  id: string;
  from_address: string;
  to_address: string;
  value: string;
  status: TransactionReceipt['status'];
  return_json: string;
  failure_json: string | null;
  logs_json: string;
  created_at: string;
}

const validateRow = ajv.compile<ReceiptRow>({
  type: 'object',
  properties: {
    id: { type: 'string' },
    from_address: { type: 'string' },
    to_address: { type: 'string' },
    value: { type: 'string' },
    status: { enum: ['success', 'reverted'] },
    return_json: { type: 'string' },
    failure_json: { type: ['string', 'null'] },
    logs_json: { type: 'string' },
    created_at: { type: 'string' },
  },
  required: ['id', 'from_address', 'to_address', 'value', 'status', 'return_json', 'failure_json', 'logs_json', 'created_at'],
});

const validateFailure = ajv.compile<ExecutionFailure>({
  type: 'object',
  properties: {
    code: { enum: [...EXECUTION_ERROR_CODES] },
    reason: { type: 'string' },
  },
  required: ['code', 'reason'],
  additionalProperties: false,
});

const validateLogs = ajv.compile<EventLog[]>({
  type: 'array',
  items: {
    type: 'object',
    properties: {
      address: { type: 'string' },
      name: { type: 'string' },
      fields: { type: 'object', additionalProperties: { type: 'string' } },
      index: { type: 'integer', minimum: 0 },
    },
    required: ['address', 'name', 'fields', 'index'],
    additionalProperties: false,
  },
});

export class SqliteStorageAdapter implements StorageAdapter {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS receipts (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        from_address TEXT NOT NULL,
        to_address TEXT NOT NULL,
        value TEXT NOT NULL,
        status TEXT NOT NULL,
        return_json TEXT NOT NULL,
        failure_json TEXT,
        logs_json TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_receipts_from ON receipts(from_address);
      CREATE INDEX IF NOT EXISTS idx_receipts_to ON receipts(to_address);
      CREATE INDEX IF NOT EXISTS idx_receipts_status ON receipts(status);
    `);
  }

  async saveReceipt(r: TransactionReceipt): Promise<void> {
    this.db.prepare(`
      INSERT OR REPLACE INTO receipts (id, from_address, to_address, value, status, return_json, failure_json, logs_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      r.id,
      r.from,
      r.to,
      r.value.toString(),
      r.status,
      JSON.stringify(r.returnValue),
      r.failure ? JSON.stringify(r.failure) : null,
      JSON.stringify(r.logs),
      r.createdAt,
    );
  }

  async getReceipt(id: string): Promise<TransactionReceipt | null> {
    const row: unknown = this.db.prepare('SELECT * FROM receipts WHERE id = ?').get(id);
    return row === undefined ? null : this.rowToReceipt(row);
  }

  async listReceipts(filter?: ReceiptFilter): Promise<TransactionReceipt[]> {
    let sql = 'SELECT * FROM receipts WHERE 1=1';
    const params: string[] = [];
    if (filter?.from) { sql += ' AND from_address = ?'; params.push(filter.from); }
    if (filter?.to) { sql += ' AND to_address = ?'; params.push(filter.to); }
    if (filter?.status) { sql += ' AND status = ?'; params.push(filter.status); }
    sql += ' ORDER BY seq';
    const rows: unknown[] = this.db.prepare(sql).all(...params);
    return rows.map(r => this.rowToReceipt(r));
  }

  close(): void {
    this.db.close();
  }

  private rowToReceipt(row: unknown): TransactionReceipt {
    if (!validateRow(row)) {
      throw new Error(`Corrupt receipt row: ${errorsText(validateRow)}`);
    }
    let failure: ExecutionFailure | null = null;
    if (row.failure_json !== null) {
      const parsed: unknown = JSON.parse(row.failure_json);
      if (!validateFailure(parsed)) {
        throw new Error(`Corrupt receipt failure for ${row.id}: ${errorsText(validateFailure)}`);
      }
      failure = parsed;
    }
    const logs: unknown = JSON.parse(row.logs_json);
    if (!validateLogs(logs)) {
      throw new Error(`Corrupt receipt logs for ${row.id}: ${errorsText(validateLogs)}`);
    }
    return {
      id: row.id,
      from: row.from_address,
      to: row.to_address,
      value: BigInt(row.value),
      status: row.status,
      returnValue: parseJsonValue(row.return_json),
      failure,
      logs,
      createdAt: row.created_at,
    };
  }
}
