/**
 * Core Types
 * Single source of truth for shared types and interfaces.
 */

import type { ExecutionError, ExecutionErrorCode } from './errors.js';

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Result of one execution attempt. Failure carries the first error raised. */
export type Outcome<T = JsonValue> = Result<T, ExecutionError>;

// ── Values ──

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ── Identities ──

/**
 * Opaque account handle, compared for equality only.
 * Externally owned accounts use the base64url Ed25519 public key;
 * contracts use a digest of their deployer and deployer nonce.
 */
export type Address = string;

/** Ed25519 keypair controlling an externally owned account */
export interface Keypair {
  address: Address;
  name?: string;
  privateKey: Uint8Array;
}

// ── Calls ──

/** One sub-operation of a batch. Built with `makeCall`, frozen once built. */
export interface Call {
  readonly target: Address;
  readonly value: bigint;
  readonly payload: Uint8Array;
}

// ── Delegation Binding ──

/** What an identity signs to bind (or, with `implementation: null`, unbind) its address */
export interface AuthorizationTuple {
  /** 0 accepts any chain */
  chainId: number;
  implementation: Address | null;
  nonce: number;
}

export interface SignedAuthorization extends AuthorizationTuple {
  authority: Address;
  /** Base64url Ed25519 signature over the canonical tuple and authority */
  signature: string;
}

export interface CodeIntrospection {
  code: Uint8Array;
  /** Base64url BLAKE2b-256 of `code` */
  digest: string;
  size: number;
}

// ── Events & Receipts ──

export interface EventLog {
  address: Address;
  name: string;
  fields: Record<string, string>;
  index: number;
}

export interface LogFilter {
  address?: Address;
  name?: string;
}

export interface TransactionRequest {
  from: Address;
  to: Address;
  value?: bigint;
  payload?: Uint8Array;
}

export interface ExecutionFailure {
  code: ExecutionErrorCode;
  reason: string;
}

export interface TransactionReceipt {
  id: string;
  from: Address;
  to: Address;
  value: bigint;
  status: 'success' | 'reverted';
  returnValue: JsonValue;
  failure: ExecutionFailure | null;
  logs: EventLog[];
  createdAt: string;
}

export interface TransactionResult {
  receipt: TransactionReceipt;
  outcome: Outcome;
}

// ── Configuration ──

export interface ChainConfig {
  /** Chain id that attach proofs must name (or 0 for any chain) */
  chainId: number;
  /** Deepest nested call allowed before dispatch fails */
  maxCallDepth: number;
}

// ── Storage ──

export interface ReceiptFilter {
  from?: Address;
  to?: Address;
  status?: TransactionReceipt['status'];
}

export interface StorageAdapter {
  saveReceipt(receipt: TransactionReceipt): Promise<void>;
  getReceipt(id: string): Promise<TransactionReceipt | null>;
  listReceipts(filter?: ReceiptFilter): Promise<TransactionReceipt[]>;
}
