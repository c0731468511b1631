/**
 * delegated-exec: account delegation with gated, atomic batch execution.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  Outcome,
  JsonValue,
  Address,
  Keypair,
  Call,
  AuthorizationTuple,
  SignedAuthorization,
  CodeIntrospection,
  EventLog,
  LogFilter,
  TransactionRequest,
  ExecutionFailure,
  TransactionReceipt,
  TransactionResult,
  ChainConfig,
  ReceiptFilter,
  StorageAdapter,
} from './core/types.js';

// ── Errors ──
export {
  ExecutionError,
  InvalidProofError,
  UnauthorizedError,
  DispatchFailureError,
  InvalidArgumentError,
  isExecutionError,
  EXECUTION_ERROR_CODES,
} from './core/errors.js';
export type { ExecutionErrorCode } from './core/errors.js';

// ── Crypto ──
export {
  generateKeypair,
  sign,
  verify,
  blake2b256,
  digest,
  canonicalize,
  signObject,
  verifyObjectSignature,
  toBase64url,
  fromBase64url,
  addressFromPublicKey,
  deriveContractAddress,
} from './core/crypto.js';

// ── Codec ──
export {
  EMPTY_PAYLOAD,
  encodePayload,
  decodePayload,
  formatAmount,
  parseAmount,
  makeCall,
  encodeCall,
  decodeCall,
} from './core/codec.js';
export type { PayloadEnvelope, EncodedCall } from './core/codec.js';

// ── Contract Logic ──
export { defineMethod, encodeLogic, NO_ARGS } from './core/contract.js';
export type { ExecutionFrame, ContractMethod, MethodSpec, ContractLogic } from './core/contract.js';

// ── Authorization ──
export { signAuthorization, verifyAuthorization } from './core/authorization.js';
export { authorize, enforce, OPEN_POLICY, SELF_ONLY_POLICY } from './core/gate.js';
export type { AuthorizationPolicy } from './core/gate.js';

// ── Execution ──
export { executeBatch } from './core/executor.js';
export { Chain, DEFAULT_CHAIN_CONFIG } from './core/chain.js';
export { WorldState } from './core/state.js';

// ── Delegates ──
export {
  createDelegate,
  createOpenDelegate,
  createSelfOnlyDelegate,
  delegateCalls,
  OPEN_DELEGATE_IDENTIFIER,
  SELF_ONLY_DELEGATE_IDENTIFIER,
} from './contracts/delegate.js';
export type { DelegateImplementation } from './contracts/delegate.js';

// ── Collaborators ──
export { createLedger, ledgerCalls, readBalance, readAllowance, readTotalSupply } from './contracts/ledger.js';
export type { LedgerOptions } from './contracts/ledger.js';
export { createExchange, exchangeCalls } from './contracts/exchange.js';

// ── Observability ──
export { createLogger, LogLevel, setGlobalLogLevel, setLogOutput } from './core/logger.js';
export type { Logger, LogEntry, LogContext, LogSink } from './core/logger.js';
export { MetricsCollector, globalMetrics } from './core/metrics.js';
export type { MetricsSnapshot, Tags } from './core/metrics.js';

// ── Storage ──
export { MemoryStorageAdapter } from './storage/memory.js';
export { SqliteStorageAdapter } from './storage/sqlite.js';
