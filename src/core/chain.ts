/**
 * Chain: one in-process execution session.
 *
 * Owns the world state and the delegation table, routes calls to contract
 * logic and turns each transaction into an all-or-nothing outcome.
 */

import { verifyAuthorization } from './authorization.js';
import { EMPTY_PAYLOAD, decodePayload } from './codec.js';
import type { ContractLogic, ExecutionFrame } from './contract.js';
import { deriveContractAddress, digest } from './crypto.js';
import {
  DispatchFailureError,
  InvalidArgumentError,
  InvalidProofError,
  isExecutionError,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { globalMetrics } from './metrics.js';
import { WorldState } from './state.js';
import type {
  Address,
  ChainConfig,
  CodeIntrospection,
  EventLog,
  JsonValue,
  LogFilter,
  Outcome,
  ReceiptFilter,
  SignedAuthorization,
  StorageAdapter,
  TransactionReceipt,
  TransactionRequest,
  TransactionResult,
} from './types.js';
import { MemoryStorageAdapter } from '../storage/memory.js';

export const DEFAULT_CHAIN_CONFIG: ChainConfig = {
  chainId: 31337,
  maxCallDepth: 1024,
};

interface FrameContext {
  caller: Address;
  self: Address;
  codeAddress: Address;
  value: bigint;
  depth: number;
  isStatic: boolean;
}

interface ResolvedLogic {
  logic: ContractLogic;
  codeAddress: Address;
}

/** Generate a transaction ID */
function generateTransactionId(): string {
  const hex = Array.from(crypto.getRandomValues(new Uint8Array(8)))
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
  return `tx_${hex}`;
}

export class Chain {
  readonly config: ChainConfig;
  private state = new WorldState();
  private storage: StorageAdapter;
  private logger: Logger;

  /**
   * Create a new session.
   * @param config - Optional partial config to override defaults
   * @param storage - Where receipts go; in memory unless given
   */
  constructor(config?: Partial<ChainConfig>, storage: StorageAdapter = new MemoryStorageAdapter()) {
    this.config = { ...DEFAULT_CHAIN_CONFIG, ...config };
    this.storage = storage;
    this.logger = createLogger('Chain').child({ chainId: this.config.chainId });
  }

  // ── Accounts ──

  getBalance(address: Address): bigint {
    return this.state.getBalance(address);
  }

  getNonce(address: Address): number {
    return this.state.getNonce(address);
  }

  /** Fund an account directly, outside any transaction. */
  setBalance(address: Address, amount: bigint): void {
    if (amount < 0n) throw new InvalidArgumentError(`balance cannot be negative: ${amount}`);
    this.state.setBalance(address, amount);
    this.state.commit();
  }

  /**
   * Install `logic` at an address derived from the deployer and its nonce,
   * then run the logic's initializer with the deployer as caller.
   */
  deploy(deployer: Address, logic: ContractLogic): Address {
    const address = deriveContractAddress(deployer, this.state.getNonce(deployer));
    const checkpoint = this.state.snapshot();
    try {
      this.state.incrementNonce(deployer);
      this.state.setCode(address, logic);
      logic.initialize?.(this.createFrame({
        caller: deployer,
        self: address,
        codeAddress: address,
        value: 0n,
        depth: 0,
        isStatic: false,
      }));
    } catch (err) {
      this.state.revert(checkpoint);
      throw err;
    }
    this.state.commit();
    this.logger.info('Contract deployed', { kind: logic.kind, address, deployer });
    return address;
  }

  // ── Delegation ──

  /**
   * Bind (or with `implementation: null`, unbind) the authority's address.
   * The proof must be signed by the authority, name this chain or chain 0,
   * and carry the authority's current nonce, which is then consumed.
   */
  attach(authorization: SignedAuthorization): void {
    const { authority, implementation, chainId, nonce } = authorization;
    if (!verifyAuthorization(authorization)) {
      throw new InvalidProofError(`authorization not signed by ${authority}`);
    }
    if (chainId !== 0 && chainId !== this.config.chainId) {
      throw new InvalidProofError(`authorization is for chain ${chainId}, this is ${this.config.chainId}`);
    }
    const expectedNonce = this.state.getNonce(authority);
    if (nonce !== expectedNonce) {
      throw new InvalidProofError(`authorization nonce ${nonce} does not match account nonce ${expectedNonce}`);
    }
    if (this.state.getCode(authority)) {
      throw new InvalidArgumentError(`contract account ${authority} cannot be delegated`);
    }
    if (implementation !== null && !this.state.getCode(implementation)) {
      throw new InvalidArgumentError(`implementation ${implementation} has no code`);
    }

    this.state.setDelegation(authority, implementation);
    this.state.incrementNonce(authority);
    this.state.commit();

    globalMetrics.counter('delegation.attached', { action: implementation === null ? 'clear' : 'bind' });
    this.logger.info(implementation === null ? 'Delegation cleared' : 'Delegation attached', {
      authority,
      implementation,
    });
  }

  getDelegation(address: Address): Address | null {
    return this.state.getDelegation(address);
  }

  // ── Code Introspection ──

  /** Code the address executes: its own, its bound implementation's, or empty. */
  getCode(address: Address): Uint8Array {
    const resolved = this.resolveLogic(address);
    return resolved ? resolved.logic.code.slice() : new Uint8Array(0);
  }

  getCodeHash(address: Address): string {
    return digest(this.getCode(address));
  }

  getCodeSize(address: Address): number {
    return this.getCode(address).length;
  }

  /** Exactly `length` bytes of code from `offset`, zero-filled past the end. */
  copyCode(address: Address, offset: number, length: number): Uint8Array {
    if (!Number.isInteger(offset) || offset < 0 || !Number.isInteger(length) || length < 0) {
      throw new InvalidArgumentError(`invalid code range: offset ${offset}, length ${length}`);
    }
    const out = new Uint8Array(length);
    out.set(this.getCode(address).subarray(offset, offset + length));
    return out;
  }

  introspectCode(address: Address): CodeIntrospection {
    const code = this.getCode(address);
    return { code, digest: digest(code), size: code.length };
  }

  // ── Execution ──

  /**
   * Run a read-only call. Writes, events and value transfers fail, and
   * nothing the call touches survives it.
   */
  staticCall(from: Address, to: Address, payload: Uint8Array = EMPTY_PAYLOAD): JsonValue {
    const checkpoint = this.state.snapshot();
    try {
      return this.dispatch({ caller: from, target: to, value: 0n, payload, depth: 0, isStatic: true });
    } finally {
      this.state.revert(checkpoint);
    }
  }

  /**
   * Execute a transaction atomically and persist its receipt.
   * Execution errors become a reverted outcome; anything else reverts and propagates.
   */
  async sendTransaction(tx: TransactionRequest): Promise<TransactionResult> {
    const value = tx.value ?? 0n;
    const payload = tx.payload ?? EMPTY_PAYLOAD;
    const firstLog = this.state.logCount();
    const checkpoint = this.state.snapshot();

    let outcome: Outcome;
    try {
      if (value < 0n) throw new InvalidArgumentError(`transaction value must be non-negative, got ${value}`);
      const returnValue = this.dispatch({ caller: tx.from, target: tx.to, value, payload, depth: 0, isStatic: false });
      this.state.incrementNonce(tx.from);
      outcome = { ok: true, value: returnValue };
    } catch (err) {
      this.state.revert(checkpoint);
      if (!isExecutionError(err)) throw err;
      outcome = { ok: false, error: err };
    }

    const logs = outcome.ok ? this.state.logsSince(firstLog) : [];
    this.state.commit();

    const receipt: TransactionReceipt = {
      id: generateTransactionId(),
      from: tx.from,
      to: tx.to,
      value,
      status: outcome.ok ? 'success' : 'reverted',
      returnValue: outcome.ok ? outcome.value : null,
      failure: outcome.ok ? null : outcome.error.toFailure(),
      logs,
      createdAt: new Date().toISOString(),
    };

    globalMetrics.counter('tx.sent', { status: receipt.status });
    if (outcome.ok) {
      this.logger.info('Transaction executed', { id: receipt.id, from: tx.from, to: tx.to, logs: logs.length });
    } else {
      this.logger.warn('Transaction reverted', {
        id: receipt.id,
        from: tx.from,
        to: tx.to,
        code: outcome.error.code,
        reason: outcome.error.message,
      });
    }

    await this.storage.saveReceipt(receipt);
    return { receipt, outcome };
  }

  getLogs(filter?: LogFilter): EventLog[] {
    return this.state.getLogs(filter);
  }

  getReceipt(id: string): Promise<TransactionReceipt | null> {
    return this.storage.getReceipt(id);
  }

  listReceipts(filter?: ReceiptFilter): Promise<TransactionReceipt[]> {
    return this.storage.listReceipts(filter);
  }

  // ── Dispatch ──

  /**
   * Own code wins; otherwise a bound implementation's logic runs with the
   * account as `self`. Plain accounts resolve to nothing.
   */
  private resolveLogic(address: Address): ResolvedLogic | null {
    const own = this.state.getCode(address);
    if (own) return { logic: own, codeAddress: address };

    const implementation = this.state.getDelegation(address);
    if (implementation === null) return null;
    const logic = this.state.getCode(implementation);
    return logic ? { logic, codeAddress: implementation } : null;
  }

  private dispatch(call: {
    caller: Address;
    target: Address;
    value: bigint;
    payload: Uint8Array;
    depth: number;
    isStatic: boolean;
  }): JsonValue {
    const { caller, target, value, payload, depth, isStatic } = call;
    const checkpoint = this.state.snapshot();
    try {
      if (depth > this.config.maxCallDepth) {
        throw new DispatchFailureError(`call depth ${depth} exceeds limit ${this.config.maxCallDepth}`);
      }
      if (value < 0n) throw new InvalidArgumentError(`call value must be non-negative, got ${value}`);
      if (isStatic && value > 0n) throw new DispatchFailureError('value transfer in static call');

      this.state.transfer(caller, target, value);

      const resolved = this.resolveLogic(target);
      if (!resolved) return null;

      return this.invoke(resolved.logic, { caller, self: target, codeAddress: resolved.codeAddress, value, depth, isStatic }, payload);
    } catch (err) {
      this.state.revert(checkpoint);
      throw err;
    }
  }

  /** View methods always run in a static frame. */
  private invoke(logic: ContractLogic, ctx: FrameContext, payload: Uint8Array): JsonValue {
    if (payload.length === 0) {
      if (!logic.receive) {
        throw new DispatchFailureError(`${logic.kind} at ${ctx.self} does not accept plain value transfers`);
      }
      return logic.receive(this.createFrame(ctx));
    }

    const envelope = decodePayload(payload);
    const method = logic.methods.get(envelope.method);
    if (!method) {
      throw new DispatchFailureError(`unknown method ${logic.kind}.${envelope.method}`);
    }
    if (ctx.value > 0n && !method.payable) {
      throw new DispatchFailureError(`${logic.kind}.${envelope.method} is not payable`);
    }

    this.logger.debug('Dispatching call', {
      method: `${logic.kind}.${envelope.method}`,
      caller: ctx.caller,
      self: ctx.self,
      codeAddress: ctx.codeAddress,
      depth: ctx.depth,
    });
    const frame = this.createFrame({ ...ctx, isStatic: ctx.isStatic || method.view });
    return method.invoke(frame, envelope.args);
  }

  private createFrame(ctx: FrameContext): ExecutionFrame {
    const state = this.state;
    const assertWritable = (operation: string): void => {
      if (ctx.isStatic) throw new DispatchFailureError(`${operation} in static call`);
    };

    return {
      ...ctx,
      chainId: this.config.chainId,
      load: key => state.load(ctx.self, key),
      store: (key, value) => {
        assertWritable('storage write');
        state.store(ctx.self, key, value);
      },
      call: (target, value, payload) =>
        this.dispatch({ caller: ctx.self, target, value, payload, depth: ctx.depth + 1, isStatic: ctx.isStatic }),
      emit: (name, fields) => {
        assertWritable('event emission');
        state.appendLog(ctx.self, name, fields);
      },
      balanceOf: address => state.getBalance(address),
      codeSize: address => this.getCodeSize(address),
    };
  }
}
