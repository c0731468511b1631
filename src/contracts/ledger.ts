/**
 * Ledger: fungible-balance token used as an external collaborator.
 * Mint, transfer and allowance semantics only; no hooks, no decimals.
 */

import type { Chain } from '../core/chain.js';
import { encodePayload, formatAmount, parseAmount } from '../core/codec.js';
import { defineMethod, encodeLogic, NO_ARGS, type ContractLogic, type ContractMethod, type ExecutionFrame } from '../core/contract.js';
import { DispatchFailureError, UnauthorizedError } from '../core/errors.js';
import { addressSchema, amountSchema, objectSchema } from '../core/schema.js';
import type { Address } from '../core/types.js';

export interface LedgerOptions {
  name: string;
  symbol: string;
  /** Minted to the deployer, who also becomes the minting owner */
  initialSupply: bigint;
}

interface OwnerArgs { owner: string }
interface AllowanceArgs { owner: string; spender: string }
interface TransferArgs { to: string; amount: string }
interface ApproveArgs { spender: string; amount: string }
interface TransferFromArgs { from: string; to: string; amount: string }

const OWNER_KEY = 'owner';
const SUPPLY_KEY = 'totalSupply';
const balanceKey = (owner: Address): string => `balance:${owner}`;
const allowanceKey = (owner: Address, spender: Address): string => `allowance:${owner}:${spender}`;

function readAmount(frame: ExecutionFrame, key: string): bigint {
  const raw = frame.load(key);
  return raw === undefined ? 0n : BigInt(raw);
}

function writeAmount(frame: ExecutionFrame, key: string, amount: bigint): void {
  frame.store(key, amount === 0n ? undefined : amount.toString());
}

function move(frame: ExecutionFrame, from: Address, to: Address, amount: bigint): void {
  const fromBalance = readAmount(frame, balanceKey(from));
  if (fromBalance < amount) {
    throw new DispatchFailureError(`insufficient token balance: ${from} holds ${fromBalance}, needs ${amount}`);
  }
  writeAmount(frame, balanceKey(from), fromBalance - amount);
  writeAmount(frame, balanceKey(to), readAmount(frame, balanceKey(to)) + amount);
  frame.emit('Transfer', { from, to, amount: amount.toString() });
}

function mint(frame: ExecutionFrame, to: Address, amount: bigint): void {
  writeAmount(frame, SUPPLY_KEY, readAmount(frame, SUPPLY_KEY) + amount);
  writeAmount(frame, balanceKey(to), readAmount(frame, balanceKey(to)) + amount);
  frame.emit('Mint', { to, amount: amount.toString() });
}

export function createLedger(options: LedgerOptions): ContractLogic {
  const initialSupply = BigInt(formatAmount(options.initialSupply));

  const methods = new Map<string, ContractMethod>([
    ['name', defineMethod<Record<string, never>>({ args: NO_ARGS, view: true, run: () => options.name })],
    ['symbol', defineMethod<Record<string, never>>({ args: NO_ARGS, view: true, run: () => options.symbol })],
    ['totalSupply', defineMethod<Record<string, never>>({
      args: NO_ARGS,
      view: true,
      run: frame => readAmount(frame, SUPPLY_KEY).toString(),
    })],
    ['balanceOf', defineMethod<OwnerArgs>({
      args: objectSchema({ owner: addressSchema }),
      view: true,
      run: (frame, { owner }) => readAmount(frame, balanceKey(owner)).toString(),
    })],
    ['allowance', defineMethod<AllowanceArgs>({
      args: objectSchema({ owner: addressSchema, spender: addressSchema }),
      view: true,
      run: (frame, { owner, spender }) => readAmount(frame, allowanceKey(owner, spender)).toString(),
    })],
    ['transfer', defineMethod<TransferArgs>({
      args: objectSchema({ to: addressSchema, amount: amountSchema }),
      run(frame, { to, amount }) {
        move(frame, frame.caller, to, BigInt(amount));
        return true;
      },
    })],
    ['approve', defineMethod<ApproveArgs>({
      args: objectSchema({ spender: addressSchema, amount: amountSchema }),
      run(frame, { spender, amount }) {
        writeAmount(frame, allowanceKey(frame.caller, spender), BigInt(amount));
        frame.emit('Approval', { owner: frame.caller, spender, amount });
        return true;
      },
    })],
    ['transferFrom', defineMethod<TransferFromArgs>({
      args: objectSchema({ from: addressSchema, to: addressSchema, amount: amountSchema }),
      run(frame, { from, to, amount }) {
        const value = BigInt(amount);
        const key = allowanceKey(from, frame.caller);
        const allowance = readAmount(frame, key);
        if (allowance < value) {
          throw new DispatchFailureError(
            `insufficient allowance: ${frame.caller} may move ${allowance} of ${from}'s tokens, needs ${value}`,
          );
        }
        writeAmount(frame, key, allowance - value);
        move(frame, from, to, value);
        return true;
      },
    })],
    ['mint', defineMethod<TransferArgs>({
      args: objectSchema({ to: addressSchema, amount: amountSchema }),
      run(frame, { to, amount }) {
        if (frame.caller !== frame.load(OWNER_KEY)) {
          throw new UnauthorizedError(`only the ledger owner may mint, not ${frame.caller}`);
        }
        mint(frame, to, BigInt(amount));
        return true;
      },
    })],
  ]);

  return {
    kind: 'ledger',
    code: encodeLogic({
      kind: 'ledger',
      name: options.name,
      symbol: options.symbol,
      methods: [...methods.keys()],
    }),
    methods,
    initialize(frame) {
      frame.store(OWNER_KEY, frame.caller);
      mint(frame, frame.caller, initialSupply);
    },
  };
}

// ── Payload Builders ──

export const ledgerCalls = {
  balanceOf: (owner: Address): Uint8Array => encodePayload('balanceOf', { owner }),
  allowance: (owner: Address, spender: Address): Uint8Array => encodePayload('allowance', { owner, spender }),
  totalSupply: (): Uint8Array => encodePayload('totalSupply'),
  transfer: (to: Address, amount: bigint): Uint8Array =>
    encodePayload('transfer', { to, amount: formatAmount(amount) }),
  approve: (spender: Address, amount: bigint): Uint8Array =>
    encodePayload('approve', { spender, amount: formatAmount(amount) }),
  transferFrom: (from: Address, to: Address, amount: bigint): Uint8Array =>
    encodePayload('transferFrom', { from, to, amount: formatAmount(amount) }),
  mint: (to: Address, amount: bigint): Uint8Array =>
    encodePayload('mint', { to, amount: formatAmount(amount) }),
};

// ── Readers ──

export function readBalance(chain: Chain, token: Address, owner: Address): bigint {
  return parseAmount(chain.staticCall(owner, token, ledgerCalls.balanceOf(owner)));
}

export function readAllowance(chain: Chain, token: Address, owner: Address, spender: Address): bigint {
  return parseAmount(chain.staticCall(owner, token, ledgerCalls.allowance(owner, spender)));
}

export function readTotalSupply(chain: Chain, token: Address): bigint {
  return parseAmount(chain.staticCall(token, token, ledgerCalls.totalSupply()));
}
