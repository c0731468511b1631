/**
 * Exchange: fixed 1:1 swap between registered ledger pairs.
 * Liquidity is whatever ledger balance the exchange's own address holds.
 */

import { encodePayload, formatAmount, parseAmount } from '../core/codec.js';
import { defineMethod, encodeLogic, type ContractLogic, type ContractMethod, type ExecutionFrame } from '../core/contract.js';
import { DispatchFailureError, InvalidArgumentError } from '../core/errors.js';
import { addressSchema, amountSchema, objectSchema } from '../core/schema.js';
import type { Address } from '../core/types.js';
import { ledgerCalls } from './ledger.js';

interface PairArgs { tokenA: string; tokenB: string }
interface DepositArgs { token: string; amount: string }
interface SwapArgs { tokenIn: string; tokenOut: string; amountIn: string; minAmountOut: string }

const pairKey = (a: Address, b: Address): string => `pair:${a}:${b}`;

function hasPair(frame: ExecutionFrame, a: Address, b: Address): boolean {
  return frame.load(pairKey(a, b)) !== undefined;
}

/** Fails for an address that runs no code. */
function requireCode(frame: ExecutionFrame, token: Address): void {
  if (frame.codeSize(token) === 0) {
    throw new DispatchFailureError(`token ${token} has no code`);
  }
}

/** A ledger transfer counts only when the token answers `true`. */
function moveTokens(frame: ExecutionFrame, token: Address, payload: Uint8Array): void {
  requireCode(frame, token);
  if (frame.call(token, 0n, payload) !== true) {
    throw new DispatchFailureError(`token ${token} did not confirm the transfer`);
  }
}

/** Output amount for `amountIn`; the rate is fixed at 1:1. */
function quote(amountIn: bigint): bigint {
  return amountIn;
}

export function createExchange(): ContractLogic {
  const pairSchema = objectSchema({ tokenA: addressSchema, tokenB: addressSchema });

  const methods = new Map<string, ContractMethod>([
    ['createPair', defineMethod<PairArgs>({
      args: pairSchema,
      run(frame, { tokenA, tokenB }) {
        if (tokenA === tokenB) {
          throw new InvalidArgumentError(`cannot pair ${tokenA} with itself`);
        }
        if (hasPair(frame, tokenA, tokenB)) {
          throw new InvalidArgumentError(`pair ${tokenA}/${tokenB} already exists`);
        }
        for (const token of [tokenA, tokenB]) {
          if (frame.codeSize(token) === 0) {
            throw new InvalidArgumentError(`${token} is not a token contract`);
          }
        }
        frame.store(pairKey(tokenA, tokenB), '1');
        frame.store(pairKey(tokenB, tokenA), '1');
        frame.emit('PairCreated', { tokenA, tokenB });
        return true;
      },
    })],
    ['hasPair', defineMethod<PairArgs>({
      args: pairSchema,
      view: true,
      run: (frame, { tokenA, tokenB }) => hasPair(frame, tokenA, tokenB),
    })],
    ['depositLiquidity', defineMethod<DepositArgs>({
      args: objectSchema({ token: addressSchema, amount: amountSchema }),
      run(frame, { token, amount }) {
        const value = BigInt(amount);
        if (value === 0n) throw new InvalidArgumentError('deposit amount must be positive');
        moveTokens(frame, token, ledgerCalls.transferFrom(frame.caller, frame.self, value));
        frame.emit('LiquidityDeposited', { provider: frame.caller, token, amount });
        return true;
      },
    })],
    ['swap', defineMethod<SwapArgs>({
      args: objectSchema({
        tokenIn: addressSchema,
        tokenOut: addressSchema,
        amountIn: amountSchema,
        minAmountOut: amountSchema,
      }),
      run(frame, { tokenIn, tokenOut, amountIn, minAmountOut }) {
        const input = BigInt(amountIn);
        if (input === 0n) throw new InvalidArgumentError('swap input must be positive');
        if (!hasPair(frame, tokenIn, tokenOut)) {
          throw new DispatchFailureError(`no pair registered for ${tokenIn}/${tokenOut}`);
        }
        const output = quote(input);
        if (output < BigInt(minAmountOut)) {
          throw new DispatchFailureError(`output ${output} below minimum ${minAmountOut}`);
        }
        requireCode(frame, tokenOut);
        const liquidity = parseAmount(frame.call(tokenOut, 0n, ledgerCalls.balanceOf(frame.self)));
        if (liquidity < output) {
          throw new DispatchFailureError(`insufficient liquidity: holds ${liquidity} of ${tokenOut}, needs ${output}`);
        }

        moveTokens(frame, tokenIn, ledgerCalls.transferFrom(frame.caller, frame.self, input));
        moveTokens(frame, tokenOut, ledgerCalls.transfer(frame.caller, output));
        frame.emit('Swapped', {
          trader: frame.caller,
          tokenIn,
          tokenOut,
          amountIn,
          amountOut: output.toString(),
        });
        return output.toString();
      },
    })],
  ]);

  return {
    kind: 'exchange',
    code: encodeLogic({ kind: 'exchange', rate: '1:1', methods: [...methods.keys()] }),
    methods,
  };
}

// ── Payload Builders ──

export const exchangeCalls = {
  createPair: (tokenA: Address, tokenB: Address): Uint8Array => encodePayload('createPair', { tokenA, tokenB }),
  hasPair: (tokenA: Address, tokenB: Address): Uint8Array => encodePayload('hasPair', { tokenA, tokenB }),
  depositLiquidity: (token: Address, amount: bigint): Uint8Array =>
    encodePayload('depositLiquidity', { token, amount: formatAmount(amount) }),
  swap: (tokenIn: Address, tokenOut: Address, amountIn: bigint, minAmountOut: bigint): Uint8Array =>
    encodePayload('swap', {
      tokenIn,
      tokenOut,
      amountIn: formatAmount(amountIn),
      minAmountOut: formatAmount(minAmountOut),
    }),
};
