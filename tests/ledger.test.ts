import { describe, it, expect, beforeEach } from 'vitest';
import { Chain } from '../src/core/chain.js';
import { generateKeypair } from '../src/core/crypto.js';
import { InvalidArgumentError } from '../src/core/errors.js';
import { encodePayload } from '../src/core/codec.js';
import { createLedger, ledgerCalls, readAllowance, readBalance, readTotalSupply } from '../src/contracts/ledger.js';
import type { Address } from '../src/core/types.js';

describe('Ledger', () => {
  let chain: Chain;
  let owner: Address;
  let alice: Address;
  let bob: Address;
  let token: Address;

  beforeEach(() => {
    chain = new Chain();
    owner = generateKeypair().address;
    alice = generateKeypair().address;
    bob = generateKeypair().address;
    token = chain.deploy(owner, createLedger({ name: 'Token X', symbol: 'X', initialSupply: 1000n }));
  });

  const send = (from: Address, payload: Uint8Array) => chain.sendTransaction({ from, to: token, payload });

  it('mints the initial supply to the deployer', () => {
    expect(chain.staticCall(alice, token, encodePayload('name'))).toBe('Token X');
    expect(chain.staticCall(alice, token, encodePayload('symbol'))).toBe('X');
    expect(readTotalSupply(chain, token)).toBe(1000n);
    expect(readBalance(chain, token, owner)).toBe(1000n);
    expect(readBalance(chain, token, alice)).toBe(0n);
  });

  it('refuses a negative initial supply', () => {
    expect(() => createLedger({ name: 'N', symbol: 'N', initialSupply: -1n })).toThrow(InvalidArgumentError);
  });

  describe('transfer', () => {
    it('moves balance and emits Transfer', async () => {
      const { receipt } = await send(owner, ledgerCalls.transfer(alice, 300n));
      expect(receipt.returnValue).toBe(true);
      expect(receipt.logs).toEqual([
        { address: token, name: 'Transfer', fields: { from: owner, to: alice, amount: '300' }, index: 1 },
      ]);
      expect(readBalance(chain, token, owner)).toBe(700n);
      expect(readBalance(chain, token, alice)).toBe(300n);
    });

    it('fails beyond the balance', async () => {
      await send(owner, ledgerCalls.transfer(alice, 300n));
      const { receipt } = await send(alice, ledgerCalls.transfer(bob, 301n));
      expect(receipt.failure).toEqual({
        code: 'DISPATCH_FAILURE',
        reason: `insufficient token balance: ${alice} holds 300, needs 301`,
      });
      expect(readBalance(chain, token, alice)).toBe(300n);
    });

    it('allows moving the whole balance', async () => {
      await send(owner, ledgerCalls.transfer(alice, 1000n));
      expect(readBalance(chain, token, owner)).toBe(0n);
      expect(readTotalSupply(chain, token)).toBe(1000n);
    });
  });

  describe('allowances', () => {
    beforeEach(async () => {
      await send(owner, ledgerCalls.transfer(alice, 100n));
    });

    it('records approvals and emits Approval', async () => {
      const { receipt } = await send(alice, ledgerCalls.approve(bob, 50n));
      expect(receipt.logs.map(l => [l.name, l.fields])).toEqual([
        ['Approval', { owner: alice, spender: bob, amount: '50' }],
      ]);
      expect(readAllowance(chain, token, alice, bob)).toBe(50n);
    });

    it('lets the spender move tokens and spends the allowance', async () => {
      const carol = generateKeypair().address;
      await send(alice, ledgerCalls.approve(bob, 50n));
      const { receipt } = await send(bob, ledgerCalls.transferFrom(alice, carol, 30n));
      expect(receipt.status).toBe('success');
      expect(readBalance(chain, token, alice)).toBe(70n);
      expect(readBalance(chain, token, carol)).toBe(30n);
      expect(readAllowance(chain, token, alice, bob)).toBe(20n);
    });

    it('fails beyond the allowance', async () => {
      await send(alice, ledgerCalls.approve(bob, 50n));
      const { receipt } = await send(bob, ledgerCalls.transferFrom(alice, bob, 51n));
      expect(receipt.failure).toEqual({
        code: 'DISPATCH_FAILURE',
        reason: `insufficient allowance: ${bob} may move 50 of ${alice}'s tokens, needs 51`,
      });
    });

    it('requires an allowance even for the owner', async () => {
      const { receipt } = await send(alice, ledgerCalls.transferFrom(alice, bob, 1n));
      expect(receipt.failure?.code).toBe('DISPATCH_FAILURE');
    });

    it('keeps the allowance when the balance runs short', async () => {
      await send(alice, ledgerCalls.approve(bob, 500n));
      const { receipt } = await send(bob, ledgerCalls.transferFrom(alice, bob, 200n));
      expect(receipt.failure?.reason).toBe(`insufficient token balance: ${alice} holds 100, needs 200`);
      expect(readAllowance(chain, token, alice, bob)).toBe(500n);
    });

    it('overwrites an earlier approval', async () => {
      await send(alice, ledgerCalls.approve(bob, 50n));
      await send(alice, ledgerCalls.approve(bob, 0n));
      expect(readAllowance(chain, token, alice, bob)).toBe(0n);
    });
  });

  describe('mint', () => {
    it('lets the owner mint', async () => {
      await send(owner, ledgerCalls.mint(alice, 5n));
      expect(readBalance(chain, token, alice)).toBe(5n);
      expect(readTotalSupply(chain, token)).toBe(1005n);
    });

    it('refuses anyone else', async () => {
      const { receipt } = await send(alice, ledgerCalls.mint(alice, 5n));
      expect(receipt.failure).toEqual({ code: 'UNAUTHORIZED', reason: `only the ledger owner may mint, not ${alice}` });
      expect(readTotalSupply(chain, token)).toBe(1000n);
    });
  });

  describe('payload builders', () => {
    it('refuse negative amounts', () => {
      expect(() => ledgerCalls.transfer(alice, -1n)).toThrow(InvalidArgumentError);
    });

    it('encode amounts as decimal strings', () => {
      expect(new TextDecoder().decode(ledgerCalls.approve('spender', 12n)))
        .toBe('{"args":{"amount":"12","spender":"spender"},"method":"approve"}');
    });
  });
});
