import { describe, it, expect, beforeEach } from 'vitest';
import { Chain } from '../src/core/chain.js';
import { encodePayload, makeCall } from '../src/core/codec.js';
import { generateKeypair } from '../src/core/crypto.js';
import { signAuthorization } from '../src/core/authorization.js';
import { globalMetrics } from '../src/core/metrics.js';
import {
  createDelegate,
  createOpenDelegate,
  createSelfOnlyDelegate,
  delegateCalls,
  OPEN_DELEGATE_IDENTIFIER,
  SELF_ONLY_DELEGATE_IDENTIFIER,
} from '../src/contracts/delegate.js';
import { OPEN_POLICY, SELF_ONLY_POLICY } from '../src/core/gate.js';
import type { Keypair } from '../src/core/types.js';

function bindTo(chain: Chain, identity: Keypair, implementation: string): void {
  chain.attach(signAuthorization(identity, {
    chainId: chain.config.chainId,
    implementation,
    nonce: chain.getNonce(identity.address),
  }));
}

describe('Delegate implementations', () => {
  describe('construction', () => {
    it('tags each variant', () => {
      expect(createOpenDelegate().identifier).toBe(OPEN_DELEGATE_IDENTIFIER);
      expect(createSelfOnlyDelegate().identifier).toBe(SELF_ONLY_DELEGATE_IDENTIFIER);
      expect(OPEN_DELEGATE_IDENTIFIER).toBe('delegate.open.v1');
      expect(SELF_ONLY_DELEGATE_IDENTIFIER).toBe('delegate.self-only.v1');
    });

    it('fixes the policy at build time', () => {
      expect(createDelegate(OPEN_POLICY).policy).toEqual({ type: 'open' });
      expect(createDelegate(SELF_ONLY_POLICY).policy).toEqual({ type: 'self-only' });
    });

    it('gives identical logic identical code and the variants different code', () => {
      expect(createOpenDelegate().code).toEqual(createOpenDelegate().code);
      expect(createOpenDelegate().code).not.toEqual(createSelfOnlyDelegate().code);
    });

    it('exposes execute as payable and identifier as a view', () => {
      const { methods } = createSelfOnlyDelegate();
      expect(methods.get('execute')).toMatchObject({ payable: true, view: false });
      expect(methods.get('identifier')).toMatchObject({ payable: false, view: true });
    });
  });

  describe('entry point', () => {
    let chain: Chain;
    let alice: Keypair;
    let bob: Keypair;
    let openDelegate: string;
    let selfOnlyDelegate: string;

    beforeEach(() => {
      globalMetrics.reset();
      chain = new Chain();
      const deployer = generateKeypair();
      alice = generateKeypair('alice');
      bob = generateKeypair('bob');
      openDelegate = chain.deploy(deployer.address, createOpenDelegate());
      selfOnlyDelegate = chain.deploy(deployer.address, createSelfOnlyDelegate());
    });

    it('reports its identifier through the bound identity', () => {
      bindTo(chain, alice, selfOnlyDelegate);
      expect(chain.staticCall(bob.address, alice.address, delegateCalls.identifier())).toBe(SELF_ONLY_DELEGATE_IDENTIFIER);
    });

    it('emits Executed with the caller and batch length', async () => {
      bindTo(chain, alice, openDelegate);
      const { receipt } = await chain.sendTransaction({
        from: bob.address,
        to: alice.address,
        payload: delegateCalls.execute([makeCall(generateKeypair().address), makeCall(generateKeypair().address)]),
      });
      expect(receipt.logs).toEqual([
        { address: alice.address, name: 'Executed', fields: { caller: bob.address, calls: '2' }, index: 0 },
      ]);
      expect(globalMetrics.getHistogramValues('batch.size')).toEqual([2]);
    });

    it('credits inbound value before running the batch', async () => {
      bindTo(chain, alice, openDelegate);
      chain.setBalance(alice.address, 6n);
      chain.setBalance(bob.address, 4n);
      const carol = generateKeypair().address;
      const { receipt } = await chain.sendTransaction({
        from: bob.address,
        to: alice.address,
        value: 4n,
        payload: delegateCalls.execute([makeCall(carol, 10n)]),
      });
      expect(receipt.status).toBe('success');
      expect(chain.getBalance(alice.address)).toBe(0n);
      expect(chain.getBalance(bob.address)).toBe(0n);
      expect(chain.getBalance(carol)).toBe(10n);
    });

    it('keeps value a third party sends with an empty batch', async () => {
      bindTo(chain, alice, openDelegate);
      chain.setBalance(alice.address, 3n);
      chain.setBalance(bob.address, 10n);
      const { receipt } = await chain.sendTransaction({
        from: bob.address,
        to: alice.address,
        value: 7n,
        payload: delegateCalls.execute([]),
      });
      expect(receipt.status).toBe('success');
      expect(receipt.logs.map(l => [l.name, l.fields])).toEqual([['Executed', { caller: bob.address, calls: '0' }]]);
      expect(chain.getBalance(alice.address)).toBe(10n);
      expect(chain.getBalance(bob.address)).toBe(3n);
    });

    it('forwards value from the acting identity', async () => {
      bindTo(chain, alice, openDelegate);
      chain.setBalance(alice.address, 50n);
      chain.setBalance(bob.address, 50n);
      const carol = generateKeypair().address;
      await chain.sendTransaction({
        from: bob.address,
        to: alice.address,
        payload: delegateCalls.execute([makeCall(carol, 20n)]),
      });
      expect(chain.getBalance(alice.address)).toBe(30n);
      expect(chain.getBalance(bob.address)).toBe(50n);
      expect(chain.getBalance(carol)).toBe(20n);
    });

    it('still takes plain value transfers from anyone', async () => {
      bindTo(chain, alice, selfOnlyDelegate);
      chain.setBalance(bob.address, 3n);
      const { outcome } = await chain.sendTransaction({ from: bob.address, to: alice.address, value: 3n });
      expect(outcome).toEqual({ ok: true, value: null });
      expect(chain.getBalance(alice.address)).toBe(3n);
    });

    it('denies a third party before looking at the batch', async () => {
      bindTo(chain, alice, selfOnlyDelegate);
      const malformed = encodePayload('execute', { calls: 'not a list' });
      const { receipt } = await chain.sendTransaction({ from: bob.address, to: alice.address, payload: malformed });
      expect(receipt.failure).toEqual({
        code: 'UNAUTHORIZED',
        reason: `caller ${bob.address} may not execute as ${alice.address}`,
      });
      expect(globalMetrics.getCounter('gate.denied', { policy: 'self-only' })).toBe(1);
    });

    it('rejects a malformed batch from the identity itself', async () => {
      bindTo(chain, alice, selfOnlyDelegate);
      const malformed = encodePayload('execute', { calls: 'not a list' });
      const { receipt } = await chain.sendTransaction({ from: alice.address, to: alice.address, payload: malformed });
      expect(receipt.failure?.code).toBe('DISPATCH_FAILURE');
      expect(receipt.failure?.reason).toMatch(/^invalid arguments: /);
    });

    it('admits a self-targeted call under self-only', async () => {
      bindTo(chain, alice, selfOnlyDelegate);
      const inner = delegateCalls.execute([]);
      const { receipt } = await chain.sendTransaction({
        from: alice.address,
        to: alice.address,
        payload: delegateCalls.execute([makeCall(alice.address, 0n, inner)]),
      });
      expect(receipt.status).toBe('success');
      expect(receipt.logs.map(l => l.fields.calls)).toEqual(['0', '1']);
    });

    it('does nothing for an unbound account', async () => {
      const { outcome } = await chain.sendTransaction({
        from: bob.address,
        to: alice.address,
        payload: delegateCalls.execute([]),
      });
      expect(outcome).toEqual({ ok: true, value: null });
    });
  });
});
