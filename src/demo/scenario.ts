#!/usr/bin/env npx tsx
// Delegated execution walkthrough: an open binding drained, a self-only binding holding
// Usage: npx tsx src/demo/scenario.ts

import { pathToFileURL } from 'node:url';
import { Chain } from '../core/chain.js';
import { makeCall } from '../core/codec.js';
import { generateKeypair } from '../core/crypto.js';
import { signAuthorization } from '../core/authorization.js';
import { createOpenDelegate, createSelfOnlyDelegate, delegateCalls } from '../contracts/delegate.js';
import { createExchange, exchangeCalls } from '../contracts/exchange.js';
import { createLedger, ledgerCalls, readBalance } from '../contracts/ledger.js';
import type { Address, ExecutionFailure, Keypair, TransactionReceipt } from '../core/types.js';

export interface ScenarioSummary {
  open: { victimBefore: bigint; victimAfter: bigint; attackerAfter: bigint };
  selfOnly: { attackerFailure: ExecutionFailure | null; victimAfter: bigint };
  ownBatch: { status: TransactionReceipt['status']; balanceX: bigint; balanceY: bigint };
}

export type Print = (line: string) => void;

const STARTING_X = 1000n;
const LIQUIDITY_Y = 1000n;
const SWAP_AMOUNT = 100n;

// ═══════════════════════════════════════════
// Utility
// ═══════════════════════════════════════════

function banner(print: Print, title: string): void {
  print('\n' + '═'.repeat(60));
  print(`  ${title}`);
  print('═'.repeat(60));
}

function section(print: Print, title: string): void {
  print(`\n── ${title} ${'─'.repeat(Math.max(0, 50 - title.length))}`);
}

function short(address: Address): string {
  return `${address.slice(0, 10)}...`;
}

async function expectSuccess(chain: Chain, from: Address, to: Address, payload: Uint8Array): Promise<void> {
  const { outcome } = await chain.sendTransaction({ from, to, payload });
  if (!outcome.ok) throw outcome.error;
}

function bind(chain: Chain, identity: Keypair, implementation: Address): void {
  chain.attach(signAuthorization(identity, {
    chainId: chain.config.chainId,
    implementation,
    nonce: chain.getNonce(identity.address),
  }));
}

// ═══════════════════════════════════════════
// Scenario
// ═══════════════════════════════════════════

export async function runScenario(print: Print = console.log): Promise<ScenarioSummary> {
  banner(print, 'Delegated Execution — Open vs Self-Only');

  const chain = new Chain();
  const deployer = generateKeypair('Deployer');
  const victim = generateKeypair('Alice');
  const attacker = generateKeypair('Mallory');

  section(print, 'Deploying Collaborators');
  const tokenX = chain.deploy(deployer.address, createLedger({ name: 'Token X', symbol: 'X', initialSupply: 1_000_000n }));
  const tokenY = chain.deploy(deployer.address, createLedger({ name: 'Token Y', symbol: 'Y', initialSupply: 1_000_000n }));
  const exchange = chain.deploy(deployer.address, createExchange());
  const openDelegate = chain.deploy(deployer.address, createOpenDelegate());
  const selfOnlyDelegate = chain.deploy(deployer.address, createSelfOnlyDelegate());
  print(`  Token X:           ${short(tokenX)}`);
  print(`  Token Y:           ${short(tokenY)}`);
  print(`  Exchange:          ${short(exchange)}`);
  print(`  Open delegate:     ${short(openDelegate)}`);
  print(`  Self-only delegate: ${short(selfOnlyDelegate)}`);

  await expectSuccess(chain, deployer.address, exchange, exchangeCalls.createPair(tokenX, tokenY));
  await expectSuccess(chain, deployer.address, tokenY, ledgerCalls.approve(exchange, LIQUIDITY_Y));
  await expectSuccess(chain, deployer.address, exchange, exchangeCalls.depositLiquidity(tokenY, LIQUIDITY_Y));
  await expectSuccess(chain, deployer.address, tokenX, ledgerCalls.transfer(victim.address, STARTING_X));

  // ═══════════════════════════════════════════
  // Part 1: Open binding
  // ═══════════════════════════════════════════

  banner(print, 'Part 1: Open Binding');
  bind(chain, victim, openDelegate);
  const victimBefore = readBalance(chain, tokenX, victim.address);
  print(`  Alice bound to the open delegate, holding ${victimBefore} X`);

  section(print, 'Mallory submits a batch as Alice');
  const drain = delegateCalls.execute([
    makeCall(tokenX, 0n, ledgerCalls.transfer(attacker.address, victimBefore)),
  ]);
  const drainResult = await chain.sendTransaction({ from: attacker.address, to: victim.address, payload: drain });
  const open = {
    victimBefore,
    victimAfter: readBalance(chain, tokenX, victim.address),
    attackerAfter: readBalance(chain, tokenX, attacker.address),
  };
  print(`  Status: ${drainResult.receipt.status}`);
  print(`  Alice: ${open.victimAfter} X   Mallory: ${open.attackerAfter} X`);

  // ═══════════════════════════════════════════
  // Part 2: Self-only binding
  // ═══════════════════════════════════════════

  banner(print, 'Part 2: Self-Only Binding');
  bind(chain, victim, selfOnlyDelegate);
  await expectSuccess(chain, deployer.address, tokenX, ledgerCalls.transfer(victim.address, STARTING_X));
  print(`  Alice rebound to the self-only delegate and refunded ${STARTING_X} X`);

  section(print, 'Mallory replays the same batch');
  const denied = await chain.sendTransaction({ from: attacker.address, to: victim.address, payload: drain });
  const selfOnly = {
    attackerFailure: denied.receipt.failure,
    victimAfter: readBalance(chain, tokenX, victim.address),
  };
  print(`  Status: ${denied.receipt.status} (${selfOnly.attackerFailure?.code ?? 'no failure'})`);
  print(`  Alice still holds ${selfOnly.victimAfter} X`);

  section(print, 'Alice approves and swaps in one batch');
  const own = await chain.sendTransaction({
    from: victim.address,
    to: victim.address,
    payload: delegateCalls.execute([
      makeCall(tokenX, 0n, ledgerCalls.approve(exchange, SWAP_AMOUNT)),
      makeCall(exchange, 0n, exchangeCalls.swap(tokenX, tokenY, SWAP_AMOUNT, SWAP_AMOUNT)),
    ]),
  });
  const ownBatch = {
    status: own.receipt.status,
    balanceX: readBalance(chain, tokenX, victim.address),
    balanceY: readBalance(chain, tokenY, victim.address),
  };
  print(`  Status: ${ownBatch.status}`);
  print(`  Alice: ${ownBatch.balanceX} X / ${ownBatch.balanceY} Y`);

  banner(print, 'Walkthrough Complete');
  return { open, selfOnly, ownBatch };
}

async function main(): Promise<void> {
  await runScenario();
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(err => {
    console.error('Demo failed:', err);
    process.exitCode = 1;
  });
}
