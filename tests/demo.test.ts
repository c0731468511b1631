import { describe, it, expect } from 'vitest';
import { runScenario } from '../src/demo/scenario.js';

describe('Demo scenario', () => {
  it('shows the open binding drained and the self-only binding holding', async () => {
    const lines: string[] = [];
    const summary = await runScenario(line => lines.push(line));

    expect(summary.open).toEqual({ victimBefore: 1000n, victimAfter: 0n, attackerAfter: 1000n });
    expect(summary.selfOnly.attackerFailure?.code).toBe('UNAUTHORIZED');
    expect(summary.selfOnly.victimAfter).toBe(1000n);
    expect(summary.ownBatch).toEqual({ status: 'success', balanceX: 900n, balanceY: 100n });
    expect(lines).toContain('  Alice: 900 X / 100 Y');
  });
});
