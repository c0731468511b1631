/**
 * Delegate implementations: the logic an identity binds its address to.
 *
 * Both variants share one entry point and one batch executor; they differ
 * only in the gate policy fixed when the implementation is built.
 */

import { decodeCall, encodeCall, encodePayload, encodedCallSchema, type EncodedCall } from '../core/codec.js';
import { defineMethod, encodeLogic, NO_ARGS, type ContractLogic, type ContractMethod } from '../core/contract.js';
import { executeBatch } from '../core/executor.js';
import { enforce, OPEN_POLICY, SELF_ONLY_POLICY, type AuthorizationPolicy } from '../core/gate.js';
import { objectSchema } from '../core/schema.js';
import type { Call } from '../core/types.js';

export const OPEN_DELEGATE_IDENTIFIER = 'delegate.open.v1';
export const SELF_ONLY_DELEGATE_IDENTIFIER = 'delegate.self-only.v1';

const IDENTIFIERS: Record<AuthorizationPolicy['type'], string> = {
  'open': OPEN_DELEGATE_IDENTIFIER,
  'self-only': SELF_ONLY_DELEGATE_IDENTIFIER,
};

export interface DelegateImplementation extends ContractLogic {
  /** Fixed tag distinguishing this variant */
  readonly identifier: string;
  readonly policy: AuthorizationPolicy;
}

interface ExecuteArgs {
  calls: EncodedCall[];
}

export function createDelegate(policy: AuthorizationPolicy): DelegateImplementation {
  const identifier = IDENTIFIERS[policy.type];

  const methods = new Map<string, ContractMethod>([
    ['identifier', defineMethod<Record<string, never>>({
      args: NO_ARGS,
      view: true,
      run: () => identifier,
    })],
    ['execute', defineMethod<ExecuteArgs>({
      args: objectSchema({ calls: { type: 'array', items: encodedCallSchema } }),
      payable: true,
      // Evaluated once, before the batch is even decoded
      guard: frame => enforce(policy, frame.caller, frame.self),
      run(frame, { calls }) {
        executeBatch(frame, calls.map(decodeCall));
        frame.emit('Executed', { caller: frame.caller, calls: String(calls.length) });
        return null;
      },
    })],
  ]);

  return {
    kind: 'delegate',
    identifier,
    policy,
    code: encodeLogic({
      kind: 'delegate',
      identifier,
      policy: policy.type,
      methods: [...methods.keys()],
      receive: true,
    }),
    methods,
    // A bound account still takes plain value transfers from anyone
    receive: () => null,
  };
}

/** Any caller may execute as the bound identity. */
export function createOpenDelegate(): DelegateImplementation {
  return createDelegate(OPEN_POLICY);
}

/** Only the bound identity may execute as itself. */
export function createSelfOnlyDelegate(): DelegateImplementation {
  return createDelegate(SELF_ONLY_POLICY);
}

// ── Payload Builders ──

export const delegateCalls = {
  identifier: (): Uint8Array => encodePayload('identifier'),
  execute: (calls: readonly Call[]): Uint8Array =>
    encodePayload('execute', { calls: calls.map(encodeCall) }),
};
