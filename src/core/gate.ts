/**
 * Authorization Gate: who may trigger execution as a delegated identity.
 *
 * The policy is a tagged value chosen when an implementation is built;
 * the decision is a pure function of it and the two identities.
 */

import { UnauthorizedError } from './errors.js';
import { createLogger } from './logger.js';
import { globalMetrics } from './metrics.js';
import type { Address } from './types.js';

export type AuthorizationPolicy =
  | { type: 'open' }
  | { type: 'self-only' };

/** Any caller may act as the identity. Insecure; kept as the baseline. */
export const OPEN_POLICY: AuthorizationPolicy = { type: 'open' };

/** Only the identity itself may trigger execution. */
export const SELF_ONLY_POLICY: AuthorizationPolicy = { type: 'self-only' };

const logger = createLogger('Gate');

export function authorize(policy: AuthorizationPolicy, caller: Address, actingIdentity: Address): boolean {
  switch (policy.type) {
    case 'open':
      return true;
    case 'self-only':
      return caller === actingIdentity;
  }
}

/** Throw `UnauthorizedError` unless `authorize` allows the caller. */
export function enforce(policy: AuthorizationPolicy, caller: Address, actingIdentity: Address): void {
  if (authorize(policy, caller, actingIdentity)) return;
  globalMetrics.counter('gate.denied', { policy: policy.type });
  logger.warn('Execution denied', { policy: policy.type, caller, actingIdentity });
  throw new UnauthorizedError(`caller ${caller} may not execute as ${actingIdentity}`);
}
