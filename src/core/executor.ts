/**
 * Batch Executor: runs an ordered list of calls as the acting identity.
 *
 * Holds no state. Each call is dispatched through the frame, so callees see
 * `frame.self` as their caller and value leaves `frame.self`'s balance. The
 * first failure propagates unchanged; the platform reverts the enclosing
 * frame, taking every earlier call's effects with it.
 */

import type { ExecutionFrame } from './contract.js';
import { createLogger } from './logger.js';
import { globalMetrics } from './metrics.js';
import type { Call } from './types.js';

const logger = createLogger('BatchExecutor');

/**
 * Dispatch `calls` in submission order. The caller is responsible for the
 * authorization check; this function assumes it already passed.
 */
export function executeBatch(frame: ExecutionFrame, calls: readonly Call[]): void {
  const log = logger.child({ actingIdentity: frame.self, caller: frame.caller });
  globalMetrics.histogram('batch.size', calls.length);
  log.debug('Executing batch', { calls: calls.length, inboundValue: frame.value.toString() });

  calls.forEach((call, position) => {
    try {
      frame.call(call.target, call.value, call.payload);
    } catch (err) {
      log.debug('Batch aborted', { position, target: call.target, error: String(err) });
      throw err;
    }
  });

  globalMetrics.counter('batch.executed');
}
