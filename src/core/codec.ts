/**
 * Payload codec.
 *
 * A payload is UTF-8 canonical JSON of `{ method, args }`. Amounts travel as
 * decimal strings, call payloads nested in a batch as base64url. An empty
 * payload is a plain value transfer.
 */

import { canonicalize, fromBase64url, toBase64url } from './crypto.js';
import { DispatchFailureError, InvalidArgumentError } from './errors.js';
import { ajv, AMOUNT_PATTERN, BASE64URL_PATTERN, addressSchema, amountSchema, errorsText, objectSchema } from './schema.js';
import type { Address, Call, JsonValue } from './types.js';

// ── Envelope ──

export interface PayloadEnvelope {
  method: string;
  args: Record<string, unknown>;
}

const validateEnvelope = ajv.compile<PayloadEnvelope>({
  type: 'object',
  properties: {
    method: { type: 'string', minLength: 1 },
    args: { type: 'object' },
  },
  required: ['method', 'args'],
  additionalProperties: false,
});

export const EMPTY_PAYLOAD = new Uint8Array(0);

export function encodePayload(method: string, args: Record<string, JsonValue> = {}): Uint8Array {
  return new TextEncoder().encode(canonicalize({ method, args }));
}

export function decodePayload(payload: Uint8Array): PayloadEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(payload));
  } catch {
    throw new DispatchFailureError('malformed payload: not UTF-8 JSON');
  }
  if (!validateEnvelope(parsed)) {
    throw new DispatchFailureError(`malformed payload: ${errorsText(validateEnvelope)}`);
  }
  return parsed;
}

// ── JSON ──

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function parseJsonValue(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonValue(parsed)) throw new SyntaxError('not a JSON value');
  return parsed;
}

// ── Amounts ──

const AMOUNT_RE = new RegExp(AMOUNT_PATTERN);

export function formatAmount(amount: bigint): string {
  if (amount < 0n) throw new InvalidArgumentError(`negative amount: ${amount}`);
  return amount.toString();
}

/** Parse a decimal amount returned by another contract. */
export function parseAmount(value: unknown): bigint {
  if (typeof value !== 'string' || !AMOUNT_RE.test(value)) {
    throw new DispatchFailureError(`expected a decimal amount, got ${JSON.stringify(value)}`);
  }
  return BigInt(value);
}

// ── Calls ──

/** Wire form of a `Call` inside an `execute` payload */
export type EncodedCall = {
  target: string;
  value: string;
  payload: string;
};

export const encodedCallSchema = objectSchema({
  target: addressSchema,
  value: amountSchema,
  payload: { type: 'string', pattern: BASE64URL_PATTERN },
});

/** Build an immutable Call. The payload bytes are copied. */
export function makeCall(target: Address, value: bigint = 0n, payload: Uint8Array = EMPTY_PAYLOAD): Call {
  if (value < 0n) throw new InvalidArgumentError(`call value must be non-negative, got ${value}`);
  return Object.freeze({ target, value, payload: payload.slice() });
}

export function encodeCall(call: Call): EncodedCall {
  return {
    target: call.target,
    value: formatAmount(call.value),
    payload: toBase64url(call.payload),
  };
}

export function decodeCall(encoded: EncodedCall): Call {
  let payload: Uint8Array;
  try {
    payload = fromBase64url(encoded.payload);
  } catch {
    throw new DispatchFailureError(`malformed call payload for target ${encoded.target}`);
  }
  return makeCall(encoded.target, BigInt(encoded.value), payload);
}
