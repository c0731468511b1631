/**
 * Contract logic: what an account's code is, and the frame it runs in.
 */

import type { SchemaObject } from 'ajv';
import { canonicalize } from './crypto.js';
import { DispatchFailureError } from './errors.js';
import { ajv, errorsText } from './schema.js';
import type { Address, JsonValue } from './types.js';

// ── Frame ──

/**
 * Everything a method sees while it runs. Caller and acting identity are
 * explicit; nothing is read from ambient state.
 */
export interface ExecutionFrame {
  /** Immediate caller of this frame */
  readonly caller: Address;
  /** Acting identity: owner of the storage, balance and authority in use */
  readonly self: Address;
  /** Account whose code supplies the logic; differs from `self` under delegation */
  readonly codeAddress: Address;
  /** Value moved from `caller` to `self` on entry */
  readonly value: bigint;
  readonly depth: number;
  readonly isStatic: boolean;
  readonly chainId: number;

  load(key: string): string | undefined;
  /** `undefined` deletes the key */
  store(key: string, value: string | undefined): void;
  /** Dispatch a nested call with `self` as the caller. */
  call(target: Address, value: bigint, payload: Uint8Array): JsonValue;
  emit(name: string, fields: Record<string, string>): void;
  balanceOf(address: Address): bigint;
  /** Size of the code `address` executes; 0 for a plain account */
  codeSize(address: Address): number;
}

// ── Methods ──

export interface ContractMethod {
  readonly view: boolean;
  readonly payable: boolean;
  invoke(frame: ExecutionFrame, args: unknown): JsonValue;
}

export interface MethodSpec<A> {
  /** JSON Schema the decoded `args` must satisfy */
  args: SchemaObject;
  view?: boolean;
  payable?: boolean;
  /** Runs before the arguments are looked at */
  guard?(frame: ExecutionFrame): void;
  run(frame: ExecutionFrame, args: A): JsonValue;
}

export const NO_ARGS: SchemaObject = { type: 'object', additionalProperties: false };

/** Compile a method's argument schema once and guard every invocation with it. */
export function defineMethod<A>(spec: MethodSpec<A>): ContractMethod {
  const validate = ajv.compile<A>(spec.args);
  return {
    view: spec.view ?? false,
    payable: spec.payable ?? false,
    invoke(frame, args) {
      spec.guard?.(frame);
      if (!validate(args)) {
        throw new DispatchFailureError(`invalid arguments: ${errorsText(validate)}`);
      }
      return spec.run(frame, args);
    },
  };
}

// ── Logic ──

export interface ContractLogic {
  readonly kind: string;
  /** Code representation: identical bytes mean identical logic */
  readonly code: Uint8Array;
  readonly methods: ReadonlyMap<string, ContractMethod>;
  /** Runs once, at deployment, with the deployer as caller */
  initialize?(frame: ExecutionFrame): void;
  /** Handles empty payloads; without it plain value transfers are rejected */
  receive?(frame: ExecutionFrame): JsonValue;
}

/** Serialize a logic descriptor into its code bytes. */
export function encodeLogic(descriptor: JsonValue): Uint8Array {
  return new TextEncoder().encode(canonicalize(descriptor));
}
