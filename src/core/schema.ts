/**
 * Shared JSON Schema validator and the schemas reused across payloads.
 */

import AjvModule from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';

// ajv ships CommonJS; under NodeNext the class sits on `default`
const Ajv = AjvModule.default;

export const ajv = new Ajv({ strict: false });

/** 32 bytes in unpadded base64url */
export const ADDRESS_PATTERN = '^[A-Za-z0-9_-]{43}$';
export const AMOUNT_PATTERN = '^(0|[1-9][0-9]*)$';
export const BASE64URL_PATTERN = '^[A-Za-z0-9_-]*$';

export const addressSchema: SchemaObject = { type: 'string', pattern: ADDRESS_PATTERN };
export const amountSchema: SchemaObject = { type: 'string', pattern: AMOUNT_PATTERN };

/** Build a closed object schema where every listed property is required. */
export function objectSchema(properties: Record<string, SchemaObject>): SchemaObject {
  return {
    type: 'object',
    properties,
    required: Object.keys(properties),
    additionalProperties: false,
  };
}

export function errorsText(validate: ValidateFunction): string {
  return ajv.errorsText(validate.errors);
}
