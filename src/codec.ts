import type { TupleTypeSignature, TypeSignature, Value } from './model';
import { voidValue } from './model';
import { fromHex, toHex } from './values';

/**
 * JSON encoding of values, as it appears in snapshot files, SQL rows and
 * CLI arguments.
 */
export type JsonValue =
  | null
  | boolean
  | { int: string }
  | { principal: string }
  | { buffer: string }
  | { tuple: { [name: string]: JsonValue } };

export type JsonTypeSignature =
  | 'bool'
  | 'int'
  | 'principal'
  | { buffer: number }
  | { tuple: { [name: string]: JsonTypeSignature } };

export function encodeValue(value: Value): JsonValue {
  switch (value.type) {
    case 'void':
      return null;
    case 'bool':
      return value.value;
    case 'int':
      return { int: value.value.toString() };
    case 'principal':
      return { principal: value.value };
    case 'buffer':
      return { buffer: toHex(value.value) };
    case 'tuple': {
      const tuple: { [name: string]: JsonValue } = {};
      for (const [name, field] of Object.entries(value.fields)) {
        tuple[name] = encodeValue(field);
      }
      return { tuple };
    }
  }
}

export function decodeValue(json: JsonValue): Value {
  if (json === null) {
    return voidValue;
  }
  if (typeof json === 'boolean') {
    return { type: 'bool', value: json };
  }
  if ('int' in json) {
    return { type: 'int', value: BigInt(json.int) };
  }
  if ('principal' in json) {
    return { type: 'principal', value: json.principal };
  }
  if ('buffer' in json) {
    return { type: 'buffer', value: fromHex(json.buffer) };
  }
  const fields: Record<string, Value> = {};
  for (const [name, field] of Object.entries(json.tuple)) {
    fields[name] = decodeValue(field);
  }
  return { type: 'tuple', fields };
}

export function encodeTypeSignature(signature: TypeSignature): JsonTypeSignature {
  switch (signature.kind) {
    case 'bool':
    case 'int':
    case 'principal':
      return signature.kind;
    case 'buffer':
      return { buffer: signature.maxLength };
    case 'tuple': {
      const tuple: { [name: string]: JsonTypeSignature } = {};
      for (const [name, field] of Object.entries(signature.fields)) {
        tuple[name] = encodeTypeSignature(field);
      }
      return { tuple };
    }
  }
}

export function decodeTypeSignature(json: JsonTypeSignature): TypeSignature {
  if (typeof json === 'string') {
    return { kind: json };
  }
  if ('buffer' in json) {
    return { kind: 'buffer', maxLength: json.buffer };
  }
  const fields: Record<string, TypeSignature> = {};
  for (const [name, field] of Object.entries(json.tuple)) {
    fields[name] = decodeTypeSignature(field);
  }
  return { kind: 'tuple', fields };
}

export function decodeTupleTypeSignature(json: JsonTypeSignature): TupleTypeSignature {
  const signature = decodeTypeSignature(json);
  if (signature.kind !== 'tuple') {
    throw new Error(`Expected a tuple type, got ${JSON.stringify(json)}`);
  }
  return signature;
}
