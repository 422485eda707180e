/**
 * Core value and type model for contract storage.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Value Types ===

export type Value =
  | VoidValue
  | BoolValue
  | IntValue
  | PrincipalValue
  | BufferValue
  | TupleValue;

export interface VoidValue {
  readonly type: 'void';
}

export interface BoolValue {
  readonly type: 'bool';
  readonly value: boolean;
}

export interface IntValue {
  readonly type: 'int';
  readonly value: bigint;
}

export interface PrincipalValue {
  readonly type: 'principal';
  readonly value: string;
}

export interface BufferValue {
  readonly type: 'buffer';
  readonly value: Uint8Array;
}

export interface TupleValue {
  readonly type: 'tuple';
  readonly fields: Readonly<Record<string, Value>>;
}

// === Type Signatures ===

export type TypeSignature =
  | { readonly kind: 'bool' }
  | { readonly kind: 'int' }
  | { readonly kind: 'principal' }
  | BufferTypeSignature
  | TupleTypeSignature;

export interface BufferTypeSignature {
  readonly kind: 'buffer';
  readonly maxLength: number;
}

export interface TupleTypeSignature {
  readonly kind: 'tuple';
  readonly fields: Readonly<Record<string, TypeSignature>>;
}

// === Helpers ===

export const voidValue: VoidValue = Object.freeze({ type: 'void' });

export function boolValue(value: boolean): BoolValue {
  return { type: 'bool', value };
}

export function intValue(value: bigint | number): IntValue {
  return { type: 'int', value: BigInt(value) };
}

export function principalValue(value: string): PrincipalValue {
  return { type: 'principal', value };
}

/** Copies `value`; later writes to the caller's array are not seen. */
export function bufferValue(value: Uint8Array): BufferValue {
  return { type: 'buffer', value: new Uint8Array(value) };
}

export function tupleValue(fields: Record<string, Value>): TupleValue {
  return Object.freeze({ type: 'tuple', fields: Object.freeze({ ...fields }) });
}

export const boolType: TypeSignature = { kind: 'bool' };
export const intType: TypeSignature = { kind: 'int' };
export const principalType: TypeSignature = { kind: 'principal' };

export function bufferType(maxLength: number): BufferTypeSignature {
  return { kind: 'buffer', maxLength };
}

export function tupleType(fields: Record<string, TypeSignature>): TupleTypeSignature {
  return Object.freeze({ kind: 'tuple', fields: Object.freeze({ ...fields }) });
}

export function isVoid(value: Value): value is VoidValue {
  return value.type === 'void';
}
