import { describe, test, expect } from 'vitest';
import { admits, copyTupleTypeSignature, describeType } from './typeSignature';
import {
  boolType,
  boolValue,
  bufferType,
  bufferValue,
  intType,
  intValue,
  principalType,
  principalValue,
  tupleType,
  tupleValue,
  voidValue,
} from './model';
import type { TupleTypeSignature, TypeSignature } from './model';

describe('admits', () => {
  test('matches scalar kinds', () => {
    expect(admits(boolType, boolValue(true))).toBe(true);
    expect(admits(intType, intValue(-3))).toBe(true);
    expect(admits(principalType, principalValue('SP1'))).toBe(true);
    expect(admits(intType, boolValue(false))).toBe(false);
    expect(admits(principalType, intValue(1))).toBe(false);
  });

  test('void is admitted by nothing', () => {
    expect(admits(boolType, voidValue)).toBe(false);
    expect(admits(tupleType({}), voidValue)).toBe(false);
  });

  test('int must fit in 128 signed bits', () => {
    expect(admits(intType, intValue(2n ** 127n - 1n))).toBe(true);
    expect(admits(intType, intValue(-(2n ** 127n)))).toBe(true);
    expect(admits(intType, intValue(2n ** 127n))).toBe(false);
    expect(admits(intType, intValue(-(2n ** 127n) - 1n))).toBe(false);
  });

  test('buffer length is bounded', () => {
    expect(admits(bufferType(2), bufferValue(new Uint8Array([1, 2])))).toBe(true);
    expect(admits(bufferType(2), bufferValue(new Uint8Array([1, 2, 3])))).toBe(false);
  });

  test('tuple requires exactly the declared fields', () => {
    const type = tupleType({ owner: principalType, amount: intType });

    expect(admits(type, tupleValue({ amount: intValue(1), owner: principalValue('A') }))).toBe(true);
    expect(admits(type, tupleValue({ owner: principalValue('A') }))).toBe(false);
    expect(admits(type, tupleValue({ owner: principalValue('A'), amount: intValue(1), extra: boolValue(true) }))).toBe(false);
    expect(admits(type, tupleValue({ owner: principalValue('A'), total: intValue(1) }))).toBe(false);
    expect(admits(type, tupleValue({ owner: principalValue('A'), amount: boolValue(true) }))).toBe(false);
  });

  test('nested tuples are checked recursively', () => {
    const type = tupleType({ inner: tupleType({ flag: boolType }) });

    expect(admits(type, tupleValue({ inner: tupleValue({ flag: boolValue(true) }) }))).toBe(true);
    expect(admits(type, tupleValue({ inner: tupleValue({ flag: intValue(1) }) }))).toBe(false);
  });
});

describe('describeType', () => {
  test('renders nested signatures', () => {
    const type = tupleType({ owner: principalType, data: bufferType(32), meta: tupleType({ active: boolType }) });

    expect(describeType(type)).toBe('(tuple (owner principal) (data (buffer 32)) (meta (tuple (active bool))))');
  });
});

describe('copyTupleTypeSignature', () => {
  test('returns a frozen copy detached from the original fields', () => {
    const fields: Record<string, TypeSignature> = { size: { kind: 'buffer', maxLength: 4 } };
    const original: TupleTypeSignature = { kind: 'tuple', fields };
    const copy = copyTupleTypeSignature(original);

    fields.extra = { kind: 'int' };

    expect(describeType(copy)).toBe('(tuple (size (buffer 4)))');
    expect(Object.isFrozen(copy.fields.size)).toBe(true);
  });
});
