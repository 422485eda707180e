import type { TupleTypeSignature, TypeSignature, Value } from './model';
import { bufferType, tupleType } from './model';

const INT_MIN = -(2n ** 127n);
const INT_MAX = 2n ** 127n - 1n;

/**
 * Decide whether a value conforms to a type signature.
 * The void value is admitted by no signature.
 */
export function admits(signature: TypeSignature, value: Value): boolean {
  switch (signature.kind) {
    case 'bool':
      return value.type === 'bool';
    case 'int':
      return value.type === 'int' && value.value >= INT_MIN && value.value <= INT_MAX;
    case 'principal':
      return value.type === 'principal';
    case 'buffer':
      return value.type === 'buffer' && value.value.length <= signature.maxLength;
    case 'tuple': {
      if (value.type !== 'tuple') {
        return false;
      }
      const expected = Object.keys(signature.fields);
      const actual = Object.keys(value.fields);
      if (expected.length !== actual.length) {
        return false;
      }
      return expected.every(name =>
        Object.prototype.hasOwnProperty.call(value.fields, name)
        && admits(signature.fields[name], value.fields[name])
      );
    }
  }
}

export function describeType(signature: TypeSignature): string {
  switch (signature.kind) {
    case 'bool':
    case 'int':
    case 'principal':
      return signature.kind;
    case 'buffer':
      return `(buffer ${signature.maxLength})`;
    case 'tuple': {
      const fields = Object.entries(signature.fields).map(([name, type]) => ` (${name} ${describeType(type)})`);
      return `(tuple${fields.join('')})`;
    }
  }
}

/**
 * Frozen deep copy of a signature.
 */
export function copyTypeSignature(signature: TypeSignature): TypeSignature {
  switch (signature.kind) {
    case 'bool':
    case 'int':
    case 'principal':
      return Object.freeze({ kind: signature.kind });
    case 'buffer':
      return Object.freeze(bufferType(signature.maxLength));
    case 'tuple':
      return copyTupleTypeSignature(signature);
  }
}

export function copyTupleTypeSignature(signature: TupleTypeSignature): TupleTypeSignature {
  const fields: Record<string, TypeSignature> = {};
  for (const [name, field] of Object.entries(signature.fields)) {
    fields[name] = copyTypeSignature(field);
  }
  return tupleType(fields);
}
