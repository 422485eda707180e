import type { Value } from './model';
import { bufferValue, tupleValue } from './model';

/**
 * Canonical string form of a value.
 * Two values are equal iff their keys are equal, so this doubles as the
 * hash used to index map entries. Tuple fields are ordered by name.
 */
export function valueKey(value: Value): string {
  switch (value.type) {
    case 'void':
      return 'v';
    case 'bool':
      return value.value ? 'b1' : 'b0';
    case 'int':
      return `i${value.value}`;
    case 'principal':
      return `p${JSON.stringify(value.value)}`;
    case 'buffer':
      return `x${toHex(value.value)}`;
    case 'tuple': {
      const parts = Object.keys(value.fields)
        .sort()
        .map(name => `${JSON.stringify(name)}:${valueKey(value.fields[name])}`);
      return `t{${parts.join(',')}}`;
    }
  }
}

/**
 * Deep copy of a value. Buffers get fresh bytes and tuples frozen field records,
 * so the copy shares nothing mutable with the original.
 */
export function copyValue(value: Value): Value {
  switch (value.type) {
    case 'void':
      return value;
    case 'bool':
    case 'int':
    case 'principal':
      return Object.freeze({ ...value });
    case 'buffer':
      return bufferValue(value.value);
    case 'tuple': {
      const fields: Record<string, Value> = {};
      for (const [name, field] of Object.entries(value.fields)) {
        fields[name] = copyValue(field);
      }
      return tupleValue(fields);
    }
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  return valueKey(a) === valueKey(b);
}

/**
 * Human-readable rendering, used in error messages and CLI output.
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'void':
      return 'void';
    case 'bool':
      return String(value.value);
    case 'int':
      return value.value.toString();
    case 'principal':
      return `'${value.value}`;
    case 'buffer':
      return `0x${toHex(value.value)}`;
    case 'tuple': {
      const fields = Object.entries(value.fields).map(([name, field]) => ` (${name} ${formatValue(field)})`);
      return `(tuple${fields.join('')})`;
    }
  }
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`Invalid hex string: ${JSON.stringify(hex)}`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
