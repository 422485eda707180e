import type { TypeSignature, Value } from './model';
import { describeType } from './typeSignature';
import { formatValue } from './values';

export type EntrySide = 'key' | 'value';

/**
 * A key or value was not admitted by the map's schema.
 * Thrown before any mutation takes place.
 */
export class TypeMismatchError extends Error {
  constructor(
    readonly expected: TypeSignature,
    readonly actual: Value,
    readonly side: EntrySide
  ) {
    super(`Type mismatch on ${side}: expected ${describeType(expected)}, got ${formatValue(actual)}`);
    this.name = 'TypeMismatchError';
  }
}

/**
 * A handle was used after `createMap` replaced its map.
 * The handle stays unusable; fetch a new one.
 */
export class StaleMapError extends Error {
  constructor(readonly mapName: string) {
    super(`Map "${mapName}" was recreated after this handle was obtained`);
    this.name = 'StaleMapError';
  }
}
