import type { TupleTypeSignature, TypeSignature, Value } from './model';
import { voidValue } from './model';
import { admits, copyTupleTypeSignature } from './typeSignature';
import { StaleMapError, TypeMismatchError } from './errors';
import { copyValue, valueKey } from './values';

export type Entry = readonly [key: Value, value: Value];

/**
 * Read handle to a typed map. Many may be held at once.
 * Once `createMap` replaces the map, every operation on an older handle
 * throws `StaleMapError`.
 */
export interface ReadonlyDataMap {
  readonly keyType: TupleTypeSignature;
  readonly valueType: TupleTypeSignature;
  /** Stored value for `key`, or the void value when there is no entry. */
  fetchEntry(key: Value): Value;
  /** All entries, ordered by the key's canonical form. */
  entries(): Entry[];
}

/**
 * Read-write handle to a typed map.
 * Every operation validates its arguments before touching the entries.
 */
export interface DataMap extends ReadonlyDataMap {
  setEntry(key: Value, value: Value): void;
  /** Insert only if absent. Returns false and leaves the map alone when the key exists. */
  insertEntry(key: Value, value: Value): boolean;
  deleteEntry(key: Value): boolean;
}

export interface ContractDatabase {
  getDataMap(name: string): ReadonlyDataMap | undefined;
  getMutDataMap(name: string): DataMap | undefined;
  /**
   * Install a new empty map under `name`.
   * An existing map with the same name is replaced, entries included.
   */
  createMap(name: string, keyType: TupleTypeSignature, valueType: TupleTypeSignature): void;
  mapNames(): string[];
}

export function checkKey(keyType: TypeSignature, key: Value): void {
  if (!admits(keyType, key)) {
    throw new TypeMismatchError(keyType, key, 'key');
  }
}

export function checkEntry(keyType: TypeSignature, valueType: TypeSignature, key: Value, value: Value): void {
  checkKey(keyType, key);
  if (!admits(valueType, value)) {
    throw new TypeMismatchError(valueType, value, 'value');
  }
}

/**
 * Expose only the read operations of a map.
 */
export function readonlyView(map: ReadonlyDataMap): ReadonlyDataMap {
  return {
    keyType: map.keyType,
    valueType: map.valueType,
    fetchEntry: key => map.fetchEntry(key),
    entries: () => map.entries(),
  };
}

/**
 * Entries are copied on the way in and on the way out, and the schemas are
 * frozen copies, so no object the caller holds can reach stored state.
 */
export class MemoryDataMap implements DataMap {
  readonly keyType: TupleTypeSignature;
  readonly valueType: TupleTypeSignature;
  private readonly _entries = new Map<string, Entry>();

  constructor(keyType: TupleTypeSignature, valueType: TupleTypeSignature) {
    this.keyType = copyTupleTypeSignature(keyType);
    this.valueType = copyTupleTypeSignature(valueType);
  }

  fetchEntry(key: Value): Value {
    checkKey(this.keyType, key);
    const entry = this._entries.get(valueKey(key));
    return entry ? copyValue(entry[1]) : voidValue;
  }

  setEntry(key: Value, value: Value): void {
    const entry = this._copyEntry(key, value);
    this._entries.set(valueKey(entry[0]), entry);
  }

  insertEntry(key: Value, value: Value): boolean {
    const entry = this._copyEntry(key, value);
    const hash = valueKey(entry[0]);
    if (this._entries.has(hash)) {
      return false;
    }
    this._entries.set(hash, entry);
    return true;
  }

  deleteEntry(key: Value): boolean {
    checkKey(this.keyType, key);
    return this._entries.delete(valueKey(key));
  }

  entries(): Entry[] {
    return [...this._entries]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, [key, value]]): Entry => [copyValue(key), copyValue(value)]);
  }

  // Validates the copies, since those are what gets stored.
  private _copyEntry(key: Value, value: Value): Entry {
    const entry: Entry = [copyValue(key), copyValue(value)];
    checkEntry(this.keyType, this.valueType, entry[0], entry[1]);
    return entry;
  }
}

export class MemoryContractDatabase implements ContractDatabase {
  private readonly _maps = new Map<string, MemoryDataMap>();

  getDataMap(name: string): ReadonlyDataMap | undefined {
    const handle = this.getMutDataMap(name);
    return handle ? readonlyView(handle) : undefined;
  }

  getMutDataMap(name: string): DataMap | undefined {
    const map = this._maps.get(name);
    return map ? this._handle(name, map) : undefined;
  }

  createMap(name: string, keyType: TupleTypeSignature, valueType: TupleTypeSignature): void {
    this._maps.set(name, new MemoryDataMap(keyType, valueType));
  }

  mapNames(): string[] {
    return [...this._maps.keys()].sort();
  }

  /**
   * Handle bound to one map instance. It refuses to work once `createMap`
   * has put another instance under the same name.
   */
  private _handle(name: string, map: MemoryDataMap): DataMap {
    const current = (): MemoryDataMap => {
      if (this._maps.get(name) !== map) {
        throw new StaleMapError(name);
      }
      return map;
    };
    return {
      keyType: map.keyType,
      valueType: map.valueType,
      fetchEntry: key => current().fetchEntry(key),
      entries: () => current().entries(),
      setEntry: (key, value) => current().setEntry(key, value),
      insertEntry: (key, value) => current().insertEntry(key, value),
      deleteEntry: key => current().deleteEntry(key),
    };
  }
}
