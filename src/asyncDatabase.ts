import type { TupleTypeSignature, Value } from './model';
import type { ContractDatabase, DataMap, Entry, ReadonlyDataMap } from './database';

/**
 * Promise-returning counterparts of the storage interfaces.
 * Backends whose drivers are asynchronous (SQL) implement these directly;
 * synchronous backends are lifted with `toAsyncDatabase`.
 */
export interface AsyncReadonlyDataMap {
  readonly keyType: TupleTypeSignature;
  readonly valueType: TupleTypeSignature;
  fetchEntry(key: Value): Promise<Value>;
  entries(): Promise<Entry[]>;
}

export interface AsyncDataMap extends AsyncReadonlyDataMap {
  setEntry(key: Value, value: Value): Promise<void>;
  insertEntry(key: Value, value: Value): Promise<boolean>;
  deleteEntry(key: Value): Promise<boolean>;
}

export interface AsyncContractDatabase {
  getDataMap(name: string): Promise<AsyncReadonlyDataMap | undefined>;
  getMutDataMap(name: string): Promise<AsyncDataMap | undefined>;
  createMap(name: string, keyType: TupleTypeSignature, valueType: TupleTypeSignature): Promise<void>;
  mapNames(): Promise<string[]>;
  close(): Promise<void>;
}

function liftReadonly(map: ReadonlyDataMap): AsyncReadonlyDataMap {
  return {
    keyType: map.keyType,
    valueType: map.valueType,
    fetchEntry: async key => map.fetchEntry(key),
    entries: async () => map.entries(),
  };
}

function liftMutable(map: DataMap): AsyncDataMap {
  return {
    ...liftReadonly(map),
    setEntry: async (key, value) => map.setEntry(key, value),
    insertEntry: async (key, value) => map.insertEntry(key, value),
    deleteEntry: async key => map.deleteEntry(key),
  };
}

/**
 * Wrap a synchronous database so async callers can use it unchanged.
 * Errors thrown by the wrapped operations surface as rejected promises.
 */
export function toAsyncDatabase(db: ContractDatabase): AsyncContractDatabase {
  return {
    getDataMap: async name => {
      const map = db.getDataMap(name);
      return map ? liftReadonly(map) : undefined;
    },
    getMutDataMap: async name => {
      const map = db.getMutDataMap(name);
      return map ? liftMutable(map) : undefined;
    },
    createMap: async (name, keyType, valueType) => db.createMap(name, keyType, valueType),
    mapNames: async () => db.mapNames(),
    close: async () => { },
  };
}
