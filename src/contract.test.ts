import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { AsyncContractDatabase, AsyncDataMap } from './asyncDatabase';
import { toAsyncDatabase } from './asyncDatabase';
import { MemoryContractDatabase } from './database';
import { FileContractDatabase } from './fileDatabase';
import { SqlContractDatabase } from './sqlDatabase';
import { StaleMapError, TypeMismatchError } from './errors';
import {
  boolType,
  boolValue,
  intType,
  intValue,
  principalType,
  principalValue,
  tupleType,
  tupleValue,
  voidValue,
} from './model';
import type { Value } from './model';

/**
 * The same storage contract, checked against every backend.
 */
interface Backend {
  name: string;
  open(): Promise<{ db: AsyncContractDatabase; cleanup(): void }>;
}

const backends: Backend[] = [
  {
    name: 'memory',
    open: async () => ({ db: toAsyncDatabase(new MemoryContractDatabase()), cleanup: () => { } }),
  },
  {
    name: 'file',
    open: async () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'contract-storage-test-'));
      const db = toAsyncDatabase(FileContractDatabase.open(path.join(tempDir, 'db.json')));
      return { db, cleanup: () => fs.rmSync(tempDir, { recursive: true, force: true }) };
    },
  },
  {
    name: 'sql (pglite)',
    open: async () => {
      const pg = new PGlite();
      const db = await SqlContractDatabase.fromClient(pg, () => pg.close());
      return { db, cleanup: () => { } };
    },
  },
];

const ownerKey = tupleType({ owner: principalType });
const amountValue = tupleType({ amount: intType });

const owner = (name: string) => tupleValue({ owner: principalValue(name) });
const amount = (n: number) => tupleValue({ amount: intValue(n) });

describe.each(backends)('storage contract: $name', backend => {
  let db: AsyncContractDatabase;
  let cleanup: () => void;

  beforeEach(async () => {
    ({ db, cleanup } = await backend.open());
    await db.createMap('balances', ownerKey, amountValue);
  });

  afterEach(async () => {
    await db.close();
    cleanup();
  });

  async function balances(): Promise<AsyncDataMap> {
    const map = await db.getMutDataMap('balances');
    if (!map) throw new Error('balances map missing');
    return map;
  }

  test('missing maps are undefined, not errors', async () => {
    expect(await db.getDataMap('nope')).toBeUndefined();
    expect(await db.getMutDataMap('nope')).toBeUndefined();
  });

  test('exposes the fixed schemas', async () => {
    const map = await db.getDataMap('balances');
    expect(map?.keyType).toEqual(ownerKey);
    expect(map?.valueType).toEqual(amountValue);
  });

  test('balances scenario', async () => {
    const map = await balances();

    expect(await map.insertEntry(owner('A'), amount(100))).toBe(true);
    expect(await map.insertEntry(owner('A'), amount(5))).toBe(false);
    expect(await map.fetchEntry(owner('A'))).toEqual(amount(100));

    await map.setEntry(owner('A'), amount(5));
    expect(await map.fetchEntry(owner('A'))).toEqual(amount(5));

    expect(await map.deleteEntry(owner('A'))).toBe(true);
    expect(await map.fetchEntry(owner('A'))).toEqual(voidValue);
    expect(await map.deleteEntry(owner('A'))).toBe(false);
  });

  test('set then fetch round-trips', async () => {
    const map = await balances();

    await map.setEntry(owner('A'), amount(-12));
    await map.setEntry(owner('B'), amount(0));

    expect(await map.fetchEntry(owner('A'))).toEqual(amount(-12));
    expect(await map.fetchEntry(owner('B'))).toEqual(amount(0));
  });

  test('unwritten keys fetch as void', async () => {
    const map = await db.getDataMap('balances');
    expect(await map?.fetchEntry(owner('nobody'))).toEqual(voidValue);
  });

  test('schema violations reject and change nothing', async () => {
    const map = await balances();
    await map.setEntry(owner('A'), amount(1));

    await expect(map.fetchEntry(amount(1))).rejects.toThrow(TypeMismatchError);
    await expect(map.setEntry(owner('A'), boolValue(true))).rejects.toThrow(TypeMismatchError);
    await expect(map.insertEntry(owner('B'), owner('B'))).rejects.toThrow(TypeMismatchError);
    await expect(map.deleteEntry(principalValue('A'))).rejects.toThrow(TypeMismatchError);

    expect(await map.entries()).toEqual([[owner('A'), amount(1)]]);
  });

  test('entries are ordered by key', async () => {
    const map = await balances();
    await map.setEntry(owner('carol'), amount(3));
    await map.setEntry(owner('alice'), amount(1));
    await map.setEntry(owner('bob'), amount(2));

    expect(await map.entries()).toEqual([
      [owner('alice'), amount(1)],
      [owner('bob'), amount(2)],
      [owner('carol'), amount(3)],
    ]);
  });

  test('recreating a map discards its entries only', async () => {
    await db.createMap('other', ownerKey, amountValue);
    await (await balances()).setEntry(owner('A'), amount(100));
    await (await db.getMutDataMap('other'))?.setEntry(owner('A'), amount(1));

    await db.createMap('balances', ownerKey, amountValue);

    expect(await (await balances()).fetchEntry(owner('A'))).toEqual(voidValue);
    expect(await (await db.getDataMap('other'))?.fetchEntry(owner('A'))).toEqual(amount(1));
    expect(await db.mapNames()).toEqual(['balances', 'other']);
  });

  test('handles taken before a map is recreated throw and write nothing', async () => {
    const stale = await balances();
    const staleRead = await db.getDataMap('balances');
    await stale.setEntry(owner('A'), amount(1));

    await db.createMap('balances', ownerKey, tupleType({ flag: boolType }));

    await expect(stale.setEntry(owner('A'), amount(2))).rejects.toThrow(StaleMapError);
    await expect(stale.insertEntry(owner('B'), amount(2))).rejects.toThrow(StaleMapError);
    await expect(stale.deleteEntry(owner('A'))).rejects.toThrow(StaleMapError);
    await expect(stale.fetchEntry(owner('A'))).rejects.toThrow(StaleMapError);
    await expect(stale.entries()).rejects.toThrow(StaleMapError);
    await expect(staleRead?.fetchEntry(owner('A'))).rejects.toThrow('Map "balances" was recreated after this handle was obtained');

    const fresh = await balances();
    expect(fresh.valueType).toEqual(tupleType({ flag: boolType }));
    expect(await fresh.entries()).toEqual([]);
  });

  test('stored state is independent of the objects passed in', async () => {
    const fields: Record<string, Value> = { amount: intValue(1) };
    const map = await balances();
    await map.setEntry(owner('A'), { type: 'tuple', fields });

    fields.amount = principalValue('B');

    expect(await map.fetchEntry(owner('A'))).toEqual(amount(1));
    expect(await map.entries()).toEqual([[owner('A'), amount(1)]]);
  });
});
