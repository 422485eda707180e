import { Client } from 'pg';
import { PGlite } from '@electric-sql/pglite';
import type { TupleTypeSignature, Value } from './model';
import { voidValue } from './model';
import type { Entry } from './database';
import { checkEntry, checkKey } from './database';
import { StaleMapError } from './errors';
import type { AsyncContractDatabase, AsyncDataMap, AsyncReadonlyDataMap } from './asyncDatabase';
import type { JsonTypeSignature, JsonValue } from './codec';
import { decodeTupleTypeSignature, decodeValue, encodeTypeSignature, encodeValue } from './codec';
import { valueKey } from './values';

/**
 * Database client interface - compatible with both pg.Client and PGlite
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

const MAPS_TABLE = `
  CREATE TABLE IF NOT EXISTS contract_maps (
    name TEXT PRIMARY KEY,
    key_type JSONB NOT NULL,
    value_type JSONB NOT NULL,
    generation INTEGER NOT NULL DEFAULT 0
  )
`;

const ENTRIES_TABLE = `
  CREATE TABLE IF NOT EXISTS contract_entries (
    map_name TEXT NOT NULL REFERENCES contract_maps(name) ON DELETE CASCADE,
    entry_key TEXT NOT NULL,
    key JSONB NOT NULL,
    value JSONB NOT NULL,
    PRIMARY KEY (map_name, entry_key)
  )
`;

// The map row a handle was loaded from. No row means createMap has replaced it.
const LIVE_MAP = `live AS (
    SELECT name FROM contract_maps WHERE name = CAST($1 AS TEXT) AND generation = CAST($3 AS INTEGER)
  )`;

// JSON parameters are sent as text and cast in SQL, so drivers never re-encode them.
function toJson(value: Value): string {
  return JSON.stringify(encodeValue(value));
}

interface WriteResult {
  live: number;
  affected: number;
}

/**
 * A typed map stored as rows of `contract_entries`.
 * Arguments are validated before any statement is sent. Every statement
 * also checks the map's generation, so a handle loaded before the map was
 * recreated throws `StaleMapError` instead of touching the new map.
 */
export class SqlDataMap implements AsyncDataMap {
  constructor(
    private readonly _client: DbClient,
    readonly name: string,
    readonly keyType: TupleTypeSignature,
    readonly valueType: TupleTypeSignature,
    readonly generation: number
  ) { }

  async fetchEntry(key: Value): Promise<Value> {
    checkKey(this.keyType, key);
    const result = await this._client.query<{ entry_key: string | null; value: JsonValue }>(
      `SELECT e.entry_key, e.value
       FROM contract_maps m
       LEFT JOIN contract_entries e ON e.map_name = m.name AND e.entry_key = $2
       WHERE m.name = $1 AND m.generation = $3`,
      [this.name, valueKey(key), this.generation]
    );
    if (result.rows.length === 0) {
      throw new StaleMapError(this.name);
    }
    const row = result.rows[0];
    return row.entry_key === null ? voidValue : decodeValue(row.value);
  }

  async setEntry(key: Value, value: Value): Promise<void> {
    checkEntry(this.keyType, this.valueType, key, value);
    await this._write(
      `INSERT INTO contract_entries (map_name, entry_key, key, value)
       SELECT name, CAST($2 AS TEXT), CAST($4 AS TEXT)::jsonb, CAST($5 AS TEXT)::jsonb FROM live WHERE true
       ON CONFLICT (map_name, entry_key) DO UPDATE SET key = EXCLUDED.key, value = EXCLUDED.value
       RETURNING entry_key`,
      [this.name, valueKey(key), this.generation, toJson(key), toJson(value)]
    );
  }

  async insertEntry(key: Value, value: Value): Promise<boolean> {
    checkEntry(this.keyType, this.valueType, key, value);
    const affected = await this._write(
      `INSERT INTO contract_entries (map_name, entry_key, key, value)
       SELECT name, CAST($2 AS TEXT), CAST($4 AS TEXT)::jsonb, CAST($5 AS TEXT)::jsonb FROM live WHERE true
       ON CONFLICT (map_name, entry_key) DO NOTHING
       RETURNING entry_key`,
      [this.name, valueKey(key), this.generation, toJson(key), toJson(value)]
    );
    return affected > 0;
  }

  async deleteEntry(key: Value): Promise<boolean> {
    checkKey(this.keyType, key);
    const affected = await this._write(
      `DELETE FROM contract_entries
       WHERE map_name IN (SELECT name FROM live) AND entry_key = CAST($2 AS TEXT)
       RETURNING entry_key`,
      [this.name, valueKey(key), this.generation]
    );
    return affected > 0;
  }

  async entries(): Promise<Entry[]> {
    const result = await this._client.query<{ entry_key: string | null; key: JsonValue; value: JsonValue }>(
      `SELECT e.entry_key, e.key, e.value
       FROM contract_maps m
       LEFT JOIN contract_entries e ON e.map_name = m.name
       WHERE m.name = $1 AND m.generation = $2
       ORDER BY e.entry_key COLLATE "C"`,
      [this.name, this.generation]
    );
    if (result.rows.length === 0) {
      throw new StaleMapError(this.name);
    }
    return result.rows
      .filter(row => row.entry_key !== null)
      .map(row => [decodeValue(row.key), decodeValue(row.value)]);
  }

  /**
   * Run a data-modifying statement against the `live` CTE in one round trip.
   * Returns the number of rows it changed.
   */
  private async _write(statement: string, params: unknown[]): Promise<number> {
    const result = await this._client.query<WriteResult>(
      `WITH ${LIVE_MAP}, changed AS (${statement})
       SELECT (SELECT COUNT(*) FROM live)::int AS live, (SELECT COUNT(*) FROM changed)::int AS affected`,
      params
    );
    const row = result.rows[0];
    if (row.live === 0) {
      throw new StaleMapError(this.name);
    }
    return row.affected;
  }
}

/**
 * Contract database persisted in PostgreSQL (or PGlite).
 */
export class SqlContractDatabase implements AsyncContractDatabase {
  private constructor(
    private readonly _client: DbClient,
    private readonly _close: () => Promise<void>
  ) { }

  /**
   * Create a SqlContractDatabase connected to a database.
   *
   * Connection string formats:
   * - `pglite:` or `pglite::memory:` - In-memory PGLite database
   * - `pglite:/path/to/dir` - PGLite database persisted to filesystem
   * - `postgresql://...` or other - PostgreSQL connection string
   */
  static async connect(connectionString: string): Promise<SqlContractDatabase> {
    if (connectionString.startsWith('pglite:')) {
      const pglitePath = connectionString.slice('pglite:'.length);
      const db = new PGlite(pglitePath || undefined);
      return SqlContractDatabase.fromClient(db, () => db.close());
    }

    const client = new Client({ connectionString });
    await client.connect();
    return SqlContractDatabase.fromClient(client, () => client.end());
  }

  /**
   * Create a SqlContractDatabase from an existing client (useful for testing with PGLite).
   * Creates the storage tables if they do not exist yet.
   */
  static async fromClient(client: DbClient, close: () => Promise<void> = async () => { }): Promise<SqlContractDatabase> {
    await client.query(MAPS_TABLE);
    await client.query(ENTRIES_TABLE);
    return new SqlContractDatabase(client, close);
  }

  async getDataMap(name: string): Promise<AsyncReadonlyDataMap | undefined> {
    const map = await this._loadMap(name);
    if (!map) {
      return undefined;
    }
    return {
      keyType: map.keyType,
      valueType: map.valueType,
      fetchEntry: key => map.fetchEntry(key),
      entries: () => map.entries(),
    };
  }

  getMutDataMap(name: string): Promise<AsyncDataMap | undefined> {
    return this._loadMap(name);
  }

  /**
   * Install an empty map under `name`, dropping the entries of any previous
   * map with that name. Executes in a transaction - rolls back on any error.
   */
  async createMap(name: string, keyType: TupleTypeSignature, valueType: TupleTypeSignature): Promise<void> {
    await this._client.query('BEGIN');

    try {
      await this._client.query('DELETE FROM contract_entries WHERE map_name = $1', [name]);
      await this._client.query(
        `INSERT INTO contract_maps (name, key_type, value_type)
         VALUES ($1, CAST($2 AS TEXT)::jsonb, CAST($3 AS TEXT)::jsonb)
         ON CONFLICT (name) DO UPDATE SET
           key_type = EXCLUDED.key_type,
           value_type = EXCLUDED.value_type,
           generation = contract_maps.generation + 1`,
        [name, JSON.stringify(encodeTypeSignature(keyType)), JSON.stringify(encodeTypeSignature(valueType))]
      );
      await this._client.query('COMMIT');
    } catch (error) {
      await this._client.query('ROLLBACK');
      throw error;
    }
  }

  async mapNames(): Promise<string[]> {
    const result = await this._client.query<{ name: string }>(
      'SELECT name FROM contract_maps ORDER BY name COLLATE "C"'
    );
    return result.rows.map(row => row.name);
  }

  private async _loadMap(name: string): Promise<SqlDataMap | undefined> {
    const result = await this._client.query<{
      key_type: JsonTypeSignature;
      value_type: JsonTypeSignature;
      generation: number;
    }>(
      'SELECT key_type, value_type, generation FROM contract_maps WHERE name = $1',
      [name]
    );
    if (result.rows.length === 0) {
      return undefined;
    }
    const row = result.rows[0];
    return new SqlDataMap(
      this._client,
      name,
      decodeTupleTypeSignature(row.key_type),
      decodeTupleTypeSignature(row.value_type),
      row.generation
    );
  }

  /**
   * Close the database connection.
   */
  close(): Promise<void> {
    return this._close();
  }
}
