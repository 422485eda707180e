import * as fs from "fs";
import * as path from "path";
import type { TupleTypeSignature, Value } from "./model";
import type { ContractDatabase, DataMap, Entry, ReadonlyDataMap } from "./database";
import { MemoryContractDatabase } from "./database";
import { isVoid } from "./model";
import { applySnapshot, parseSnapshot, serializeDatabase, toSnapshot } from "./fileFormat";

/**
 * Durable database backed by a snapshot file.
 * State lives in memory and the file is rewritten after every mutation
 * that changed something. Validation failures and no-op inserts/deletes
 * leave the file untouched. When the file cannot be written the mutation
 * is undone in memory too, and the write error is rethrown.
 */
export class FileContractDatabase implements ContractDatabase {
	private constructor(
		private readonly _path: string,
		private readonly _inner: MemoryContractDatabase
	) { }

	/**
	 * Open a snapshot file. A missing file yields an empty database;
	 * nothing is written until the first mutation.
	 */
	static open(filePath: string): FileContractDatabase {
		const resolved = path.resolve(filePath);
		const inner = new MemoryContractDatabase();
		if (fs.existsSync(resolved)) {
			applySnapshot(parseSnapshot(fs.readFileSync(resolved, "utf-8")), inner);
		}
		return new FileContractDatabase(resolved, inner);
	}

	get path(): string {
		return this._path;
	}

	getDataMap(name: string): ReadonlyDataMap | undefined {
		return this._inner.getDataMap(name);
	}

	getMutDataMap(name: string): DataMap | undefined {
		const map = this._inner.getMutDataMap(name);
		return map ? this._writeThrough(map) : undefined;
	}

	/**
	 * The new state is written before it is installed, so existing handles
	 * of `name` stay valid if the write fails.
	 */
	createMap(name: string, keyType: TupleTypeSignature, valueType: TupleTypeSignature): void {
		const next = new MemoryContractDatabase();
		applySnapshot(toSnapshot(this._inner), next);
		next.createMap(name, keyType, valueType);
		this._write(serializeDatabase(next));
		this._inner.createMap(name, keyType, valueType);
	}

	mapNames(): string[] {
		return this._inner.mapNames();
	}

	private _writeThrough(map: DataMap): DataMap {
		return {
			keyType: map.keyType,
			valueType: map.valueType,
			fetchEntry: (key: Value): Value => map.fetchEntry(key),
			entries: (): Entry[] => map.entries(),
			setEntry: (key: Value, value: Value): void => {
				const previous = map.fetchEntry(key);
				map.setEntry(key, value);
				this._flush(() => {
					if (isVoid(previous)) {
						map.deleteEntry(key);
					} else {
						map.setEntry(key, previous);
					}
				});
			},
			insertEntry: (key: Value, value: Value): boolean => {
				const inserted = map.insertEntry(key, value);
				if (inserted) this._flush(() => map.deleteEntry(key));
				return inserted;
			},
			deleteEntry: (key: Value): boolean => {
				const previous = map.fetchEntry(key);
				const deleted = map.deleteEntry(key);
				if (deleted) this._flush(() => map.setEntry(key, previous));
				return deleted;
			},
		};
	}

	private _flush(undo: () => void): void {
		try {
			this._write(serializeDatabase(this._inner));
		} catch (error) {
			undo();
			throw error;
		}
	}

	private _write(contents: string): void {
		const dir = path.dirname(this._path);
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
		fs.writeFileSync(this._path, contents);
	}
}
