import Ajv from "ajv";
import type { TupleTypeSignature } from "./model";
import type { ContractDatabase, Entry } from "./database";
import { MemoryContractDatabase } from "./database";
import type { AsyncContractDatabase } from "./asyncDatabase";
import type { JsonTypeSignature, JsonValue } from "./codec";
import { decodeTypeSignature, decodeValue, encodeTypeSignature, encodeValue } from "./codec";
import { generateSnapshotJsonSchema } from "./jsonSchemaGenerator";

/**
 * Metadata fields that can appear at the top level of a snapshot file.
 */
export interface SnapshotMetadata {
	$schema?: string;
}

export interface SnapshotMap {
	keyType: JsonTypeSignature;
	valueType: JsonTypeSignature;
	entries: [JsonValue, JsonValue][];
}

/**
 * The full format of a snapshot file (metadata + maps).
 */
export interface DatabaseSnapshot extends SnapshotMetadata {
	version: 1;
	maps: { [name: string]: SnapshotMap };
}

const ajv = new Ajv();
ajv.addSchema(generateSnapshotJsonSchema(), "snapshot");

const validateSnapshot = ajv.compile<DatabaseSnapshot>({ $ref: "snapshot" });
const validateValue = ajv.compile<JsonValue>({ $ref: "snapshot#/definitions/value" });
const validateTypeSignature = ajv.compile<JsonTypeSignature>({ $ref: "snapshot#/definitions/typeSignature" });

function encodeMap(keyType: TupleTypeSignature, valueType: TupleTypeSignature, entries: readonly Entry[]): SnapshotMap {
	return {
		keyType: encodeTypeSignature(keyType),
		valueType: encodeTypeSignature(valueType),
		entries: entries.map(([key, value]) => [encodeValue(key), encodeValue(value)]),
	};
}

function decodeTupleType(json: JsonTypeSignature, mapName: string, side: string): TupleTypeSignature {
	const signature = decodeTypeSignature(json);
	if (signature.kind !== "tuple") {
		throw new Error(`Invalid snapshot: ${side} type of map "${mapName}" must be a tuple`);
	}
	return signature;
}

/**
 * Capture the full state of a database: map names, schemas and entries.
 */
export function toSnapshot(db: ContractDatabase, metadata?: SnapshotMetadata): DatabaseSnapshot {
	const snapshot: DatabaseSnapshot = { version: 1, maps: {} };
	if (metadata?.$schema) {
		snapshot.$schema = metadata.$schema;
	}
	for (const name of db.mapNames()) {
		const map = db.getDataMap(name);
		if (!map) continue;
		snapshot.maps[name] = encodeMap(map.keyType, map.valueType, map.entries());
	}
	return snapshot;
}

export async function snapshotDatabase(db: AsyncContractDatabase, metadata?: SnapshotMetadata): Promise<DatabaseSnapshot> {
	const snapshot: DatabaseSnapshot = { version: 1, maps: {} };
	if (metadata?.$schema) {
		snapshot.$schema = metadata.$schema;
	}
	for (const name of await db.mapNames()) {
		const map = await db.getDataMap(name);
		if (!map) continue;
		snapshot.maps[name] = encodeMap(map.keyType, map.valueType, await map.entries());
	}
	return snapshot;
}

/**
 * Serialize a database to a JSON string.
 */
export function serializeDatabase(db: ContractDatabase, metadata?: SnapshotMetadata): string {
	return JSON.stringify(toSnapshot(db, metadata), null, 2);
}

/**
 * Parse and validate a snapshot file.
 * @throws Error if the document does not match the snapshot format
 */
export function parseSnapshot(json: string): DatabaseSnapshot {
	const obj: unknown = JSON.parse(json);
	if (!validateSnapshot(obj)) {
		throw new Error(`Invalid snapshot: ${ajv.errorsText(validateSnapshot.errors)}`);
	}
	return obj;
}

/**
 * Recreate every map of a snapshot in `db`.
 * Entries are written through `setEntry`, so a snapshot whose entries do not
 * fit their map's schemas fails with TypeMismatchError.
 */
export function applySnapshot(snapshot: DatabaseSnapshot, db: ContractDatabase): void {
	for (const [name, map] of Object.entries(snapshot.maps)) {
		db.createMap(name, decodeTupleType(map.keyType, name, "key"), decodeTupleType(map.valueType, name, "value"));
		const target = db.getMutDataMap(name);
		if (!target) {
			throw new Error(`Map "${name}" missing after creation`);
		}
		for (const [key, value] of map.entries) {
			target.setEntry(decodeValue(key), decodeValue(value));
		}
	}
}

export async function loadSnapshot(snapshot: DatabaseSnapshot, db: AsyncContractDatabase): Promise<void> {
	for (const [name, map] of Object.entries(snapshot.maps)) {
		await db.createMap(name, decodeTupleType(map.keyType, name, "key"), decodeTupleType(map.valueType, name, "value"));
		const target = await db.getMutDataMap(name);
		if (!target) {
			throw new Error(`Map "${name}" missing after creation`);
		}
		for (const [key, value] of map.entries) {
			await target.setEntry(decodeValue(key), decodeValue(value));
		}
	}
}

/**
 * Restore a serialized database. Defaults to a fresh in-memory database.
 */
export function restoreDatabase(json: string, target: ContractDatabase = new MemoryContractDatabase()): ContractDatabase {
	applySnapshot(parseSnapshot(json), target);
	return target;
}

/**
 * Parse a value given in its JSON encoding, e.g. `{"tuple":{"owner":{"principal":"SP1"}}}`.
 */
export function parseValue(text: string): JsonValue {
	const obj: unknown = JSON.parse(text);
	if (!validateValue(obj)) {
		throw new Error(`Invalid value ${text}: ${ajv.errorsText(validateValue.errors)}`);
	}
	return obj;
}

export function parseTypeSignature(text: string): JsonTypeSignature {
	const obj: unknown = JSON.parse(text);
	if (!validateTypeSignature(obj)) {
		throw new Error(`Invalid type ${text}: ${ajv.errorsText(validateTypeSignature.errors)}`);
	}
	return obj;
}
