import { Command } from "commander";
import * as fs from "fs";
import type { AsyncContractDatabase } from "./asyncDatabase";
import { openDatabase } from "./connect";
import { decodeTupleTypeSignature, decodeValue } from "./codec";
import { MemoryContractDatabase } from "./database";
import {
	applySnapshot,
	loadSnapshot,
	parseSnapshot,
	parseTypeSignature,
	parseValue,
	snapshotDatabase,
} from "./fileFormat";
import { generateSnapshotJsonSchema } from "./jsonSchemaGenerator";
import { describeType } from "./typeSignature";
import { formatValue } from "./values";

export interface CliOutput {
	log(line: string): void;
}

interface ConnectionOptions {
	connection: string;
}

async function withDatabase(
	options: ConnectionOptions,
	action: (db: AsyncContractDatabase) => Promise<void>
): Promise<void> {
	const db = await openDatabase(options.connection);
	try {
		await action(db);
	} finally {
		await db.close();
	}
}

function noSuchMap(name: string): Error {
	return new Error(`No such map: ${name}`);
}

export function createProgram(output: CliOutput = { log: line => console.log(line) }): Command {
	const program = new Command();

	program
		.name("contract-storage")
		.description("Inspect and edit typed contract storage")
		.version("1.0.0");

	const connectionOption = "-c, --connection <string>";
	const connectionHelp = "file:<path>, pglite:[dir] or a PostgreSQL connection string";

	program
		.command("maps")
		.description("List maps with their key and value types")
		.requiredOption(connectionOption, connectionHelp)
		.action((options: ConnectionOptions) => withDatabase(options, async db => {
			const names = await db.mapNames();
			if (names.length === 0) {
				output.log("No maps.");
				return;
			}
			for (const name of names) {
				const map = await db.getDataMap(name);
				if (!map) continue;
				output.log(`${name}: ${describeType(map.keyType)} => ${describeType(map.valueType)}`);
			}
		}));

	program
		.command("create-map")
		.description("Create an empty map, replacing any map with the same name")
		.argument("<name>", "Map name")
		.argument("<keyType>", "Key tuple type as JSON, e.g. '{\"tuple\":{\"owner\":\"principal\"}}'")
		.argument("<valueType>", "Value tuple type as JSON")
		.requiredOption(connectionOption, connectionHelp)
		.action((name: string, keyType: string, valueType: string, options: ConnectionOptions) => withDatabase(options, async db => {
			await db.createMap(
				name,
				decodeTupleTypeSignature(parseTypeSignature(keyType)),
				decodeTupleTypeSignature(parseTypeSignature(valueType))
			);
			output.log(`Created map ${name}`);
		}));

	program
		.command("fetch")
		.description("Print the value stored under a key (void when absent)")
		.argument("<map>", "Map name")
		.argument("<key>", "Key as JSON")
		.requiredOption(connectionOption, connectionHelp)
		.action((mapName: string, key: string, options: ConnectionOptions) => withDatabase(options, async db => {
			const map = await db.getDataMap(mapName);
			if (!map) throw noSuchMap(mapName);
			output.log(formatValue(await map.fetchEntry(decodeValue(parseValue(key)))));
		}));

	program
		.command("set")
		.description("Insert or overwrite an entry")
		.argument("<map>", "Map name")
		.argument("<key>", "Key as JSON")
		.argument("<value>", "Value as JSON")
		.requiredOption(connectionOption, connectionHelp)
		.action((mapName: string, key: string, value: string, options: ConnectionOptions) => withDatabase(options, async db => {
			const map = await db.getMutDataMap(mapName);
			if (!map) throw noSuchMap(mapName);
			await map.setEntry(decodeValue(parseValue(key)), decodeValue(parseValue(value)));
			output.log("OK");
		}));

	program
		.command("insert")
		.description("Insert an entry only if the key is absent; prints whether it was inserted")
		.argument("<map>", "Map name")
		.argument("<key>", "Key as JSON")
		.argument("<value>", "Value as JSON")
		.requiredOption(connectionOption, connectionHelp)
		.action((mapName: string, key: string, value: string, options: ConnectionOptions) => withDatabase(options, async db => {
			const map = await db.getMutDataMap(mapName);
			if (!map) throw noSuchMap(mapName);
			const inserted = await map.insertEntry(decodeValue(parseValue(key)), decodeValue(parseValue(value)));
			output.log(String(inserted));
		}));

	program
		.command("delete")
		.description("Delete an entry; prints whether one existed")
		.argument("<map>", "Map name")
		.argument("<key>", "Key as JSON")
		.requiredOption(connectionOption, connectionHelp)
		.action((mapName: string, key: string, options: ConnectionOptions) => withDatabase(options, async db => {
			const map = await db.getMutDataMap(mapName);
			if (!map) throw noSuchMap(mapName);
			output.log(String(await map.deleteEntry(decodeValue(parseValue(key)))));
		}));

	program
		.command("export")
		.description("Write the whole database to a snapshot file")
		.requiredOption(connectionOption, connectionHelp)
		.requiredOption("-o, --output <file>", "Output JSON file path")
		.action((options: ConnectionOptions & { output: string }) => withDatabase(options, async db => {
			const snapshot = await snapshotDatabase(db);
			fs.writeFileSync(options.output, JSON.stringify(snapshot, null, 2));
			output.log(`Exported to ${options.output}`);
		}));

	program
		.command("import")
		.description("Recreate every map of a snapshot file in the database")
		.requiredOption(connectionOption, connectionHelp)
		.requiredOption("-f, --file <file>", "Snapshot file to import")
		.action((options: ConnectionOptions & { file: string }) => withDatabase(options, async db => {
			const snapshot = parseSnapshot(fs.readFileSync(options.file, "utf-8"));
			await loadSnapshot(snapshot, db);
			output.log(`Imported ${Object.keys(snapshot.maps).length} map(s)`);
		}));

	program
		.command("schema")
		.description("Export a JSON Schema for snapshots of this database")
		.requiredOption(connectionOption, connectionHelp)
		.option("-o, --output <file>", "Output file (defaults to stdout)")
		.action((options: ConnectionOptions & { output?: string }) => withDatabase(options, async db => {
			const local = new MemoryContractDatabase();
			applySnapshot(await snapshotDatabase(db), local);
			const schema = JSON.stringify(generateSnapshotJsonSchema(local), null, "\t");

			if (options.output) {
				fs.writeFileSync(options.output, schema);
				output.log(`Exported to ${options.output}`);
			} else {
				output.log(schema);
			}
		}));

	return program;
}
