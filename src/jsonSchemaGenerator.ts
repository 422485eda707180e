import type { TypeSignature } from "./model";
import type { ContractDatabase } from "./database";
import { encodeTypeSignature } from "./codec";

export type JsonSchema = {
	readonly $schema: string;
	readonly type: string;
	readonly properties: Record<string, unknown>;
	readonly required: readonly string[];
	readonly additionalProperties: boolean;
	readonly definitions: Record<string, unknown>;
};

const INT_PATTERN = "^-?[0-9]+$";
const HEX_PATTERN = "^([0-9a-f]{2})*$";

function wrapper(tag: string, inner: Record<string, unknown>): Record<string, unknown> {
	return {
		type: "object",
		properties: { [tag]: inner },
		required: [tag],
		additionalProperties: false,
	};
}

function entrySchema(key: unknown, value: unknown): Record<string, unknown> {
	return {
		type: "array",
		items: [key, value],
		minItems: 2,
		maxItems: 2,
		additionalItems: false,
	};
}

/**
 * JSON Schema for the encoding of values admitted by a type signature.
 */
export function typeSignatureToJsonSchema(signature: TypeSignature): Record<string, unknown> {
	switch (signature.kind) {
		case "bool":
			return { type: "boolean" };
		case "int":
			return wrapper("int", { type: "string", pattern: INT_PATTERN });
		case "principal":
			return wrapper("principal", { type: "string" });
		case "buffer":
			return wrapper("buffer", { type: "string", pattern: HEX_PATTERN, maxLength: signature.maxLength * 2 });
		case "tuple": {
			const properties: Record<string, unknown> = {};
			for (const [name, field] of Object.entries(signature.fields)) {
				properties[name] = typeSignatureToJsonSchema(field);
			}
			return wrapper("tuple", {
				type: "object",
				properties,
				required: Object.keys(signature.fields),
				additionalProperties: false,
			});
		}
	}
}

function generateDefinitions(): Record<string, unknown> {
	return {
		value: {
			anyOf: [
				{ type: "null" },
				{ type: "boolean" },
				wrapper("int", { type: "string", pattern: INT_PATTERN }),
				wrapper("principal", { type: "string" }),
				wrapper("buffer", { type: "string", pattern: HEX_PATTERN }),
				wrapper("tuple", { type: "object", additionalProperties: { $ref: "#/definitions/value" } }),
			],
		},
		typeSignature: {
			anyOf: [
				{ type: "string", enum: ["bool", "int", "principal"] },
				wrapper("buffer", { type: "integer", minimum: 0 }),
				wrapper("tuple", { type: "object", additionalProperties: { $ref: "#/definitions/typeSignature" } }),
			],
		},
		map: {
			type: "object",
			properties: {
				keyType: { $ref: "#/definitions/typeSignature" },
				valueType: { $ref: "#/definitions/typeSignature" },
				entries: {
					type: "array",
					items: entrySchema({ $ref: "#/definitions/value" }, { $ref: "#/definitions/value" }),
				},
			},
			required: ["keyType", "valueType", "entries"],
			additionalProperties: false,
		},
	};
}

/**
 * Generate a JSON Schema for snapshot files.
 * When a database is given, each of its maps gets a property whose
 * schemas and entries are pinned to the map's types. This enables
 * autocomplete and validation in editors.
 */
export function generateSnapshotJsonSchema(db?: ContractDatabase): JsonSchema {
	const maps: Record<string, unknown> = {
		type: "object",
		additionalProperties: { $ref: "#/definitions/map" },
	};

	if (db) {
		const properties: Record<string, unknown> = {};
		for (const name of db.mapNames()) {
			const map = db.getDataMap(name);
			if (!map) continue;
			properties[name] = {
				type: "object",
				properties: {
					keyType: { const: encodeTypeSignature(map.keyType) },
					valueType: { const: encodeTypeSignature(map.valueType) },
					entries: {
						type: "array",
						items: entrySchema(
							typeSignatureToJsonSchema(map.keyType),
							typeSignatureToJsonSchema(map.valueType)
						),
					},
				},
				required: ["keyType", "valueType", "entries"],
				additionalProperties: false,
			};
		}
		maps.properties = properties;
	}

	return {
		$schema: "http://json-schema.org/draft-07/schema#",
		type: "object",
		properties: {
			$schema: { type: "string" },
			version: { const: 1 },
			maps,
		},
		required: ["version", "maps"],
		additionalProperties: false,
		definitions: generateDefinitions(),
	};
}
