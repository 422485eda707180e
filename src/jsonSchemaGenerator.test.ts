import { describe, test, expect, beforeEach } from "vitest";
import Ajv from "ajv";
import { MemoryContractDatabase } from "./database";
import { toSnapshot } from "./fileFormat";
import { generateSnapshotJsonSchema, typeSignatureToJsonSchema } from "./jsonSchemaGenerator";
import { bufferType, intType, intValue, principalType, principalValue, tupleType, tupleValue } from "./model";

describe("typeSignatureToJsonSchema", () => {
	test("describes a buffer encoding", () => {
		expect(typeSignatureToJsonSchema(bufferType(2))).toEqual({
			type: "object",
			properties: { buffer: { type: "string", pattern: "^([0-9a-f]{2})*$", maxLength: 4 } },
			required: ["buffer"],
			additionalProperties: false,
		});
	});

	test("describes tuple fields as required properties", () => {
		const schema = typeSignatureToJsonSchema(tupleType({ owner: principalType }));

		expect(schema).toEqual({
			type: "object",
			properties: {
				tuple: {
					type: "object",
					properties: {
						owner: {
							type: "object",
							properties: { principal: { type: "string" } },
							required: ["principal"],
							additionalProperties: false,
						},
					},
					required: ["owner"],
					additionalProperties: false,
				},
			},
			required: ["tuple"],
			additionalProperties: false,
		});
	});
});

describe("generateSnapshotJsonSchema", () => {
	let db: MemoryContractDatabase;

	beforeEach(() => {
		db = new MemoryContractDatabase();
		db.createMap("balances", tupleType({ owner: principalType }), tupleType({ amount: intType }));
		db.getMutDataMap("balances")?.setEntry(
			tupleValue({ owner: principalValue("A") }),
			tupleValue({ amount: intValue(100) })
		);
	});

	test("generic schema accepts any serialized database", () => {
		const validate = new Ajv().compile(generateSnapshotJsonSchema());

		expect(validate(toSnapshot(db))).toBe(true);
		expect(validate({ version: 1, maps: {} })).toBe(true);
		expect(validate({ version: 1, maps: { broken: { keyType: "int" } } })).toBe(false);
	});

	test("database schema pins each map's types", () => {
		const validate = new Ajv().compile(generateSnapshotJsonSchema(db));
		const snapshot = toSnapshot(db);

		expect(validate(snapshot)).toBe(true);

		const wrongValue = {
			...snapshot,
			maps: {
				balances: {
					...snapshot.maps.balances,
					entries: [[{ tuple: { owner: { principal: "A" } } }, { tuple: { amount: { principal: "B" } } }]],
				},
			},
		};
		expect(validate(wrongValue)).toBe(false);

		const wrongSchema = {
			...snapshot,
			maps: { balances: { ...snapshot.maps.balances, valueType: { tuple: { amount: "principal" } } } },
		};
		expect(validate(wrongSchema)).toBe(false);
	});

	test("maps unknown to the database fall back to the generic definition", () => {
		const validate = new Ajv().compile(generateSnapshotJsonSchema(db));
		const snapshot = toSnapshot(db);

		const extra = {
			...snapshot,
			maps: {
				...snapshot.maps,
				flags: { keyType: { tuple: { id: "int" } }, valueType: { tuple: { on: "bool" } }, entries: [] },
			},
		};
		expect(validate(extra)).toBe(true);
	});
});
