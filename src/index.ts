// Core value and type model
export type {
  Value,
  VoidValue,
  BoolValue,
  IntValue,
  PrincipalValue,
  BufferValue,
  TupleValue,
  TypeSignature,
  BufferTypeSignature,
  TupleTypeSignature,
} from './model';

export {
  voidValue,
  boolValue,
  intValue,
  principalValue,
  bufferValue,
  tupleValue,
  boolType,
  intType,
  principalType,
  bufferType,
  tupleType,
  isVoid,
} from './model';

export { admits, describeType, copyTypeSignature, copyTupleTypeSignature } from './typeSignature';
export { valueKey, valuesEqual, formatValue, copyValue } from './values';

// Errors
export type { EntrySide } from './errors';
export { TypeMismatchError, StaleMapError } from './errors';

// Storage interfaces and in-memory backend
export type { Entry, ReadonlyDataMap, DataMap, ContractDatabase } from './database';
export { MemoryDataMap, MemoryContractDatabase, readonlyView } from './database';

export type { AsyncReadonlyDataMap, AsyncDataMap, AsyncContractDatabase } from './asyncDatabase';
export { toAsyncDatabase } from './asyncDatabase';

// Durable backends
export { FileContractDatabase } from './fileDatabase';
export type { DbClient } from './sqlDatabase';
export { SqlContractDatabase, SqlDataMap } from './sqlDatabase';
export { openDatabase } from './connect';

// Snapshot format
export type { JsonValue, JsonTypeSignature } from './codec';
export { encodeValue, decodeValue, encodeTypeSignature, decodeTypeSignature, decodeTupleTypeSignature } from './codec';
export type { SnapshotMetadata, SnapshotMap, DatabaseSnapshot } from './fileFormat';
export {
  toSnapshot,
  snapshotDatabase,
  serializeDatabase,
  parseSnapshot,
  applySnapshot,
  loadSnapshot,
  restoreDatabase,
  parseValue,
  parseTypeSignature,
} from './fileFormat';

// JSON Schema generation
export type { JsonSchema } from './jsonSchemaGenerator';
export { generateSnapshotJsonSchema, typeSignatureToJsonSchema } from './jsonSchemaGenerator';
