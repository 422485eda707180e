import type { AsyncContractDatabase } from "./asyncDatabase";
import { toAsyncDatabase } from "./asyncDatabase";
import { MemoryContractDatabase } from "./database";
import { FileContractDatabase } from "./fileDatabase";
import { SqlContractDatabase } from "./sqlDatabase";

/**
 * Open a contract database by connection string.
 *
 * Connection string formats:
 * - `memory:` - Fresh in-memory database, discarded on close
 * - `file:/path/to/snapshot.json` - Snapshot file, rewritten on every change
 * - `pglite:` / `pglite:/path/to/dir` - PGLite, in memory or on disk
 * - `postgresql://...` - PostgreSQL
 */
export async function openDatabase(connectionString: string): Promise<AsyncContractDatabase> {
	if (connectionString === "memory:") {
		return toAsyncDatabase(new MemoryContractDatabase());
	}
	if (connectionString.startsWith("file:")) {
		const filePath = connectionString.slice("file:".length);
		if (!filePath) {
			throw new Error("Missing path in connection string: file:<path>");
		}
		return toAsyncDatabase(FileContractDatabase.open(filePath));
	}
	if (connectionString.startsWith("pglite:") || /^postgres(ql)?:\/\//.test(connectionString)) {
		return SqlContractDatabase.connect(connectionString);
	}
	throw new Error(`Unsupported connection string: ${connectionString}`);
}
