/**
 * @module Backends
 * @description SQLite backend: one self-contained database file with the
 * statewide, reservoir, per-reservoir observation and snow tables.
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { file_size, with_staged_artifact } from "../artifact";
import { to_error } from "../result";
import {
	RESERVOIR_SCHEMA_SQL,
	reservoir_observations,
	reservoirs,
	snow_observations,
	snow_stations,
	statewide_observations,
} from "../schema";
import type { Backend, EventHandler, LoadInput, LoadSummary, Result, TableSummary } from "../types";
import { ok, err } from "../types";
import { chunk, create_emitter } from "../utils";
import { DEFAULT_BATCH_SIZE, write_table } from "./base";

// SQLITE_MAX_VARIABLE_NUMBER for the SQLite bundled with better-sqlite3.
const SQLITE_MAX_VARIABLES = 32_766;

export type SqliteBackendConfig = {
	path: string;
	/** Per-reservoir and snow observations per transaction. Defaults to 10 000. */
	batch_size?: number;
	on_event?: EventHandler;
};

/**
 * Runs `insert` over `rows` in multi-row statements small enough for SQLite's
 * bound parameter limit, all inside one transaction. Returns the number of
 * rows actually inserted.
 */
function insert_in_transaction<T>(
	db: BetterSQLite3Database,
	rows: T[],
	columns: number,
	insert: (part: T[]) => number,
): number {
	const rows_per_statement = Math.floor(SQLITE_MAX_VARIABLES / columns);
	return db.transaction(() => {
		let changes = 0;
		for (const part of chunk(rows, rows_per_statement)) changes += insert(part);
		return changes;
	});
}

/**
 * Creates a backend that writes a SQLite database file.
 * @category Backends
 * @group Storage Backends
 *
 * Tables and indexes are created in a fresh staging file next to `path`:
 * - `statewide_observations` - one transaction for the whole stream
 * - `reservoirs` - one transaction for the whole stream
 * - `reservoir_observations` - one transaction per `batch_size` rows, each
 *   reported with a `batch_written` event
 * - `snow_stations` - one transaction for the whole stream
 * - `snow_observations` - batched like `reservoir_observations`
 *
 * Every insert is `ON CONFLICT DO NOTHING`, so the first row for a key wins
 * and later duplicates, within or across batches, are counted as ignored.
 * The staging file is closed and renamed over `path` only after the last
 * batch commits; on any failure it is deleted and the previous database at
 * `path` stays in place.
 *
 * @example
 * ```ts
 * const backend = create_sqlite_backend({
 *   path: 'data/reservoir_data.db',
 *   on_event: (e) => e.type === 'batch_written' && console.log(e.total),
 * })
 * const result = await backend.load({ statewide, reservoirs, reservoir_observations, snow_stations, snow_observations })
 * ```
 */
export function create_sqlite_backend(config: SqliteBackendConfig): Backend {
	const { path, on_event } = config;
	const batch_size = config.batch_size ?? DEFAULT_BATCH_SIZE;
	const emit = create_emitter(on_event);

	function write_tables(staging_path: string, input: LoadInput): TableSummary[] {
		const sqlite = new Database(staging_path);
		try {
			// the staging file is discarded on failure, so the journal never needs to hit disk
			sqlite.pragma("journal_mode = MEMORY");
			sqlite.exec(RESERVOIR_SCHEMA_SQL);
			const db = drizzle(sqlite);

			return [
				write_table(input.statewide, {
					table: "statewide_observations",
					batch_size: null,
					write_batch: (rows) =>
						insert_in_transaction(db, rows, 2, (part) =>
							db.insert(statewide_observations).values(part).onConflictDoNothing().run().changes),
				}, emit),
				write_table(input.reservoirs ?? [], {
					table: "reservoirs",
					batch_size: null,
					write_batch: (rows) =>
						insert_in_transaction(db, rows, 6, (part) =>
							db.insert(reservoirs).values(part).onConflictDoNothing().run().changes),
				}, emit),
				write_table(input.reservoir_observations ?? [], {
					table: "reservoir_observations",
					batch_size,
					write_batch: (rows) =>
						insert_in_transaction(db, rows, 3, (part) =>
							db.insert(reservoir_observations).values(part).onConflictDoNothing().run().changes),
				}, emit),
				write_table(input.snow_stations ?? [], {
					table: "snow_stations",
					batch_size: null,
					write_batch: (rows) =>
						insert_in_transaction(db, rows, 7, (part) =>
							db.insert(snow_stations).values(part).onConflictDoNothing().run().changes),
				}, emit),
				write_table(input.snow_observations ?? [], {
					table: "snow_observations",
					batch_size,
					write_batch: (rows) =>
						insert_in_transaction(db, rows, 4, (part) =>
							db.insert(snow_observations).values(part).onConflictDoNothing().run().changes),
				}, emit),
			];
		} finally {
			sqlite.close();
		}
	}

	return {
		kind: "sqlite",
		artifact_path: path,
		on_event,

		async load(input): Promise<Result<LoadSummary>> {
			const written = await with_staged_artifact(path, async (staging_path): Promise<Result<TableSummary[]>> => {
				try {
					return ok(write_tables(staging_path, input));
				} catch (cause) {
					return err({ kind: "storage_error", operation: "sqlite.insert", cause: to_error(cause) });
				}
			});
			if (!written.ok) {
				emit({ type: "error", error: written.error });
				return written;
			}

			const size = await file_size(path);
			if (!size.ok) return size;
			emit({ type: "artifact_written", path, size_bytes: size.value });

			return ok({ artifact_path: path, tables: written.value });
		},
	};
}
