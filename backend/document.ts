/**
 * @module Backends
 * @description JSON document backend: statewide observations only.
 */

import { writeFile } from "node:fs/promises";
import { file_size, with_staged_artifact } from "../artifact";
import { statewide_document_codec, type StatewideDocument } from "../codec";
import { to_error, try_catch } from "../result";
import type { Backend, EventHandler, LoadSummary, PipelineError, Result } from "../types";
import { ok } from "../types";
import { create_emitter } from "../utils";
import { first_occurrences, write_table } from "./base";

export type DocumentBackendConfig = {
	path: string;
	on_event?: EventHandler;
};

/**
 * Creates a backend that serializes statewide observations into a single
 * compact JSON document:
 *
 * ```json
 * {"observations":[["2023-06-15",1234567],["2023-06-16",1234012]]}
 * ```
 *
 * Pairs keep input order. A date seen twice keeps its first level. The
 * reservoir, per-reservoir and snow streams are not part of the document and
 * are left unconsumed.
 *
 * The whole document is encoded in memory and written once, through a
 * staging file renamed over `path`.
 *
 * @example
 * ```ts
 * const backend = create_document_backend({ path: 'data/reservoir_data.json' })
 * const result = await backend.load({ statewide: rows })
 * ```
 */
export function create_document_backend(config: DocumentBackendConfig): Backend {
	const { path, on_event } = config;
	const emit = create_emitter(on_event);

	return {
		kind: "json",
		artifact_path: path,
		on_event,

		async load(input): Promise<Result<LoadSummary>> {
			const document: StatewideDocument = { observations: [] };
			const seen = new Set<string>();

			const table = try_catch(
				() => write_table(input.statewide, {
					table: "statewide_observations",
					batch_size: null,
					write_batch: (rows) => {
						const fresh = first_occurrences(rows, seen, (row) => row.date);
						for (const row of fresh) document.observations.push([row.date, row.water_level]);
						return fresh.length;
					},
				}, emit),
				(e): PipelineError => ({ kind: "storage_error", operation: "document.collect", cause: to_error(e) }),
			);
			if (!table.ok) {
				emit({ type: "error", error: table.error });
				return table;
			}

			const bytes = statewide_document_codec.encode(document);
			const written = await with_staged_artifact(path, async (staging_path) => {
				await writeFile(staging_path, bytes);
				return ok(bytes.length);
			});
			if (!written.ok) {
				emit({ type: "error", error: written.error });
				return written;
			}

			const size = await file_size(path);
			if (!size.ok) return size;
			emit({ type: "artifact_written", path, size_bytes: size.value });

			return ok({ artifact_path: path, tables: [table.value] });
		},
	};
}
