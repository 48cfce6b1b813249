/**
 * @module Backends
 * @description In-memory backend for testing and dry runs.
 */

import { to_error, try_catch } from "../result";
import type {
	Backend,
	EventHandler,
	LoadSummary,
	PipelineError,
	Reservoir,
	ReservoirObservation,
	Result,
	SnowObservation,
	SnowStation,
	StatewideObservation,
} from "../types";
import { ok } from "../types";
import { create_emitter } from "../utils";
import { DEFAULT_BATCH_SIZE, first_occurrences, observation_key, write_table } from "./base";

export type MemoryBackendOptions = {
	batch_size?: number;
	on_event?: EventHandler;
};

export type MemorySnapshot = {
	statewide: StatewideObservation[];
	reservoirs: Reservoir[];
	reservoir_observations: ReservoirObservation[];
	snow_stations: SnowStation[];
	snow_observations: SnowObservation[];
};

export type MemoryBackend = Backend & {
	/** Rows loaded so far, in insertion order. */
	snapshot: () => MemorySnapshot;
};

/**
 * Creates an in-memory backend.
 * @category Backends
 * @group Storage Backends
 *
 * Applies the same keys and first-write-wins policy as the SQLite backend
 * without touching the file system. All data is lost when the process ends.
 *
 * @example
 * ```ts
 * const backend = create_memory_backend({ on_event: (e) => events.push(e) })
 * await backend.load({ statewide: [{ date: '2023-06-15', water_level: 1234567 }] })
 * backend.snapshot().statewide // => [{ date: '2023-06-15', water_level: 1234567 }]
 * ```
 */
export function create_memory_backend(options?: MemoryBackendOptions): MemoryBackend {
	const batch_size = options?.batch_size ?? DEFAULT_BATCH_SIZE;
	const on_event = options?.on_event;
	const emit = create_emitter(on_event);

	const statewide = new Map<string, StatewideObservation>();
	const reservoirs = new Map<string, Reservoir>();
	const observations = new Map<string, ReservoirObservation>();
	const snow_stations = new Map<string, SnowStation>();
	const snow_observations = new Map<string, SnowObservation>();

	function keep_first<T>(target: Map<string, T>, key: (row: T) => string) {
		const seen = new Set(target.keys());
		return (rows: T[]): number => {
			const fresh = first_occurrences(rows, seen, key);
			for (const row of fresh) target.set(key(row), row);
			return fresh.length;
		};
	}

	return {
		kind: "memory",
		artifact_path: null,
		on_event,

		async load(input): Promise<Result<LoadSummary>> {
			const loaded = try_catch(() => [
				write_table(input.statewide, {
					table: "statewide_observations",
					batch_size: null,
					write_batch: keep_first(statewide, (row) => row.date),
				}, emit),
				write_table(input.reservoirs ?? [], {
					table: "reservoirs",
					batch_size: null,
					write_batch: keep_first(reservoirs, (row) => row.station_id),
				}, emit),
				write_table(input.reservoir_observations ?? [], {
					table: "reservoir_observations",
					batch_size,
					write_batch: keep_first(observations, observation_key),
				}, emit),
				write_table(input.snow_stations ?? [], {
					table: "snow_stations",
					batch_size: null,
					write_batch: keep_first(snow_stations, (row) => row.station_id),
				}, emit),
				write_table(input.snow_observations ?? [], {
					table: "snow_observations",
					batch_size,
					write_batch: keep_first(snow_observations, observation_key),
				}, emit),
			], (e): PipelineError => ({ kind: "storage_error", operation: "memory.load", cause: to_error(e) }));
			if (!loaded.ok) {
				emit({ type: "error", error: loaded.error });
				return loaded;
			}
			return ok({ artifact_path: null, tables: loaded.value });
		},

		snapshot: () => ({
			statewide: Array.from(statewide.values()),
			reservoirs: Array.from(reservoirs.values()),
			reservoir_observations: Array.from(observations.values()),
			snow_stations: Array.from(snow_stations.values()),
			snow_observations: Array.from(snow_observations.values()),
		}),
	};
}
