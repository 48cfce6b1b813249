/**
 * @module Types
 * @description Type definitions for the reservoir data pipeline.
 */

/**
 * Fatal errors that abort a pipeline run.
 * @category Types
 * @group Error Types
 *
 * Uses discriminated unions for type-safe error handling via the `kind` field:
 * - `extraction_error` - An archive could not be decompressed or unpacked
 * - `read_error` - An input file is missing or unreadable
 * - `storage_error` - Writing the artifact failed (includes cause and operation name)
 * - `compression_error` - Compressing the finished artifact failed
 * - `invalid_config` - Configuration rejected before the run started
 *
 * @example
 * ```ts
 * const result = await read_archive('fixtures/cumulative_v2.tar.lzma')
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case 'extraction_error':
 *       console.log(`${result.error.stage} failed for ${result.error.path}`)
 *       break
 *     case 'read_error':
 *       console.log(`cannot read ${result.error.path}:`, result.error.cause)
 *       break
 *   }
 * }
 * ```
 */
export type PipelineError =
  | { kind: 'extraction_error'; path: string; stage: ExtractionStage; message: string }
  | { kind: 'read_error'; path: string; cause: Error }
  | { kind: 'storage_error'; operation: string; cause: Error }
  | { kind: 'compression_error'; path: string; cause: Error }
  | { kind: 'invalid_config'; message: string }

export type ExtractionStage = 'decompress' | 'unpack'

/**
 * Per-row parse failures. These never abort a run: the row is dropped and
 * counted instead.
 */
export type RowError =
  | { kind: 'field_count'; expected: string; actual: number }
  | { kind: 'invalid_date'; value: string }
  | { kind: 'invalid_integer'; field: string; value: string }
  | { kind: 'missing_field'; field: string }
  | { kind: 'no_measurement' }

/**
 * A discriminated union representing either success or failure.
 * @category Types
 * @group Result Types
 */
export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result containing a value.
 *
 * @category Core
 * @group Result Helpers
 *
 * @example
 * ```ts
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) return err('Division by zero')
 *   return ok(a / b)
 * }
 * ```
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing an error.
 *
 * @category Core
 * @group Result Helpers
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/** Statewide total water level for one day. `date` is the natural key. */
export type StatewideObservation = {
  date: string
  water_level: number
}

/**
 * Reservoir metadata keyed by station id. Every descriptive field is
 * nullable: an empty column in the metadata file means "unknown", never zero.
 */
export type Reservoir = {
  station_id: string
  dam_name: string | null
  lake_name: string | null
  stream_name: string | null
  capacity: number | null
  year_fill: number | null
}

/** Water level of one station on one day. Keyed by `(station_id, date)`. */
export type ReservoirObservation = {
  station_id: string
  date: string
  water_level: number
}

/**
 * Snow course station metadata keyed by station id. `elevation` is in feet;
 * coordinates are decimal degrees and `null` when absent or unparseable.
 */
export type SnowStation = {
  station_id: string
  name: string
  elevation: number
  river_basin: string | null
  county: string | null
  latitude: number | null
  longitude: number | null
}

/**
 * Snow measurements of one station on one day, in inches. Either value may be
 * `null`, never both.
 */
export type SnowObservation = {
  station_id: string
  date: string
  snow_water_equivalent: number | null
  snow_depth: number | null
}

export type RecordKind = 'statewide' | 'reservoir' | 'reservoir_observation' | 'snow_station' | 'snow_observation'

/**
 * Outcome of parsing one non-blank input row. `line` is 1-based and counts
 * every line of the payload, header included.
 */
export type RowOutcome<T> =
  | { ok: true; value: T; line: number }
  | { ok: false; error: RowError; line: number }

export type TableName =
  | 'statewide_observations'
  | 'reservoirs'
  | 'reservoir_observations'
  | 'snow_stations'
  | 'snow_observations'

export type PipelineStage = 'extract' | 'load' | 'compress'

export type PipelineEvent =
  | { type: 'stage_start'; stage: PipelineStage }
  | { type: 'stage_end'; stage: PipelineStage; duration_ms: number }
  | { type: 'archive_read'; path: string; entry: string; size_bytes: number }
  | { type: 'file_read'; path: string; size_bytes: number }
  | { type: 'row_dropped'; record: RecordKind; line: number; error: RowError }
  | { type: 'batch_written'; table: TableName; batch: number; rows: number; total: number }
  | { type: 'table_written'; table: TableName; written: number; ignored: number }
  | { type: 'artifact_written'; path: string; size_bytes: number }
  | { type: 'artifact_compressed'; path: string; original_bytes: number; compressed_bytes: number; ratio_percent: number }
  | { type: 'error'; error: PipelineError }

export type EventHandler = (event: PipelineEvent) => void

/**
 * Rows handed to a backend. Every stream is consumed exactly once, in order.
 * Backends that only materialize statewide data ignore the other streams.
 */
export type LoadInput = {
  statewide: Iterable<StatewideObservation>
  reservoirs?: Iterable<Reservoir>
  reservoir_observations?: Iterable<ReservoirObservation>
  snow_stations?: Iterable<SnowStation>
  snow_observations?: Iterable<SnowObservation>
}

/**
 * Per-table counters. `received` rows either end up `written` or are
 * `ignored` because their key was already present (first write wins).
 */
export type TableSummary = {
  table: TableName
  received: number
  written: number
  ignored: number
  batches: number
}

export type LoadSummary = {
  artifact_path: string | null
  tables: TableSummary[]
}

export type BackendKind = 'sqlite' | 'json' | 'memory'

/**
 * A storage target that materializes normalized rows.
 * @category Types
 * @group Backend Types
 *
 * File backends stage their output beside `artifact_path` and only replace
 * the artifact once every row has been written.
 */
export type Backend = {
  kind: BackendKind
  artifact_path: string | null
  load: (input: LoadInput) => Promise<Result<LoadSummary>>
  on_event?: EventHandler
}

export type CompressionReport = {
  source_path: string
  output_path: string
  original_bytes: number
  compressed_bytes: number
  ratio_percent: number
}
