/**
 * @module Pipeline
 * @description End-to-end run: extract every input, load the configured
 * backend, compress the artifact.
 */

import { readFile } from "node:fs/promises";
import { read_archive, type ArchivePayload } from "./archive";
import { create_document_backend } from "./backend/document";
import { create_memory_backend } from "./backend/memory";
import { create_sqlite_backend } from "./backend/sqlite";
import { compress_artifact, format_report } from "./compress";
import type { PipelineConfig } from "./config";
import {
  accepted_rows,
  parse_reservoir_observations,
  parse_reservoirs,
  parse_snow_observations,
  parse_snow_stations,
  parse_statewide,
} from "./records";
import { pipe, to_error, try_catch_async } from "./result";
import type {
  Backend,
  BackendKind,
  CompressionReport,
  EventHandler,
  LoadInput,
  LoadSummary,
  PipelineError,
  PipelineEvent,
  PipelineStage,
  RecordKind,
  Result,
  RowError,
} from "./types";
import { ok } from "./types";
import { create_emitter, elapsed, format_number } from "./utils";

export type PipelineReport = {
  backend: BackendKind
  load: LoadSummary
  /** Rows rejected by the parsers, per record kind. */
  dropped: Record<RecordKind, number>
  compression?: CompressionReport
  duration_ms: number
}

export type RunOptions = {
  on_event?: EventHandler
}

type Emit = (event: PipelineEvent) => void

export const RECORD_KINDS = [
  "statewide",
  "reservoir",
  "reservoir_observation",
  "snow_station",
  "snow_observation",
] as const satisfies readonly RecordKind[]

type Inputs = {
  statewide: ArchivePayload
  metadata: string | null
  reservoir_archives: ArchivePayload[]
  snow_stations: string | null
  snow_observations: string | null
}

const read_text_file = (path: string, emit: Emit): Promise<Result<string>> =>
  pipe(try_catch_async(() => readFile(path), to_error))
    .map_err((cause): PipelineError => ({ kind: "read_error", path, cause }))
    .tap((bytes) => emit({ type: "file_read", path, size_bytes: bytes.length }))
    .map((bytes) => bytes.toString("utf8"))
    .result()

const read_optional_text_file = async (path: string | undefined, emit: Emit): Promise<Result<string | null>> =>
  path === undefined ? ok(null) : read_text_file(path, emit)

/**
 * Read every input the configured backend needs. The document backend only
 * materializes statewide totals, so it skips metadata, per-reservoir archives
 * and snow files entirely.
 */
async function extract(config: PipelineConfig, emit: Emit): Promise<Result<Inputs>> {
  const statewide = await read_archive(config.statewide_archive, { on_event: emit })
  if (!statewide.ok) return statewide

  if (config.backend === "json") {
    return ok({ statewide: statewide.value, metadata: null, reservoir_archives: [], snow_stations: null, snow_observations: null })
  }

  const metadata = await read_optional_text_file(config.metadata_file, emit)
  if (!metadata.ok) return metadata

  const reservoir_archives: ArchivePayload[] = []
  for (const path of config.reservoir_archives) {
    const payload = await read_archive(path, { on_event: emit })
    if (!payload.ok) return payload
    reservoir_archives.push(payload.value)
  }

  const snow_stations = await read_optional_text_file(config.snow_stations_file, emit)
  if (!snow_stations.ok) return snow_stations
  const snow_observations = await read_optional_text_file(config.snow_observations_file, emit)
  if (!snow_observations.ok) return snow_observations

  return ok({
    statewide: statewide.value,
    metadata: metadata.value,
    reservoir_archives,
    snow_stations: snow_stations.value,
    snow_observations: snow_observations.value,
  })
}

function* concat<T>(sources: Iterable<Iterable<T>>): Generator<T> {
  for (const source of sources) yield* source
}

/**
 * Lazy row streams over the extracted payloads. Rejected rows are counted
 * into `dropped` and reported as they are reached, so the counts are final
 * only once the backend has drained every stream.
 */
function build_streams(inputs: Inputs, dropped: Record<RecordKind, number>, emit: Emit): LoadInput {
  const on_drop = (record: RecordKind) => (line: number, error: RowError) => {
    dropped[record]++
    emit({ type: "row_dropped", record, line, error })
  }

  const observations = inputs.reservoir_archives.map((payload) => parse_reservoir_observations(payload.text))

  return {
    statewide: accepted_rows(parse_statewide(inputs.statewide.text), on_drop("statewide")),
    reservoirs: inputs.metadata === null ? [] : accepted_rows(parse_reservoirs(inputs.metadata), on_drop("reservoir")),
    reservoir_observations: accepted_rows(concat(observations), on_drop("reservoir_observation")),
    snow_stations: inputs.snow_stations === null ? [] : accepted_rows(parse_snow_stations(inputs.snow_stations), on_drop("snow_station")),
    snow_observations:
      inputs.snow_observations === null ? [] : accepted_rows(parse_snow_observations(inputs.snow_observations), on_drop("snow_observation")),
  }
}

/**
 * The backend a configuration writes to. Dry runs load into memory and
 * produce no file.
 */
export function create_backend(config: PipelineConfig, on_event?: EventHandler): Backend {
  if (config.dry_run) return create_memory_backend({ batch_size: config.batch_size, on_event })
  switch (config.backend) {
    case "sqlite":
      return create_sqlite_backend({ path: config.output_path, batch_size: config.batch_size, on_event })
    case "json":
      return create_document_backend({ path: config.output_path, on_event })
  }
}

/**
 * Run the whole pipeline.
 *
 * Inputs are read and decoded before the backend is created, so a missing
 * or corrupt archive fails the run without touching an existing artifact.
 * Malformed rows are dropped and counted, never fatal.
 *
 * @example
 * ```ts
 * const config = parse_config(default_config('sqlite'))
 * if (config.ok) {
 *   const result = await run_pipeline(config.value, { on_event: create_log_handler(create_logger()) })
 *   if (result.ok) console.log(format_summary(result.value))
 * }
 * ```
 */
export async function run_pipeline(config: PipelineConfig, opts: RunOptions = {}): Promise<Result<PipelineReport>> {
  const emit = create_emitter(opts.on_event)
  const started = Date.now()

  const stage = async <T>(name: PipelineStage, fn: () => Promise<Result<T>>): Promise<Result<T>> => {
    const stage_started = Date.now()
    emit({ type: "stage_start", stage: name })
    const result = await fn()
    emit({ type: "stage_end", stage: name, duration_ms: elapsed(stage_started) })
    return result
  }

  const inputs = await stage("extract", () => extract(config, emit))
  if (!inputs.ok) {
    emit({ type: "error", error: inputs.error })
    return inputs
  }

  const dropped: Record<RecordKind, number> = { statewide: 0, reservoir: 0, reservoir_observation: 0, snow_station: 0, snow_observation: 0 }
  const backend = create_backend(config, opts.on_event)
  const load = await stage("load", () => backend.load(build_streams(inputs.value, dropped, emit)))
  if (!load.ok) return load

  const report: PipelineReport = { backend: backend.kind, load: load.value, dropped, duration_ms: 0 }

  const artifact_path = load.value.artifact_path
  if (config.compress && artifact_path !== null) {
    const compression = await stage("compress", () =>
      compress_artifact(artifact_path, { level: config.compression_level, suffix: config.compressed_suffix, on_event: opts.on_event }))
    if (!compression.ok) return compression
    report.compression = compression.value
  }

  report.duration_ms = elapsed(started)
  return ok(report)
}

/**
 * Operator-facing summary: per-table counts, dropped rows, and the
 * compression report when there is one.
 *
 * @example
 * ```ts
 * format_summary(report)
 * // statewide_observations: 3 written, 1 ignored
 * // reservoirs: 2 written, 0 ignored
 * // reservoir_observations: 4 written, 0 ignored
 * // snow_stations: 0 written, 0 ignored
 * // snow_observations: 0 written, 0 ignored
 * // Dropped rows: statewide 1, reservoir 0, reservoir_observation 2, snow_station 0, snow_observation 0
 * ```
 */
export function format_summary(report: PipelineReport): string {
  const lines = report.load.tables.map((table) =>
    `${table.table}: ${format_number(table.written)} written, ${format_number(table.ignored)} ignored`)
  lines.push(`Dropped rows: ${RECORD_KINDS.map((kind) => `${kind} ${report.dropped[kind]}`).join(", ")}`)
  if (report.load.artifact_path !== null) lines.push(`Artifact: ${report.load.artifact_path}`)
  if (report.compression !== undefined) lines.push(format_report(report.compression))
  return lines.join("\n")
}
