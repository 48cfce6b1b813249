export { run_pipeline, create_backend, format_summary, RECORD_KINDS, type PipelineReport, type RunOptions } from "./pipeline";

export { read_archive, unpack_first_file, type ArchivePayload, type ReadArchiveOptions } from "./archive";
export {
	parse_statewide,
	parse_reservoirs,
	parse_reservoir_observations,
	parse_snow_stations,
	parse_snow_observations,
	accepted_rows,
	collect_rows,
	RESERVOIR_COLUMNS,
	SNOW_STATION_COLUMNS,
	FIELD_DELIMITER,
} from "./records";
export { normalize_date, parse_integer, parse_optional_integer, parse_optional_decimal, normalize_text } from "./normalize";

export { create_memory_backend, type MemoryBackend, type MemoryBackendOptions, type MemorySnapshot } from "./backend/memory";
export { create_sqlite_backend, type SqliteBackendConfig } from "./backend/sqlite";
export { create_document_backend, type DocumentBackendConfig } from "./backend/document";
export { DEFAULT_BATCH_SIZE, write_table, type TableWriter } from "./backend/base";

export { compress_artifact, compression_ratio, format_report, DEFAULT_COMPRESSION_LEVEL, DEFAULT_COMPRESSED_SUFFIX, type CompressOptions } from "./compress";
export { with_staged_artifact, staging_path_for, STAGING_SUFFIX } from "./artifact";

export { json_codec, statewide_document_codec, type Codec, type StatewideDocument } from "./codec";

export {
	statewide_observations,
	reservoirs,
	reservoir_observations,
	snow_stations,
	snow_observations,
	RESERVOIR_SCHEMA_SQL,
	type StatewideObservationRow,
	type ReservoirRow,
	type ReservoirObservationRow,
	type SnowStationRow,
	type SnowObservationRow,
} from "./schema";

export { parse_config, default_config, DEFAULT_PATHS, PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput, type OutputBackend } from "./config";
export { create_logger, create_log_handler, type LogLevel } from "./logger";

export type {
	PipelineError,
	RowError,
	Result,
	StatewideObservation,
	Reservoir,
	ReservoirObservation,
	SnowStation,
	SnowObservation,
	RecordKind,
	RowOutcome,
	TableName,
	PipelineEvent,
	EventHandler,
	LoadInput,
	LoadSummary,
	TableSummary,
	Backend,
	BackendKind,
	CompressionReport,
} from "./types";

export { ok, err } from "./types";

export { match, unwrap, unwrap_err, unwrap_or, try_catch, try_catch_async, pipe, format_error, format_pipeline_error, type Pipe } from "./result";
