/**
 * @module Logging
 * @description Structured logging of pipeline events through pino.
 */

import pino, { stdTimeFunctions, type Logger, type LevelWithSilent } from "pino";
import { format_pipeline_error } from "./result";
import type { EventHandler, PipelineEvent } from "./types";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LevelWithSilent[]

export type LogLevel = (typeof LOG_LEVELS)[number]

export const is_log_level = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value)

/**
 * Logger writing JSON lines with ISO timestamps to stderr, so stdout stays
 * free for the run summary.
 */
export function create_logger(level: LogLevel = "info"): Logger {
	return pino({ level, base: undefined, timestamp: stdTimeFunctions.isoTime }, pino.destination(2))
}

/**
 * Bridge pipeline events onto a logger. Dropped rows go to `debug`, since a
 * real archive carries thousands of placeholder values; fatal errors go to
 * `error`; everything else is progress at `info`.
 *
 * @example
 * ```ts
 * const logger = create_logger('debug')
 * await run_pipeline(config, { on_event: create_log_handler(logger) })
 * ```
 */
export function create_log_handler(logger: Logger): EventHandler {
	return (event: PipelineEvent) => {
		switch (event.type) {
			case "row_dropped":
				logger.debug({ record: event.record, line: event.line, reason: event.error }, "row dropped")
				return
			case "error":
				logger.error({ kind: event.error.kind }, format_pipeline_error(event.error))
				return
			case "stage_start":
				logger.info({ stage: event.stage }, `${event.stage} started`)
				return
			case "stage_end":
				logger.info({ stage: event.stage, duration_ms: event.duration_ms }, `${event.stage} finished`)
				return
			case "archive_read":
				logger.info({ path: event.path, entry: event.entry, size_bytes: event.size_bytes }, "archive read")
				return
			case "file_read":
				logger.info({ path: event.path, size_bytes: event.size_bytes }, "file read")
				return
			case "batch_written":
				logger.info({ table: event.table, batch: event.batch, rows: event.rows, total: event.total }, "batch written")
				return
			case "table_written":
				logger.info({ table: event.table, written: event.written, ignored: event.ignored }, "table written")
				return
			case "artifact_written":
				logger.info({ path: event.path, size_bytes: event.size_bytes }, "artifact written")
				return
			case "artifact_compressed":
				logger.info(
					{ path: event.path, original_bytes: event.original_bytes, compressed_bytes: event.compressed_bytes, ratio_percent: event.ratio_percent },
					"artifact compressed",
				)
				return
		}
	}
}
