/**
 * @module Compress
 * @description zstd compression of finished artifacts, with size reporting.
 */

import { readFile, writeFile } from "node:fs/promises";
import { compress, init } from "@bokuweb/zstd-wasm";
import { with_staged_artifact } from "./artifact";
import { to_error, try_catch_async } from "./result";
import { ok, err, type CompressionReport, type EventHandler, type Result } from "./types";
import { create_emitter, format_number } from "./utils";

export const DEFAULT_COMPRESSION_LEVEL = 19
export const DEFAULT_COMPRESSED_SUFFIX = ".zst"

export type CompressOptions = {
	level?: number
	suffix?: string
	on_event?: EventHandler
}

let ready: Promise<void> | null = null

// the wasm module is instantiated once per process
const ensure_initialized = (): Promise<void> => {
	ready ??= init()
	return ready
}

/**
 * Compressed size as a percentage of the original, `0` for an empty input.
 */
export function compression_ratio(original_bytes: number, compressed_bytes: number): number {
	if (original_bytes === 0) return 0
	return (compressed_bytes / original_bytes) * 100
}

/**
 * Compress `source_path` into `source_path + suffix`, replacing any previous
 * compressed file.
 *
 * The source artifact is only read. The compressed output is staged and
 * renamed into place, so a failure leaves both the source and any earlier
 * compressed file as they were.
 *
 * @example
 * ```ts
 * const result = await compress_artifact('data/reservoir_data.db')
 * if (result.ok) console.log(format_report(result.value))
 * ```
 */
export async function compress_artifact(source_path: string, opts: CompressOptions = {}): Promise<Result<CompressionReport>> {
	const level = opts.level ?? DEFAULT_COMPRESSION_LEVEL
	const output_path = `${source_path}${opts.suffix ?? DEFAULT_COMPRESSED_SUFFIX}`
	const emit = create_emitter(opts.on_event)

	const source = await try_catch_async(() => readFile(source_path), to_error)
	if (!source.ok) {
		const error = { kind: "read_error", path: source_path, cause: source.error } as const
		emit({ type: "error", error })
		return err(error)
	}

	const compressed = await try_catch_async(async () => {
		await ensure_initialized()
		return compress(source.value, level)
	}, to_error)
	if (!compressed.ok) {
		const error = { kind: "compression_error", path: source_path, cause: compressed.error } as const
		emit({ type: "error", error })
		return err(error)
	}

	const written = await with_staged_artifact(output_path, async (staging_path) => {
		await writeFile(staging_path, compressed.value)
		return ok(compressed.value.length)
	})
	if (!written.ok) {
		emit({ type: "error", error: written.error })
		return written
	}

	const report: CompressionReport = {
		source_path,
		output_path,
		original_bytes: source.value.length,
		compressed_bytes: written.value,
		ratio_percent: compression_ratio(source.value.length, written.value),
	}
	emit({
		type: "artifact_compressed",
		path: output_path,
		original_bytes: report.original_bytes,
		compressed_bytes: report.compressed_bytes,
		ratio_percent: report.ratio_percent,
	})
	return ok(report)
}

/**
 * Operator-facing summary of a compression run.
 *
 * @example
 * ```ts
 * format_report({ original_bytes: 1234567, compressed_bytes: 123456, ratio_percent: 9.99995, ... })
 * // => 'Original size: 1,234,567 bytes\nCompressed size: 123,456 bytes\nCompression ratio: 10.00%'
 * ```
 */
export function format_report(report: CompressionReport): string {
	return [
		`Original size: ${format_number(report.original_bytes)} bytes`,
		`Compressed size: ${format_number(report.compressed_bytes)} bytes`,
		`Compression ratio: ${report.ratio_percent.toFixed(2)}%`,
	].join("\n")
}
