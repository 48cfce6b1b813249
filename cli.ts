#!/usr/bin/env node

import { Argument, Command, InvalidArgumentError, Option } from "commander";
import { default_config, OutputBackendSchema, parse_config, type PipelineConfig } from "./config";
import { create_log_handler, create_logger, is_log_level, LOG_LEVELS } from "./logger";
import { format_summary, run_pipeline } from "./pipeline";
import { format_pipeline_error, match } from "./result";
import { err, type Result } from "./types";

export type CliOptions = {
	statewide?: string
	reservoirs?: string[]
	metadata?: string
	snowStations?: string
	snowObservations?: string
	output?: string
	batchSize?: number
	level?: number
	compress: boolean
	dryRun?: boolean
	logLevel: string
}

const parse_positive_int = (value: string): number => {
	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("expected a positive integer")
	}
	return parsed
}

/**
 * Merge command-line overrides onto the backend's defaults and validate.
 */
export function build_config(backend: string, options: CliOptions): Result<PipelineConfig> {
	const kind = OutputBackendSchema.safeParse(backend)
	if (!kind.success) return err({ kind: "invalid_config", message: `unknown backend "${backend}"` })

	const defaults = default_config(kind.data)
	return parse_config({
		...defaults,
		statewide_archive: options.statewide ?? defaults.statewide_archive,
		reservoir_archives: options.reservoirs ?? defaults.reservoir_archives,
		metadata_file: options.metadata ?? defaults.metadata_file,
		snow_stations_file: options.snowStations,
		snow_observations_file: options.snowObservations,
		output_path: options.output ?? defaults.output_path,
		batch_size: options.batchSize,
		compression_level: options.level,
		compress: options.compress,
		dry_run: options.dryRun ?? false,
	})
}

export function create_program(): Command {
	const program = new Command()

	program
		.name("reservoir-pack")
		.description("Pack reservoir level archives into a compressed SQLite database or JSON document")
		.version("0.1.0")
		.addArgument(new Argument("<backend>", "output format").choices(OutputBackendSchema.options))
		.option("--statewide <path>", "statewide totals archive (.tar.lzma)")
		.option("--reservoirs <paths...>", "per-reservoir observation archives (.tar.lzma), read in order")
		.option("--metadata <path>", "reservoir metadata CSV")
		.option("--snow-stations <path>", "snow station metadata CSV (sqlite only)")
		.option("--snow-observations <path>", "daily snow observations CSV (sqlite only)")
		.option("--output <path>", "artifact path")
		.option("--batch-size <rows>", "per-reservoir and snow observations per transaction", parse_positive_int)
		.option("--level <level>", "zstd compression level (1-22)", parse_positive_int)
		.option("--no-compress", "keep only the uncompressed artifact")
		.option("--dry-run", "parse and load in memory without writing files")
		.addOption(new Option("--log-level <level>", "log verbosity").choices(LOG_LEVELS).default("info"))
		.action(async (backend: string, options: CliOptions) => {
			const config = build_config(backend, options)
			if (!config.ok) {
				console.error(format_pipeline_error(config.error))
				process.exitCode = 1
				return
			}

			const logger = create_logger(is_log_level(options.logLevel) ? options.logLevel : "info")
			const result = await run_pipeline(config.value, { on_event: create_log_handler(logger) })
			match(
				result,
				(report) => {
					console.log(format_summary(report))
				},
				(error) => {
					console.error(format_pipeline_error(error))
					process.exitCode = 1
				},
			)
		})

	return program
}

async function main(): Promise<void> {
	const program = create_program()

	try {
		await program.parseAsync(process.argv)
	} catch (e) {
		console.error(e instanceof Error ? e.message : String(e))
		process.exitCode = 1
	}
}

if (require.main === module) {
	void main()
}
