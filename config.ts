/**
 * @module Config
 * @description Pipeline configuration: inputs, output, batching and
 * compression settings, validated up front.
 */

import { z } from "zod";
import { DEFAULT_BATCH_SIZE } from "./backend/base";
import { DEFAULT_COMPRESSED_SUFFIX, DEFAULT_COMPRESSION_LEVEL } from "./compress";
import { ok, err, type Result } from "./types";

export const OutputBackendSchema = z.enum(["sqlite", "json"])

export type OutputBackend = z.infer<typeof OutputBackendSchema>

export const PipelineConfigSchema = z
  .object({
    backend: OutputBackendSchema,
    statewide_archive: z.string().min(1),
    reservoir_archives: z.array(z.string().min(1)).default([]),
    metadata_file: z.string().min(1).optional(),
    snow_stations_file: z.string().min(1).optional(),
    snow_observations_file: z.string().min(1).optional(),
    output_path: z.string().min(1),
    batch_size: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
    compress: z.boolean().default(true),
    compression_level: z.number().int().min(1).max(22).default(DEFAULT_COMPRESSION_LEVEL),
    compressed_suffix: z.string().min(1).default(DEFAULT_COMPRESSED_SUFFIX),
    dry_run: z.boolean().default(false),
  })
  .refine((config) => config.backend !== "sqlite" || config.metadata_file !== undefined, {
    message: "metadata_file is required for the sqlite backend",
    path: ["metadata_file"],
  })

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>

/**
 * Input and output locations used when nothing else is given, relative to
 * the working directory.
 */
export const DEFAULT_PATHS = {
  statewide_archive: "../fixtures/cumulative_v2.tar.lzma",
  reservoir_archive: "../fixtures/reservoirs.tar.lzma",
  metadata_file: "../fixtures/capacity.csv",
  sqlite_output: "data/reservoir_data.db",
  json_output: "data/reservoir_data.json",
} as const

/**
 * Default configuration for a backend. The JSON document only carries
 * statewide observations, so it reads neither metadata nor per-reservoir
 * archives. Snow inputs are opt-in and have no default.
 */
export function default_config(backend: OutputBackend): PipelineConfigInput {
  if (backend === "json") {
    return {
      backend,
      statewide_archive: DEFAULT_PATHS.statewide_archive,
      output_path: DEFAULT_PATHS.json_output,
    }
  }
  return {
    backend,
    statewide_archive: DEFAULT_PATHS.statewide_archive,
    reservoir_archives: [DEFAULT_PATHS.reservoir_archive],
    metadata_file: DEFAULT_PATHS.metadata_file,
    output_path: DEFAULT_PATHS.sqlite_output,
  }
}

/**
 * Validate raw configuration, filling in defaults.
 *
 * @example
 * ```ts
 * const config = parse_config({ ...default_config('sqlite'), batch_size: 5000 })
 * if (!config.ok) console.error(config.error.message)
 * ```
 */
export function parse_config(raw: unknown): Result<PipelineConfig> {
  const parsed = PipelineConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ")
    return err({ kind: "invalid_config", message })
  }
  return ok(parsed.data)
}
