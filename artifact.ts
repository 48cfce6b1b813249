/**
 * @module Artifact
 * @description Staged writes: output is built beside its final path and only
 * renamed into place once complete, so readers never observe a half-written
 * artifact and a failed run leaves the previous one untouched.
 */

import { mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { to_error, try_catch_async } from "./result";
import { err, type PipelineError, type Result } from "./types";

export const STAGING_SUFFIX = ".partial"

export function staging_path_for(artifact_path: string): string {
	return `${artifact_path}${STAGING_SUFFIX}`
}

const storage_error = (operation: string) => (e: unknown): PipelineError => ({ kind: "storage_error", operation, cause: to_error(e) })

/**
 * Run `write` against a staging path, then atomically rename the staged file
 * over `artifact_path`.
 *
 * - A staging file left behind by an earlier crash is removed first.
 * - If `write` fails (or throws), or the final rename fails, the staging
 *   file is removed and the existing artifact, if any, is left as it was.
 * - `write` must have closed every handle on the staging file before it
 *   resolves.
 *
 * @example
 * ```ts
 * const result = await with_staged_artifact('data/reservoir_data.json', async (staging) => {
 *   await writeFile(staging, body)
 *   return ok(body.length)
 * })
 * ```
 */
export async function with_staged_artifact<T>(
	artifact_path: string,
	write: (staging_path: string) => Promise<Result<T>>,
): Promise<Result<T>> {
	const staging_path = staging_path_for(artifact_path)

	const prepared = await try_catch_async(async () => {
		await mkdir(dirname(artifact_path), { recursive: true })
		await rm(staging_path, { force: true })
	}, storage_error("prepare"))
	if (!prepared.ok) return prepared

	const written = await try_catch_async(() => write(staging_path), storage_error("write"))
	const outcome = written.ok ? written.value : written

	if (!outcome.ok) return discard(staging_path, outcome.error)

	const renamed = await try_catch_async(() => rename(staging_path, artifact_path), storage_error("rename"))
	if (!renamed.ok) return discard(staging_path, renamed.error)
	return outcome
}

// the failure that stopped the write is the one reported, even when the
// staging file cannot be removed afterwards
async function discard(staging_path: string, error: PipelineError): Promise<Result<never>> {
	await try_catch_async(() => rm(staging_path, { force: true }), storage_error("cleanup"))
	return err(error)
}

/**
 * Size of a file in bytes.
 */
export async function file_size(path: string): Promise<Result<number>> {
	return try_catch_async(async () => (await stat(path)).size, (e): PipelineError => ({ kind: "read_error", path, cause: to_error(e) }))
}
