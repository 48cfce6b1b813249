/**
 * @module Archive
 * @description Reads `.tar.lzma` containers: an xz stream wrapping a tar
 * archive whose single file is the delimited-text payload.
 */

import { readFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { xz } from "@napi-rs/lzma";
import tar from "tar";
import type { ReadEntry } from "tar";
import { format_error, to_error, try_catch_async } from "./result";
import { ok, err, type EventHandler, type Result } from "./types";
import { create_emitter } from "./utils";

export type ArchivePayload = {
	path: string
	/** Name of the tar entry the payload came from. */
	entry: string
	size_bytes: number
	text: string
}

export type ReadArchiveOptions = {
	on_event?: EventHandler
}

type TarEntry = { name: string; bytes: Buffer }

/**
 * Unpack the first regular file of an in-memory tar archive. Resolves to
 * `null` when the archive holds no file entry. Later entries are drained
 * without being buffered. The parser runs in strict mode, so any warning
 * (bad header, truncated body) rejects.
 */
export async function unpack_first_file(archive: Uint8Array): Promise<TarEntry | null> {
	const found: Array<{ name: string; chunks: Buffer[] }> = []

	const parser = tar.list({
		strict: true,
		onentry: (entry: ReadEntry) => {
			if (found.length > 0 || entry.type !== "File") return
			const current = { name: entry.path, chunks: new Array<Buffer>() }
			found.push(current)
			entry.on("data", (chunk: Buffer) => {
				current.chunks.push(chunk)
			})
		},
	})

	await pipeline(Readable.from([Buffer.from(archive)]), parser)

	const [first] = found
	if (first === undefined) return null
	return { name: first.name, bytes: Buffer.concat(first.chunks) }
}

/**
 * Decode a two-stage container into its text payload.
 *
 * All-or-nothing: a missing file, a corrupt xz stream, a malformed tar or an
 * archive without a file entry each fail the call and no text is returned.
 * Nothing is written to disk.
 *
 * @example
 * ```ts
 * const result = await read_archive('../fixtures/cumulative_v2.tar.lzma')
 * if (result.ok) {
 *   for (const row of parse_statewide(result.value.text)) { ... }
 * }
 * ```
 */
export async function read_archive(path: string, opts: ReadArchiveOptions = {}): Promise<Result<ArchivePayload>> {
	const emit = create_emitter(opts.on_event)

	const compressed = await try_catch_async(() => readFile(path), (e) => to_error(e))
	if (!compressed.ok) {
		return err({ kind: "read_error", path, cause: compressed.error })
	}

	const decompressed = await try_catch_async(() => xz.decompress(compressed.value), format_error)
	if (!decompressed.ok) {
		return err({ kind: "extraction_error", path, stage: "decompress", message: decompressed.error })
	}

	const unpacked = await try_catch_async(() => unpack_first_file(decompressed.value), format_error)
	if (!unpacked.ok) {
		return err({ kind: "extraction_error", path, stage: "unpack", message: unpacked.error })
	}
	if (unpacked.value === null) {
		return err({ kind: "extraction_error", path, stage: "unpack", message: "archive contains no file entry" })
	}

	const { name, bytes } = unpacked.value
	emit({ type: "archive_read", path, entry: name, size_bytes: bytes.length })
	return ok({ path, entry: name, size_bytes: bytes.length, text: bytes.toString("utf8") })
}
