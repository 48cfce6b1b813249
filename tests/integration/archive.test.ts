import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { read_archive } from "../../archive";
import type { PipelineEvent } from "../../types";
import { make_temp_dir, remove_dir, write_archive, write_directory_archive, write_truncated_archive, xz_bytes } from "./helpers";

describe("read_archive", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await make_temp_dir();
	});

	afterEach(async () => {
		await remove_dir(dir);
	});

	test("returns the text of the single file entry", async () => {
		const path = await write_archive(dir, "statewide.tar.lzma", { "cumulative.csv": "20230615,1234567\n" });
		const events: PipelineEvent[] = [];

		const result = await read_archive(path, { on_event: e => events.push(e) });

		expect(result).toEqual({
			ok: true,
			value: { path, entry: "cumulative.csv", size_bytes: 17, text: "20230615,1234567\n" },
		});
		expect(events).toEqual([{ type: "archive_read", path, entry: "cumulative.csv", size_bytes: 17 }]);
	});

	test("uses the first file when the archive holds several", async () => {
		const path = await write_archive(dir, "multi.tar.lzma", { "first.csv": "a", "second.csv": "b" });

		const result = await read_archive(path);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.entry).toBe("first.csv");
		expect(result.value.text).toBe("a");
	});

	test("fails with read_error for a missing file", async () => {
		const path = join(dir, "missing.tar.lzma");

		const result = await read_archive(path);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("read_error");
		if (result.error.kind !== "read_error") return;
		expect(result.error.path).toBe(path);
	});

	test("fails in the decompress stage for bytes that are not xz", async () => {
		const path = join(dir, "corrupt.tar.lzma");
		await writeFile(path, "definitely not an xz stream");

		const result = await read_archive(path);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toMatchObject({ kind: "extraction_error", path, stage: "decompress" });
	});

	test("fails in the unpack stage when the payload is not a tar archive", async () => {
		const path = join(dir, "not-tar.tar.lzma");
		await writeFile(path, xz_bytes("x".repeat(1024)));

		const result = await read_archive(path);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toMatchObject({ kind: "extraction_error", path, stage: "unpack" });
	});

	test("fails in the unpack stage when the tar body is cut short", async () => {
		const path = await write_truncated_archive(dir, "truncated.tar.lzma");
		const events: PipelineEvent[] = [];

		const result = await read_archive(path, { on_event: e => events.push(e) });

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toMatchObject({ kind: "extraction_error", path, stage: "unpack" });
		expect(events).toEqual([]);
	});

	test("fails when the archive has no file entry", async () => {
		const path = await write_directory_archive(dir, "empty.tar.lzma");

		const result = await read_archive(path);

		expect(result).toEqual({
			ok: false,
			error: { kind: "extraction_error", path, stage: "unpack", message: "archive contains no file entry" },
		});
	});
});
