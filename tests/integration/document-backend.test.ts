import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { create_document_backend } from "../../backend/document";
import { statewide_document_codec } from "../../codec";
import type { PipelineEvent, StatewideObservation } from "../../types";
import { make_temp_dir, remove_dir } from "./helpers";

describe("document backend", () => {
	let dir: string;
	let path: string;

	beforeEach(async () => {
		dir = await make_temp_dir();
		path = join(dir, "data", "reservoir_data.json");
	});

	afterEach(async () => {
		await remove_dir(dir);
	});

	it("writes ordered pairs as compact JSON", async () => {
		const result = await create_document_backend({ path }).load({
			statewide: [
				{ date: "2023-06-15", water_level: 1234567 },
				{ date: "2023-06-16", water_level: 1234012 },
			],
		});

		expect(result).toEqual({
			ok: true,
			value: {
				artifact_path: path,
				tables: [{ table: "statewide_observations", received: 2, written: 2, ignored: 0, batches: 1 }],
			},
		});
		expect(await readFile(path, "utf8")).toBe('{"observations":[["2023-06-15",1234567],["2023-06-16",1234012]]}');
	});

	it("keeps the first level for a repeated date", async () => {
		await create_document_backend({ path }).load({
			statewide: [
				{ date: "2023-06-15", water_level: 1 },
				{ date: "2023-06-15", water_level: 2 },
			],
		});

		expect(await readFile(path, "utf8")).toBe('{"observations":[["2023-06-15",1]]}');
	});

	it("writes an empty list for an empty stream", async () => {
		await create_document_backend({ path }).load({ statewide: [] });

		expect(await readFile(path, "utf8")).toBe('{"observations":[]}');
	});

	it("ignores the reservoir streams", async () => {
		const result = await create_document_backend({ path }).load({
			statewide: [],
			reservoirs: [{ station_id: "SHA", dam_name: null, lake_name: null, stream_name: null, capacity: null, year_fill: null }],
			reservoir_observations: [{ station_id: "SHA", date: "2023-06-15", water_level: 1 }],
		});

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.tables.map((t) => t.table)).toEqual(["statewide_observations"]);
	});

	it("round-trips through the codec byte for byte", async () => {
		await create_document_backend({ path }).load({
			statewide: [
				{ date: "2001-02-03", water_level: -4 },
				{ date: "2001-02-04", water_level: 0 },
			],
		});

		const bytes = await readFile(path);
		const decoded = statewide_document_codec.decode(bytes);
		expect(Buffer.from(statewide_document_codec.encode(decoded)).equals(bytes)).toBe(true);
	});

	it("leaves the previous document in place when the stream fails", async () => {
		await mkdir(join(dir, "data"), { recursive: true });
		await writeFile(path, '{"observations":[]}');
		const events: PipelineEvent[] = [];

		function* failing(): Generator<StatewideObservation> {
			throw new Error("stream broke");
		}

		const result = await create_document_backend({ path, on_event: (e) => events.push(e) }).load({ statewide: failing() });

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toMatchObject({ kind: "storage_error", operation: "document.collect" });
		expect(events).toEqual([{ type: "error", error: result.error }]);
		expect(await readFile(path, "utf8")).toBe('{"observations":[]}');
		expect(existsSync(`${path}.partial`)).toBe(false);
	});

	it("reports the artifact size", async () => {
		const events: PipelineEvent[] = [];
		await create_document_backend({ path, on_event: (e) => events.push(e) }).load({ statewide: [] });

		expect(events.at(-1)).toEqual({ type: "artifact_written", path, size_bytes: 19 });
	});
});
