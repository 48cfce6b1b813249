import { describe, test, expect } from "vitest";
import { match, unwrap_or, unwrap, unwrap_err, try_catch, try_catch_async, pipe, format_error, to_error, format_pipeline_error } from "../../result";
import { ok, err, type PipelineError, type Result } from "../../types";

describe("Result Utilities", () => {
	describe("match", () => {
		test("calls on_ok for success result", () => {
			const output = match(
				ok(42),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("success: 42");
		});

		test("calls on_err for error result", () => {
			const output = match(
				err("something went wrong"),
				value => `success: ${value}`,
				error => `error: ${error}`
			);
			expect(output).toBe("error: something went wrong");
		});
	});

	describe("unwrap_or", () => {
		test("returns value for ok result", () => {
			expect(unwrap_or(ok(42), 0)).toBe(42);
		});

		test("returns default for error result", () => {
			const result: Result<number, string> = err("error");
			expect(unwrap_or(result, 100)).toBe(100);
		});
	});

	describe("unwrap", () => {
		test("returns value for ok result", () => {
			expect(unwrap(ok("hello"))).toBe("hello");
		});

		test("includes error in thrown message", () => {
			expect(() => unwrap(err({ kind: "invalid_config", message: "bad" }))).toThrow(
				'unwrap called on error result: {"kind":"invalid_config","message":"bad"}'
			);
		});
	});

	describe("unwrap_err", () => {
		test("returns error for error result", () => {
			expect(unwrap_err(err("failed"))).toBe("failed");
		});

		test("throws for ok result", () => {
			expect(() => unwrap_err(ok(7))).toThrow("unwrap_err called on ok result: 7");
		});
	});

	describe("try_catch", () => {
		test("returns ok for successful function", () => {
			const result = try_catch(() => JSON.parse('{"a":1}'), format_error);
			expect(result).toEqual({ ok: true, value: { a: 1 } });
		});

		test("maps thrown exception through the error mapper", () => {
			const result = try_catch(() => {
				throw new Error("boom");
			}, format_error);
			expect(result).toEqual({ ok: false, error: "boom" });
		});

		test("handles non-Error thrown values", () => {
			const result = try_catch(() => {
				throw "plain string";
			}, to_error);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error).toBeInstanceOf(Error);
			expect(result.error.message).toBe("plain string");
		});
	});

	describe("try_catch_async", () => {
		test("returns ok for resolved promise", async () => {
			const result = await try_catch_async(async () => 5, format_error);
			expect(result).toEqual({ ok: true, value: 5 });
		});

		test("returns error for rejected promise", async () => {
			const result = await try_catch_async(() => Promise.reject(new Error("rejected")), format_error);
			expect(result).toEqual({ ok: false, error: "rejected" });
		});
	});

	describe("pipe", () => {
		test("chains map and flat_map on success", async () => {
			const result = await pipe<number, string>(ok(2))
				.map(n => n * 10)
				.flat_map((n): Result<string, string> => (n > 10 ? ok(`${n}`) : err("too small")))
				.result();
			expect(result).toEqual({ ok: true, value: "20" });
		});

		test("short-circuits after an error", async () => {
			let mapped = false;
			const result = await pipe<number, string>(err("first"))
				.map(n => {
					mapped = true;
					return n + 1;
				})
				.result();
			expect(mapped).toBe(false);
			expect(result).toEqual({ ok: false, error: "first" });
		});

		test("map_err transforms only the error", async () => {
			const result = await pipe<number, string>(Promise.resolve(err("ENOENT")))
				.map_err(message => ({ code: message }))
				.result();
			expect(result).toEqual({ ok: false, error: { code: "ENOENT" } });
		});

		test("tap and tap_err run side effects without changing the result", async () => {
			const seen: string[] = [];
			const success = await pipe(ok("a")).tap(v => { seen.push(`ok:${v}`); }).tap_err(() => { seen.push("err"); }).result();
			const failure = await pipe<string, string>(err("b")).tap(() => { seen.push("ok"); }).tap_err(e => { seen.push(`err:${e}`); }).result();
			expect(success).toEqual({ ok: true, value: "a" });
			expect(failure).toEqual({ ok: false, error: "b" });
			expect(seen).toEqual(["ok:a", "err:b"]);
		});
	});

	describe("format_pipeline_error", () => {
		const cases: Array<[PipelineError, string]> = [
			[
				{ kind: "extraction_error", path: "a.tar.lzma", stage: "decompress", message: "corrupt" },
				"extraction failed (decompress) for a.tar.lzma: corrupt",
			],
			[{ kind: "read_error", path: "capacity.csv", cause: new Error("ENOENT") }, "cannot read capacity.csv: ENOENT"],
			[{ kind: "storage_error", operation: "rename", cause: new Error("EACCES") }, "storage failed during rename: EACCES"],
			[{ kind: "compression_error", path: "out.db", cause: new Error("oom") }, "compression failed for out.db: oom"],
			[{ kind: "invalid_config", message: "batch_size: too small" }, "invalid configuration: batch_size: too small"],
		];

		test.each(cases)("renders %o", (error, expected) => {
			expect(format_pipeline_error(error)).toBe(expected);
		});
	});
});
