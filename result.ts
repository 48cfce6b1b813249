/**
 * @module Result
 * @description Utilities for working with Result types.
 *
 * - Pattern matching with `match`
 * - Unwrapping with `unwrap`, `unwrap_err` (tests and invariant checks only), `unwrap_or`
 * - Exception-to-Result conversion with `try_catch`, `try_catch_async`
 * - Composable pipelines with `pipe`
 */

import { ok, err, type Result, type PipelineError } from "./types";

/**
 * Pattern match on a Result, extracting the value with appropriate handler.
 *
 * @example
 * ```ts
 * const line = match(
 *   await run_pipeline(config),
 *   report => `loaded ${report.load.tables.length} tables`,
 *   error => format_pipeline_error(error)
 * )
 * ```
 */
export const match = <T, E, R>(result: Result<T, E>, on_ok: (value: T) => R, on_err: (error: E) => R): R => {
	if (result.ok) return on_ok(result.value);
	return on_err(result.error);
};

/**
 * Extract value from Result, throwing if error.
 * Use only when you're certain the Result is Ok, or in tests.
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/**
 * Extract error from Result, throwing if Ok.
 * Use only when you're certain the Result is Err, or in tests.
 */
export const unwrap_err = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrap_err called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};

/**
 * Extract value from Result, or return the default if error.
 */
export const unwrap_or = <T, E>(result: Result<T, E>, default_value: T): T => (result.ok ? result.value : default_value);

/**
 * Execute a function and convert exceptions to Result.
 *
 * @example
 * ```ts
 * const result = try_catch(
 *   () => xz.decompressSync(bytes),
 *   e => ({ kind: 'extraction_error', path, stage: 'decompress', message: format_error(e) })
 * )
 * ```
 */
export const try_catch = <T, E>(fn: () => T, on_error: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(on_error(e));
	}
};

/**
 * Execute an async function and convert exceptions to Result.
 */
export const try_catch_async = async <T, E>(fn: () => Promise<T>, on_error: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(on_error(e));
	}
};

type MaybePromise<T> = T | Promise<T>;

/**
 * A composable pipeline for chaining Result operations.
 *
 * All operations are lazy - nothing executes until `.result()` is called.
 *
 * @example
 * ```ts
 * const text = await pipe(read_archive(path))
 *   .tap(payload => log(payload.entry))
 *   .map(payload => payload.text)
 *   .result()
 * ```
 */
export type Pipe<T, E> = {
	/** Transform the success value */
	map: <U>(fn: (value: T) => U) => Pipe<U, E>;
	/** Chain with another Result-returning operation */
	flat_map: <U>(fn: (value: T) => MaybePromise<Result<U, E>>) => Pipe<U, E>;
	/** Transform the error value */
	map_err: <F>(fn: (error: E) => F) => Pipe<T, F>;
	/** Execute side effect on success */
	tap: (fn: (value: T) => MaybePromise<void>) => Pipe<T, E>;
	/** Execute side effect on error */
	tap_err: (fn: (error: E) => MaybePromise<void>) => Pipe<T, E>;
	/** Get the underlying Result */
	result: () => Promise<Result<T, E>>;
};

const create_pipe = <T, E>(promised: Promise<Result<T, E>>): Pipe<T, E> => ({
	map: <U>(fn: (value: T) => U): Pipe<U, E> =>
		create_pipe(
			promised.then((r): Result<U, E> => {
				if (r.ok) return ok(fn(r.value));
				return err(r.error);
			})
		),
	flat_map: <U>(fn: (value: T) => MaybePromise<Result<U, E>>): Pipe<U, E> =>
		create_pipe(
			promised.then((r): MaybePromise<Result<U, E>> => {
				if (r.ok) return fn(r.value);
				return err(r.error);
			})
		),
	map_err: <F>(fn: (error: E) => F): Pipe<T, F> =>
		create_pipe(
			promised.then((r): Result<T, F> => {
				if (r.ok) return ok(r.value);
				return err(fn(r.error));
			})
		),
	tap: (fn: (value: T) => MaybePromise<void>): Pipe<T, E> =>
		create_pipe(
			promised.then(async (r): Promise<Result<T, E>> => {
				if (r.ok) await fn(r.value);
				return r;
			})
		),
	tap_err: (fn: (error: E) => MaybePromise<void>): Pipe<T, E> =>
		create_pipe(
			promised.then(async (r): Promise<Result<T, E>> => {
				if (!r.ok) await fn(r.error);
				return r;
			})
		),
	result: (): Promise<Result<T, E>> => promised,
});

/**
 * Create a composable pipeline from a Result or Promise<Result>.
 */
export const pipe = <T, E>(initial: MaybePromise<Result<T, E>>): Pipe<T, E> => create_pipe(Promise.resolve(initial));

/**
 * Format an unknown error to a string message.
 */
export const format_error = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Coerce an unknown thrown value into an Error so it can be carried as a cause.
 */
export const to_error = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

/**
 * Render a fatal pipeline error as the one-line diagnostic shown to operators.
 *
 * @example
 * ```ts
 * format_pipeline_error({ kind: 'read_error', path: 'capacity.csv', cause: new Error('ENOENT') })
 * // => 'cannot read capacity.csv: ENOENT'
 * ```
 */
export const format_pipeline_error = (error: PipelineError): string => {
	switch (error.kind) {
		case "extraction_error":
			return `extraction failed (${error.stage}) for ${error.path}: ${error.message}`;
		case "read_error":
			return `cannot read ${error.path}: ${error.cause.message}`;
		case "storage_error":
			return `storage failed during ${error.operation}: ${error.cause.message}`;
		case "compression_error":
			return `compression failed for ${error.path}: ${error.cause.message}`;
		case "invalid_config":
			return `invalid configuration: ${error.message}`;
	}
};
