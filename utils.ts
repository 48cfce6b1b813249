/**
 * @module Utilities
 * @description Small helpers shared by the parsers, backends and pipeline.
 */

import type { EventHandler, PipelineEvent } from "./types";

/**
 * Create an event emitter function from an optional handler.
 */
export function create_emitter(handler?: EventHandler): (event: PipelineEvent) => void {
	return (event: PipelineEvent) => handler?.(event)
}

/**
 * Yields every line of `text` with its 1-based number, without building an
 * array of all lines first. A trailing `\r` is stripped, so CRLF payloads
 * split the same way as LF ones.
 *
 * @example
 * ```ts
 * for (const { text, number } of iterate_lines('a\r\nb')) {
 *   // { text: 'a', number: 1 }, { text: 'b', number: 2 }
 * }
 * ```
 */
export function* iterate_lines(text: string): Generator<{ text: string; number: number }> {
	let start = 0
	let number = 1
	while (start <= text.length) {
		let end = text.indexOf("\n", start)
		if (end === -1) end = text.length
		const line = text.charCodeAt(end - 1) === 13 ? text.slice(start, end - 1) : text.slice(start, end)
		if (end < text.length || line.length > 0) {
			yield { text: line, number }
		}
		start = end + 1
		number++
	}
}

/**
 * Group an iterable into arrays of at most `size` items. Only one chunk is
 * held at a time.
 */
export function* chunk<T>(items: Iterable<T>, size: number): Generator<T[]> {
	if (!Number.isInteger(size) || size < 1) throw new RangeError(`chunk size must be a positive integer, got ${size}`)
	let current: T[] = []
	for (const item of items) {
		current.push(item)
		if (current.length === size) {
			yield current
			current = []
		}
	}
	if (current.length > 0) yield current
}

/**
 * Format a count with thousands separators, e.g. `1,234,567`.
 */
export function format_number(value: number): string {
	return value.toLocaleString("en-US")
}

/**
 * Milliseconds elapsed since `start` (a `Date.now()` value).
 */
export function elapsed(start: number): number {
	return Date.now() - start
}
