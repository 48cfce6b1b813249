/**
 * @module Normalize
 * @description Pure field normalizers. Failures are row-level `RowError`s,
 * which callers turn into dropped rows rather than propagate.
 */

import { ok, err, type Result, type RowError } from "./types";

export const COMPACT_DATE_LENGTH = 8

const COMPACT_DATE = /^\d{8}$/
const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/

/**
 * Convert a compact `YYYYMMDD` date into canonical `YYYY-MM-DD` by fixed
 * positional slicing.
 *
 * No calendar validation is performed: `20231399` becomes `2023-13-99`.
 *
 * @example
 * ```ts
 * normalize_date('20230615') // => ok('2023-06-15')
 * normalize_date('2023061')  // => err({ kind: 'invalid_date', value: '2023061' })
 * ```
 */
export function normalize_date(compact: string): Result<string, RowError> {
	const value = compact.trim()
	if (value.length !== COMPACT_DATE_LENGTH || !COMPACT_DATE.test(value)) {
		return err({ kind: "invalid_date", value: compact })
	}
	return ok(`${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}`)
}

/**
 * Parse a required integer field. Empty, fractional and non-numeric values
 * (the archives use `ART`, `BRT` and `---` as placeholders) are rejected, as
 * are values outside the safe integer range.
 */
export function parse_integer(field: string, raw: string): Result<number, RowError> {
	const value = raw.trim()
	if (!INTEGER.test(value)) return err({ kind: "invalid_integer", field, value: raw })
	const parsed = Number(value)
	if (!Number.isSafeInteger(parsed)) return err({ kind: "invalid_integer", field, value: raw })
	return ok(parsed)
}

/**
 * Parse an optional integer field: an empty value means "unknown" and maps
 * to `null`, never to zero.
 */
export function parse_optional_integer(field: string, raw: string | undefined): Result<number | null, RowError> {
	if (raw === undefined || raw.trim() === "") return ok(null)
	return parse_integer(field, raw)
}

/**
 * Lenient decimal parse for measurements and coordinates: anything that is
 * not a plain decimal number (empty, `---`, exponent notation) is `null`.
 *
 * @example
 * ```ts
 * parse_optional_decimal(' 12.5 ') // => 12.5
 * parse_optional_decimal('---')    // => null
 * ```
 */
export function parse_optional_decimal(raw: string | undefined): number | null {
	const value = raw?.trim() ?? ""
	if (!DECIMAL.test(value)) return null
	return Number(value)
}

/** Trimmed text, or `null` when nothing is left. */
export function normalize_text(raw: string | undefined): string | null {
	const value = raw?.trim() ?? ""
	return value === "" ? null : value
}
