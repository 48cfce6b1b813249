/**
 * @module Records
 * @description Parsers turning decoded payloads into typed rows.
 *
 * Each parser is a generator yielding one `RowOutcome` per non-blank row, so
 * the high-volume observation stream can be consumed in bounded batches
 * without materializing every parsed row at once.
 */

import Papa from "papaparse";
import { z } from "zod";
import { normalize_date, normalize_text, parse_integer, parse_optional_decimal, parse_optional_integer } from "./normalize";
import type { Reservoir, ReservoirObservation, RowError, RowOutcome, SnowObservation, SnowStation, StatewideObservation } from "./types";
import { iterate_lines } from "./utils";

export const FIELD_DELIMITER = ","

/** Column names of the reservoir metadata file. */
export const RESERVOIR_COLUMNS = {
	station_id: "ID",
	dam_name: "DAM",
	lake_name: "LAKE",
	stream_name: "STREAM",
	capacity: "CAPACITY (AF)",
	year_fill: "YEAR FILL",
} as const

const ReservoirRowSchema = z.object({
	[RESERVOIR_COLUMNS.station_id]: z.string().trim().min(1),
	[RESERVOIR_COLUMNS.dam_name]: z.string().optional(),
	[RESERVOIR_COLUMNS.lake_name]: z.string().optional(),
	[RESERVOIR_COLUMNS.stream_name]: z.string().optional(),
	[RESERVOIR_COLUMNS.capacity]: z.string().optional(),
	[RESERVOIR_COLUMNS.year_fill]: z.string().optional(),
})

/** Column names of the snow station metadata file. */
export const SNOW_STATION_COLUMNS = {
	station_id: "ID",
	name: "NAME",
	elevation: "ELEVATION",
	river_basin: "RIVER_BASIN",
	county: "COUNTY",
	latitude: "LATITUDE",
	longitude: "LONGITUDE",
} as const

const SnowStationRowSchema = z.object({
	[SNOW_STATION_COLUMNS.station_id]: z.string().trim().min(1),
	[SNOW_STATION_COLUMNS.name]: z.string().trim().min(1),
	[SNOW_STATION_COLUMNS.elevation]: z.string().optional(),
	[SNOW_STATION_COLUMNS.river_basin]: z.string().optional(),
	[SNOW_STATION_COLUMNS.county]: z.string().optional(),
	[SNOW_STATION_COLUMNS.latitude]: z.string().optional(),
	[SNOW_STATION_COLUMNS.longitude]: z.string().optional(),
})

const read_header_csv = (text: string) =>
	Papa.parse<Record<string, unknown>>(text, {
		header: true,
		skipEmptyLines: "greedy",
		transformHeader: (header) => header.trim(),
	})

const failed = <T>(line: number, error: RowError): RowOutcome<T> => ({ ok: false, error, line })

/**
 * Parse statewide daily totals: one `YYYYMMDD,level` pair per line.
 *
 * Blank lines are ignored. Lines with any other field count are rejected as
 * `field_count`; a malformed date or level rejects only that line.
 *
 * @example
 * ```ts
 * const [row] = parse_statewide('20230615,1234567\n')
 * // row => { ok: true, line: 1, value: { date: '2023-06-15', water_level: 1234567 } }
 * ```
 */
export function* parse_statewide(text: string): Generator<RowOutcome<StatewideObservation>> {
	for (const line of iterate_lines(text)) {
		if (line.text.trim() === "") continue
		const fields = line.text.split(FIELD_DELIMITER)
		if (fields.length !== 2) {
			yield failed(line.number, { kind: "field_count", expected: "2", actual: fields.length })
			continue
		}
		const [raw_date = "", raw_level = ""] = fields
		const date = normalize_date(raw_date)
		if (!date.ok) {
			yield failed(line.number, date.error)
			continue
		}
		const water_level = parse_integer("water_level", raw_level)
		if (!water_level.ok) {
			yield failed(line.number, water_level.error)
			continue
		}
		yield { ok: true, line: line.number, value: { date: date.value, water_level: water_level.value } }
	}
}

/**
 * Parse per-reservoir daily observations.
 *
 * Rows are headerless and positional: station id, duration code (unused),
 * compact date, level. Anything past the fourth field is ignored; rows with
 * fewer than four fields are rejected.
 */
export function* parse_reservoir_observations(text: string): Generator<RowOutcome<ReservoirObservation>> {
	for (const line of iterate_lines(text)) {
		if (line.text.trim() === "") continue
		const fields = line.text.split(FIELD_DELIMITER)
		if (fields.length < 4) {
			yield failed(line.number, { kind: "field_count", expected: "at least 4", actual: fields.length })
			continue
		}
		const [raw_station = "", , raw_date = "", raw_level = ""] = fields
		const station_id = raw_station.trim()
		if (station_id === "") {
			yield failed(line.number, { kind: "missing_field", field: "station_id" })
			continue
		}
		const date = normalize_date(raw_date)
		if (!date.ok) {
			yield failed(line.number, date.error)
			continue
		}
		const water_level = parse_integer("water_level", raw_level)
		if (!water_level.ok) {
			yield failed(line.number, water_level.error)
			continue
		}
		yield { ok: true, line: line.number, value: { station_id, date: date.value, water_level: water_level.value } }
	}
}

/**
 * Parse the reservoir metadata file, a CSV with a header row naming the
 * columns in `RESERVOIR_COLUMNS`. Columns are looked up by name, so their
 * order does not matter and unknown columns are ignored.
 *
 * Line numbers count the header as line 1; blank lines are skipped.
 */
export function* parse_reservoirs(text: string): Generator<RowOutcome<Reservoir>> {
	const parsed = read_header_csv(text)

	for (const [index, raw] of parsed.data.entries()) {
		const line = index + 2
		const row = ReservoirRowSchema.safeParse(raw)
		if (!row.success) {
			yield failed(line, { kind: "missing_field", field: RESERVOIR_COLUMNS.station_id })
			continue
		}
		const capacity = parse_optional_integer("capacity", row.data[RESERVOIR_COLUMNS.capacity])
		if (!capacity.ok) {
			yield failed(line, capacity.error)
			continue
		}
		const year_fill = parse_optional_integer("year_fill", row.data[RESERVOIR_COLUMNS.year_fill])
		if (!year_fill.ok) {
			yield failed(line, year_fill.error)
			continue
		}
		yield {
			ok: true,
			line,
			value: {
				station_id: row.data[RESERVOIR_COLUMNS.station_id],
				dam_name: normalize_text(row.data[RESERVOIR_COLUMNS.dam_name]),
				lake_name: normalize_text(row.data[RESERVOIR_COLUMNS.lake_name]),
				stream_name: normalize_text(row.data[RESERVOIR_COLUMNS.stream_name]),
				capacity: capacity.value,
				year_fill: year_fill.value,
			},
		}
	}
}

/**
 * Parse the snow station metadata file, a CSV with a header row naming the
 * columns in `SNOW_STATION_COLUMNS`.
 *
 * Id and name are required, and elevation must be an integer (feet).
 * Coordinates that are empty or not decimal numbers become `null` without
 * rejecting the row.
 *
 * @example
 * ```ts
 * const [row] = parse_snow_stations('ID,NAME,ELEVATION\nGRZ,Grizzly Ridge,6900\n')
 * // row.value => { station_id: 'GRZ', name: 'Grizzly Ridge', elevation: 6900, river_basin: null, ... }
 * ```
 */
export function* parse_snow_stations(text: string): Generator<RowOutcome<SnowStation>> {
	const parsed = read_header_csv(text)

	for (const [index, raw] of parsed.data.entries()) {
		const line = index + 2
		const row = SnowStationRowSchema.safeParse(raw)
		if (!row.success) {
			const field = row.error.issues[0]?.path.join(".") || SNOW_STATION_COLUMNS.station_id
			yield failed(line, { kind: "missing_field", field })
			continue
		}
		const elevation = parse_integer("elevation", row.data[SNOW_STATION_COLUMNS.elevation] ?? "")
		if (!elevation.ok) {
			yield failed(line, elevation.error)
			continue
		}
		yield {
			ok: true,
			line,
			value: {
				station_id: row.data[SNOW_STATION_COLUMNS.station_id],
				name: row.data[SNOW_STATION_COLUMNS.name],
				elevation: elevation.value,
				river_basin: normalize_text(row.data[SNOW_STATION_COLUMNS.river_basin]),
				county: normalize_text(row.data[SNOW_STATION_COLUMNS.county]),
				latitude: parse_optional_decimal(row.data[SNOW_STATION_COLUMNS.latitude]),
				longitude: parse_optional_decimal(row.data[SNOW_STATION_COLUMNS.longitude]),
			},
		}
	}
}

/**
 * Parse daily snow observations: headerless `station,YYYYMMDD,swe,depth`
 * rows. Either measurement may be empty or a placeholder and is then `null`;
 * a row where both are missing carries nothing and is rejected as
 * `no_measurement`.
 */
export function* parse_snow_observations(text: string): Generator<RowOutcome<SnowObservation>> {
	for (const line of iterate_lines(text)) {
		if (line.text.trim() === "") continue
		const fields = line.text.split(FIELD_DELIMITER)
		if (fields.length < 3) {
			yield failed(line.number, { kind: "field_count", expected: "at least 3", actual: fields.length })
			continue
		}
		const [raw_station = "", raw_date = "", raw_swe, raw_depth] = fields
		const station_id = raw_station.trim()
		if (station_id === "") {
			yield failed(line.number, { kind: "missing_field", field: "station_id" })
			continue
		}
		const date = normalize_date(raw_date)
		if (!date.ok) {
			yield failed(line.number, date.error)
			continue
		}
		const snow_water_equivalent = parse_optional_decimal(raw_swe)
		const snow_depth = parse_optional_decimal(raw_depth)
		if (snow_water_equivalent === null && snow_depth === null) {
			yield failed(line.number, { kind: "no_measurement" })
			continue
		}
		yield { ok: true, line: line.number, value: { station_id, date: date.value, snow_water_equivalent, snow_depth } }
	}
}

/**
 * Pass accepted rows through and report every rejected one to `on_drop`.
 * Lazy: nothing is parsed until the returned generator is consumed.
 */
export function* accepted_rows<T>(outcomes: Iterable<RowOutcome<T>>, on_drop: (line: number, error: RowError) => void): Generator<T> {
	for (const outcome of outcomes) {
		if (outcome.ok) yield outcome.value
		else on_drop(outcome.line, outcome.error)
	}
}

/**
 * Drain a parser into an array of accepted rows. Meant for the small
 * streams; use `accepted_rows` for the per-reservoir observations.
 */
export function collect_rows<T>(
	outcomes: Iterable<RowOutcome<T>>,
	on_drop?: (line: number, error: RowError) => void,
): { rows: T[]; dropped: number } {
	let dropped = 0
	const rows = Array.from(accepted_rows(outcomes, (line, error) => {
		dropped++
		on_drop?.(line, error)
	}))
	return { rows, dropped }
}
