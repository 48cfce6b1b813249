/**
 * @module Schema
 * @description Database schema definitions for Drizzle ORM.
 */

import { sqliteTable, text, integer, real, primaryKey, index } from 'drizzle-orm/sqlite-core'

/**
 * Statewide daily totals. `date` (canonical `YYYY-MM-DD`) is the natural key.
 *
 * @example
 * ```ts
 * import { drizzle } from 'drizzle-orm/better-sqlite3'
 *
 * const db = drizzle(new Database('data/reservoir_data.db'))
 * const rows = db.select().from(statewide_observations).limit(10).all()
 * ```
 */
export const statewide_observations = sqliteTable('statewide_observations', {
  date: text('date').primaryKey(),
  water_level: integer('water_level').notNull(),
}, (table) => ({
  date_idx: index('idx_statewide_date').on(table.date),
}))

/**
 * Reservoir metadata, one row per station.
 *
 * Columns:
 * - `station_id` - Primary key (short station code, e.g. `SHA`)
 * - `dam_name` / `lake_name` / `stream_name` - Free text, nullable
 * - `capacity` - Capacity in acre-feet, null when unknown
 * - `year_fill` - Year the reservoir first filled, null when unknown
 */
export const reservoirs = sqliteTable('reservoirs', {
  station_id: text('station_id').primaryKey(),
  dam_name: text('dam_name'),
  lake_name: text('lake_name'),
  stream_name: text('stream_name'),
  capacity: integer('capacity'),
  year_fill: integer('year_fill'),
})

/**
 * Per-reservoir daily levels keyed by `(station_id, date)`.
 *
 * `station_id` carries no foreign key: observations may arrive
 * for stations missing from the metadata file.
 */
export const reservoir_observations = sqliteTable('reservoir_observations', {
  station_id: text('station_id').notNull(),
  date: text('date').notNull(),
  water_level: integer('water_level').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.station_id, table.date] }),
  station_idx: index('idx_reservoir_obs_station').on(table.station_id),
  date_idx: index('idx_reservoir_obs_date').on(table.date),
}))

/** Snow course stations, one row per station. */
export const snow_stations = sqliteTable('snow_stations', {
  station_id: text('station_id').primaryKey(),
  name: text('name').notNull(),
  elevation: integer('elevation').notNull(),
  river_basin: text('river_basin'),
  county: text('county'),
  latitude: real('latitude'),
  longitude: real('longitude'),
})

/**
 * Daily snow water equivalent and depth keyed by `(station_id, date)`.
 * Like `reservoir_observations`, `station_id` carries no foreign key.
 */
export const snow_observations = sqliteTable('snow_observations', {
  station_id: text('station_id').notNull(),
  date: text('date').notNull(),
  snow_water_equivalent: real('snow_water_equivalent'),
  snow_depth: real('snow_depth'),
}, (table) => ({
  pk: primaryKey({ columns: [table.station_id, table.date] }),
  station_idx: index('idx_snow_obs_station').on(table.station_id),
  date_idx: index('idx_snow_obs_date').on(table.date),
}))

export type StatewideObservationRow = typeof statewide_observations.$inferSelect
export type ReservoirRow = typeof reservoirs.$inferSelect
export type ReservoirObservationRow = typeof reservoir_observations.$inferSelect
export type SnowStationRow = typeof snow_stations.$inferSelect
export type SnowObservationRow = typeof snow_observations.$inferSelect

/**
 * SQL that creates the tables above. Executed once against each freshly
 * created database file before any row is inserted.
 */
export const RESERVOIR_SCHEMA_SQL = `
CREATE TABLE statewide_observations (
  date TEXT PRIMARY KEY,
  water_level INTEGER NOT NULL
);
CREATE INDEX idx_statewide_date ON statewide_observations(date);

CREATE TABLE reservoirs (
  station_id TEXT PRIMARY KEY,
  dam_name TEXT,
  lake_name TEXT,
  stream_name TEXT,
  capacity INTEGER,
  year_fill INTEGER
);

CREATE TABLE reservoir_observations (
  station_id TEXT NOT NULL,
  date TEXT NOT NULL,
  water_level INTEGER NOT NULL,
  PRIMARY KEY (station_id, date)
);
CREATE INDEX idx_reservoir_obs_station ON reservoir_observations(station_id);
CREATE INDEX idx_reservoir_obs_date ON reservoir_observations(date);

CREATE TABLE snow_stations (
  station_id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  elevation INTEGER NOT NULL,
  river_basin TEXT,
  county TEXT,
  latitude REAL,
  longitude REAL
);

CREATE TABLE snow_observations (
  station_id TEXT NOT NULL,
  date TEXT NOT NULL,
  snow_water_equivalent REAL,
  snow_depth REAL,
  PRIMARY KEY (station_id, date)
);
CREATE INDEX idx_snow_obs_station ON snow_observations(station_id);
CREATE INDEX idx_snow_obs_date ON snow_observations(date);
`
