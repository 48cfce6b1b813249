/**
 * @module Backend Base
 * @description Shared batching and bookkeeping for backend implementations.
 */

import type { PipelineEvent, TableName, TableSummary } from "../types";
import { chunk } from "../utils";

export const DEFAULT_BATCH_SIZE = 10_000;

/**
 * Thin per-table sink. Backends implement this; batching, counters and
 * progress events live in `write_table`.
 */
export type TableWriter<T> = {
  table: TableName;
  /** Rows per batch, or `null` to write the whole stream as one batch. */
  batch_size: number | null;
  /** Persist one batch. Returns how many rows were actually written; the rest were duplicates. */
  write_batch: (rows: T[]) => number;
};

type Emit = (event: PipelineEvent) => void;

/**
 * Drain `rows` into `writer` one batch at a time.
 *
 * Only the current batch is held in memory. Emits `batch_written` after each
 * non-empty batch and `table_written` once the stream is exhausted.
 */
export function write_table<T>(rows: Iterable<T>, writer: TableWriter<T>, emit: Emit): TableSummary {
  const summary: TableSummary = { table: writer.table, received: 0, written: 0, ignored: 0, batches: 0 };
  const batches = writer.batch_size === null ? [Array.from(rows)] : chunk(rows, writer.batch_size);

  for (const batch of batches) {
    if (batch.length === 0) continue;
    const written = writer.write_batch(batch);
    summary.batches++;
    summary.received += batch.length;
    summary.written += written;
    summary.ignored += batch.length - written;
    emit({ type: "batch_written", table: writer.table, batch: summary.batches, rows: batch.length, total: summary.received });
  }

  emit({ type: "table_written", table: writer.table, written: summary.written, ignored: summary.ignored });
  return summary;
}

/**
 * First-write-wins filter: keeps rows whose key has not been seen before,
 * recording the new keys in `seen`.
 */
export function first_occurrences<T>(rows: T[], seen: Set<string>, key: (row: T) => string): T[] {
  const fresh: T[] = [];
  for (const row of rows) {
    const k = key(row);
    if (seen.has(k)) continue;
    seen.add(k);
    fresh.push(row);
  }
  return fresh;
}

export const observation_key = (row: { station_id: string; date: string }): string => `${row.station_id}\u0000${row.date}`;
