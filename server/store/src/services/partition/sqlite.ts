/**
 * SQLite implementation of Partition
 *
 * One `frames` table keyed by frame id. Range scans page through the table
 * with a cursor instead of loading the log at once.
 */
import { Reactivity } from "@effect/experimental";
import { SqliteClient } from "@effect/sql-sqlite-node";
import { Chunk, Effect, Layer, Option, Stream } from "effect";

import { FrameId } from "../../domain.js";
import {
  type Bound,
  PAGE_SIZE,
  Partition,
  PartitionError,
  PartitionTypeId,
  type RangeOptions,
} from "./service.js";

// -------------------------------------------------------------------------------------
// Row types
// -------------------------------------------------------------------------------------

export interface FrameRow {
  id: string;
  frame: string;
}

// -------------------------------------------------------------------------------------
// Bounds
// -------------------------------------------------------------------------------------

// Ids are fixed width over [0-9A-Z], so appending "~" yields a string that sorts
// after `key` and before every greater id. Every scan becomes `lo <= id < hi`.
const AFTER = "~";
const UNBOUNDED_HI = "~";

const lowerFrom = (bound: Bound | undefined): string =>
  bound === undefined ? "" : bound._tag === "Included" ? bound.key : bound.key + AFTER;

const upperFrom = (bound: Bound | undefined): string =>
  bound === undefined ? UNBOUNDED_HI : bound._tag === "Included" ? bound.key + AFTER : bound.key;

// -------------------------------------------------------------------------------------
// Layer factory
// -------------------------------------------------------------------------------------

/**
 * Create a SQLite-backed Partition layer.
 *
 * @param filename - Path to the SQLite database file (e.g., `.data/store/partition/stream.db`)
 */
export const sqliteLayer = (filename: string): Layer.Layer<Partition, PartitionError> =>
  Layer.scoped(
    Partition,
    Effect.gen(function* () {
      const sql = yield* SqliteClient.SqliteClient;

      yield* sql`
        CREATE TABLE IF NOT EXISTS frames (
          id TEXT PRIMARY KEY NOT NULL,
          frame TEXT NOT NULL
        ) WITHOUT ROWID
      `;

      const page = (lo: string, hi: string, reverse: boolean) =>
        reverse
          ? sql<FrameRow>`
              SELECT id, frame FROM frames
              WHERE id >= ${lo} AND id < ${hi}
              ORDER BY id DESC
              LIMIT ${PAGE_SIZE}
            `
          : sql<FrameRow>`
              SELECT id, frame FROM frames
              WHERE id >= ${lo} AND id < ${hi}
              ORDER BY id ASC
              LIMIT ${PAGE_SIZE}
            `;

      const range = (options: RangeOptions = {}) => {
        const reverse = options.reverse ?? false;
        const lo = lowerFrom(options.lower);
        const hi = upperFrom(options.upper);

        return Stream.paginateChunkEffect(Option.none<string>(), (cursor) =>
          Effect.gen(function* () {
            const rows = yield* Option.match(cursor, {
              onNone: () => page(lo, hi, reverse),
              onSome: (last) => (reverse ? page(lo, last, true) : page(last + AFTER, hi, false)),
            });
            const entries = rows.map((row) => [FrameId.make(row.id), row.frame] as const);
            const last = rows.at(-1);
            const next =
              rows.length < PAGE_SIZE || last === undefined
                ? Option.none<Option.Option<string>>()
                : Option.some(Option.some(last.id));
            return [Chunk.fromIterable(entries), next] as const;
          }).pipe(Effect.mapError((cause) => PartitionError.make({ cause, context: options }))),
        );
      };

      return Partition.of({
        [PartitionTypeId]: PartitionTypeId,
        get: (key) =>
          sql<FrameRow>`SELECT id, frame FROM frames WHERE id = ${key}`.pipe(
            Effect.map((rows) => Option.map(Option.fromNullable(rows[0]), (row) => row.frame)),
            Effect.mapError((cause) => PartitionError.make({ cause, context: { key } })),
          ),
        insert: (key, value) =>
          sql`INSERT OR REPLACE INTO frames (id, frame) VALUES (${key}, ${value})`.pipe(
            Effect.asVoid,
            Effect.mapError((cause) => PartitionError.make({ cause, context: { key } })),
          ),
        remove: (key) =>
          sql`DELETE FROM frames WHERE id = ${key}`.pipe(
            Effect.asVoid,
            Effect.mapError((cause) => PartitionError.make({ cause, context: { key } })),
          ),
        range,
      });
    }).pipe(Effect.mapError((cause) => PartitionError.make({ cause }))),
  ).pipe(
    Layer.provide(SqliteClient.layer({ filename }).pipe(Layer.provide(Reactivity.layer))),
    Layer.mapError((cause) => PartitionError.make({ cause })),
  );
