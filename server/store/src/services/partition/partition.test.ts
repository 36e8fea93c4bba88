/**
 * Partition test suite - runs against all implementations
 */
import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { describe, expect, it } from "@effect/vitest";
import { Chunk, Effect, Layer, Option, Stream } from "effect";
import { Scru128Id } from "scru128";

import { FrameId } from "../../domain.js";
import * as Partition from "./index.js";

const BASE_MS = 1_700_000_000_000;

/** Deterministic, ordered ids: idAt(1) < idAt(2) < ... */
const idAt = (n: number): FrameId =>
  FrameId.fromScru128(Scru128Id.fromFields(BASE_MS + n, 0, 0, 0));

const keys = (stream: Stream.Stream<readonly [FrameId, string], Partition.PartitionError>) =>
  stream.pipe(
    Stream.map(([key]) => key),
    Stream.runCollect,
    Effect.map(Chunk.toReadonlyArray),
  );

/**
 * Shared test suite for Partition implementations
 */
const partitionTests = <E>(name: string, makeLayer: () => Layer.Layer<Partition.Partition, E>) => {
  describe(name, () => {
    it.effect("get returns none for an unknown key", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        const value = yield* partition.get(idAt(1));

        expect(Option.isNone(value)).toBe(true);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("insert then get returns the value", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        yield* partition.insert(idAt(1), `{"n":1}`);

        expect(yield* partition.get(idAt(1))).toEqual(Option.some(`{"n":1}`));
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("insert replaces an existing value", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        yield* partition.insert(idAt(1), "first");
        yield* partition.insert(idAt(1), "second");

        expect(yield* partition.get(idAt(1))).toEqual(Option.some("second"));
        expect(yield* keys(partition.range())).toEqual([idAt(1)]);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("remove deletes the key", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        yield* partition.insert(idAt(1), "a");
        yield* partition.insert(idAt(2), "b");
        yield* partition.remove(idAt(1));

        expect(Option.isNone(yield* partition.get(idAt(1)))).toBe(true);
        expect(yield* keys(partition.range())).toEqual([idAt(2)]);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("range scans in key order regardless of insertion order", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        yield* partition.insert(idAt(3), "c");
        yield* partition.insert(idAt(1), "a");
        yield* partition.insert(idAt(2), "b");

        const entries = yield* partition.range().pipe(Stream.runCollect);

        expect(Chunk.toReadonlyArray(entries)).toEqual([
          [idAt(1), "a"],
          [idAt(2), "b"],
          [idAt(3), "c"],
        ]);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("reverse range scans newest first", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        yield* partition.insert(idAt(1), "a");
        yield* partition.insert(idAt(2), "b");
        yield* partition.insert(idAt(3), "c");

        expect(yield* keys(partition.range({ reverse: true }))).toEqual([
          idAt(3),
          idAt(2),
          idAt(1),
        ]);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("range honours included and excluded bounds", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        for (const n of [1, 2, 3, 4, 5]) {
          yield* partition.insert(idAt(n), String(n));
        }

        const excludedLower = yield* keys(
          partition.range({ lower: Partition.Bound.Excluded({ key: idAt(2) }) }),
        );
        const includedLower = yield* keys(
          partition.range({ lower: Partition.Bound.Included({ key: idAt(4) }) }),
        );
        const bothBounds = yield* keys(
          partition.range({
            lower: Partition.Bound.Included({ key: idAt(2) }),
            upper: Partition.Bound.Excluded({ key: idAt(4) }),
          }),
        );
        const includedUpperReversed = yield* keys(
          partition.range({ upper: Partition.Bound.Included({ key: idAt(2) }), reverse: true }),
        );

        expect(excludedLower).toEqual([idAt(3), idAt(4), idAt(5)]);
        expect(includedLower).toEqual([idAt(4), idAt(5)]);
        expect(bothBounds).toEqual([idAt(2), idAt(3)]);
        expect(includedUpperReversed).toEqual([idAt(2), idAt(1)]);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("excluded lower bound past the last key returns empty", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;

        yield* partition.insert(idAt(1), "a");

        expect(
          yield* keys(partition.range({ lower: Partition.Bound.Excluded({ key: idAt(9) }) })),
        ).toEqual([]);
      }).pipe(Effect.provide(makeLayer())),
    );

    it.effect("range crosses page boundaries in both directions", () =>
      Effect.gen(function* () {
        const partition = yield* Partition.Partition;
        const total = Partition.PAGE_SIZE * 2 + 7;
        const expected = Array.from({ length: total }, (_, i) => idAt(i + 1));

        for (const id of expected) {
          yield* partition.insert(id, "x");
        }

        expect(yield* keys(partition.range())).toEqual(expected);
        expect(yield* keys(partition.range({ reverse: true }))).toEqual([...expected].reverse());
      }).pipe(Effect.provide(makeLayer())),
    );
  });
};

// -------------------------------------------------------------------------------------
// Run tests for each implementation
// -------------------------------------------------------------------------------------

describe("Partition", () => {
  partitionTests("InMemory", () => Partition.inMemoryLayer);

  // SQLite implementation - uses scoped temp file that auto-cleans
  const sqliteTestLayer = Layer.unwrapScoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const tempDir = yield* fs.makeTempDirectoryScoped();
      return Partition.sqliteLayer(`${tempDir}/test.db`);
    }),
  ).pipe(Layer.provide(NodeContext.layer));

  partitionTests("SQLite", () => sqliteTestLayer);

  it.effect("SQLite keeps entries across reopen", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const tempDir = yield* fs.makeTempDirectoryScoped();
      const filename = `${tempDir}/reopen.db`;

      yield* Effect.gen(function* () {
        const partition = yield* Partition.Partition;
        yield* partition.insert(idAt(1), "kept");
      }).pipe(Effect.provide(Partition.sqliteLayer(filename)));

      const value = yield* Effect.gen(function* () {
        const partition = yield* Partition.Partition;
        return yield* partition.get(idAt(1));
      }).pipe(Effect.provide(Partition.sqliteLayer(filename)));

      expect(value).toEqual(Option.some("kept"));
    }).pipe(Effect.scoped, Effect.provide(NodeContext.layer)),
  );
});
