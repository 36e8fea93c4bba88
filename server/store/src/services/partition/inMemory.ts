/**
 * In-memory implementation of Partition
 */
import { Effect, Layer, Option, Stream } from "effect";

import { FrameId } from "../../domain.js";
import { inRange, Partition, PartitionTypeId } from "./service.js";

export const inMemoryLayer: Layer.Layer<Partition> = Layer.sync(Partition, () => {
  const entries = new Map<FrameId, string>();

  return Partition.of({
    [PartitionTypeId]: PartitionTypeId,
    get: (key) => Effect.sync(() => Option.fromNullable(entries.get(key))),
    insert: (key, value) =>
      Effect.sync(() => {
        entries.set(key, value);
      }),
    remove: (key) =>
      Effect.sync(() => {
        entries.delete(key);
      }),
    range: (options = {}) =>
      Stream.suspend(() => {
        const keys = Array.from(entries.keys())
          .filter((key) => inRange(key, options))
          .sort();
        if (options.reverse) keys.reverse();
        return Stream.fromIterable(keys).pipe(
          Stream.filterMap((key) =>
            Option.map(Option.fromNullable(entries.get(key)), (value) => [key, value] as const),
          ),
        );
      }),
  });
});
