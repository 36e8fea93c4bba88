/**
 * Partition service definition
 */
import { Context, Data, Effect, Option, Schema, Stream } from "effect";

import { FrameId } from "../../domain.js";

// -------------------------------------------------------------------------------------
// Type ID (for nominal uniqueness)
// -------------------------------------------------------------------------------------

export const PartitionTypeId: unique symbol = Symbol.for("@app/Partition");
export type PartitionTypeId = typeof PartitionTypeId;

// -------------------------------------------------------------------------------------
// Errors
// -------------------------------------------------------------------------------------

export class PartitionError extends Schema.TaggedError<PartitionError>()("PartitionError", {
  cause: Schema.Defect,
  context: Schema.optionalWith(Schema.Unknown, { default: () => undefined }),
}) {}

// -------------------------------------------------------------------------------------
// Range bounds
// -------------------------------------------------------------------------------------

export type Bound = Data.TaggedEnum<{
  Included: { readonly key: FrameId };
  Excluded: { readonly key: FrameId };
}>;
export const Bound = Data.taggedEnum<Bound>();

export interface RangeOptions {
  /** Absent means unbounded */
  readonly lower?: Bound;
  /** Absent means unbounded */
  readonly upper?: Bound;
  /** Newest first */
  readonly reverse?: boolean;
}

export const inRange = (key: FrameId, { lower, upper }: RangeOptions): boolean => {
  if (lower !== undefined) {
    if (lower._tag === "Included" ? key < lower.key : key <= lower.key) return false;
  }
  if (upper !== undefined) {
    if (upper._tag === "Included" ? key > upper.key : key >= upper.key) return false;
  }
  return true;
};

// -------------------------------------------------------------------------------------
// Partition
// -------------------------------------------------------------------------------------

/**
 * Durable ordered map from frame id to serialized frame.
 *
 * Keys are fixed-width SCRU128 strings, so key order is creation order.
 * Values are opaque here; decoding them is the caller's business.
 */
export interface Partition {
  readonly [PartitionTypeId]: PartitionTypeId;

  readonly get: (key: FrameId) => Effect.Effect<Option.Option<string>, PartitionError>;

  /** Insert or replace */
  readonly insert: (key: FrameId, value: string) => Effect.Effect<void, PartitionError>;

  readonly remove: (key: FrameId) => Effect.Effect<void, PartitionError>;

  /** Ordered scan, paged so a large log is never held in memory at once */
  readonly range: (
    options?: RangeOptions,
  ) => Stream.Stream<readonly [FrameId, string], PartitionError>;
}

export const Partition = Context.GenericTag<Partition>("@app/Partition");

/** Rows fetched per page by range scans */
export const PAGE_SIZE = 256;
