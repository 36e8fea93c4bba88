/**
 * Store service definition
 */
import { Context, Effect, Option, Schema, Scope, Stream } from "effect";

import { Frame, FrameDraft, FrameId, Integrity, ReadOptions, Ttl } from "../../domain.js";
import { CasError, CasNotFoundError, type CasWriter } from "../cas/service.js";

// -------------------------------------------------------------------------------------
// Errors
// -------------------------------------------------------------------------------------

/** A persisted record that no longer decodes. Raised as a defect, never as a failure. */
export class FrameCorruptionError extends Schema.TaggedError<FrameCorruptionError>()(
  "FrameCorruptionError",
  {
    id: Schema.String,
    cause: Schema.Defect,
  },
) {
  get message() {
    return `corrupt frame ${this.id}`;
  }
}

// -------------------------------------------------------------------------------------
// Store service
// -------------------------------------------------------------------------------------

export interface AppendWithContentInput<E> {
  readonly topic: string;
  readonly content: Stream.Stream<Uint8Array, E>;
  readonly meta?: unknown;
  readonly ttl?: Ttl;
}

export class Store extends Context.Tag("@app/Store")<
  Store,
  {
    /** Directory the store was opened on */
    readonly path: string;

    /** Assign the next id, persist unless ephemeral, then fan out to live readers */
    readonly append: (draft: FrameDraft) => Effect.Effect<Frame>;

    /**
     * Write `content` to the CAS, then append a frame referencing its digest.
     * A failed write aborts before an id is assigned.
     */
    readonly appendWithContent: <E>(
      input: AppendWithContentInput<E>,
    ) => Effect.Effect<Frame, CasError | E>;

    /**
     * Open a reader. The request is queued before this returns, so any append
     * issued afterwards is delivered to it. The reader is dropped when the
     * stream ends or the surrounding scope closes.
     */
    readonly read: (options?: ReadOptions) => Effect.Effect<Stream.Stream<Frame>, never, Scope.Scope>;

    readonly get: (id: FrameId) => Effect.Effect<Option.Option<Frame>>;

    /** Most recent persisted frame on `topic` */
    readonly head: (topic: string) => Effect.Effect<Option.Option<Frame>>;

    /** Remove expired `time:` frames and frames pushed out of their `head:` window */
    readonly collect: Effect.Effect<ReadonlyArray<FrameId>>;

    readonly casWriter: Effect.Effect<CasWriter, CasError, Scope.Scope>;
    readonly casReader: (
      hash: Integrity,
    ) => Effect.Effect<Stream.Stream<Uint8Array, CasError>, CasNotFoundError | CasError>;
    readonly casInsert: (content: Uint8Array | string) => Effect.Effect<Integrity, CasError>;
    readonly casRead: (hash: Integrity) => Effect.Effect<Uint8Array, CasNotFoundError | CasError>;
  }
>() {}
