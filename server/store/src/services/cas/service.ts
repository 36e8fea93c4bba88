/**
 * Cas service definition - content-addressed blob storage
 */
import { createHash } from "node:crypto";

import { Context, Effect, Schema, Scope, Stream } from "effect";

import { Integrity } from "../../domain.js";

// -------------------------------------------------------------------------------------
// Type ID (for nominal uniqueness)
// -------------------------------------------------------------------------------------

export const CasTypeId: unique symbol = Symbol.for("@app/Cas");
export type CasTypeId = typeof CasTypeId;

// -------------------------------------------------------------------------------------
// Errors
// -------------------------------------------------------------------------------------

export class CasError extends Schema.TaggedError<CasError>()("CasError", {
  cause: Schema.Defect,
  context: Schema.optionalWith(Schema.Unknown, { default: () => undefined }),
}) {}

export class CasNotFoundError extends Schema.TaggedError<CasNotFoundError>()(
  "CasNotFoundError",
  {
    hash: Integrity,
  },
) {
  get message() {
    return `content not found: ${this.hash}`;
  }
}

// -------------------------------------------------------------------------------------
// Cas
// -------------------------------------------------------------------------------------

/**
 * Incremental writer. Nothing is visible to readers until `commit`; closing the
 * writer's scope without committing discards what was written.
 */
export interface CasWriter {
  readonly write: (chunk: Uint8Array) => Effect.Effect<void, CasError>;
  readonly commit: Effect.Effect<Integrity, CasError>;
}

export interface Cas {
  readonly [CasTypeId]: CasTypeId;

  readonly writer: Effect.Effect<CasWriter, CasError, Scope.Scope>;

  readonly reader: (
    hash: Integrity,
  ) => Effect.Effect<Stream.Stream<Uint8Array, CasError>, CasNotFoundError | CasError>;

  /** Write `content` in one go and return its digest */
  readonly insert: (content: Uint8Array | string) => Effect.Effect<Integrity, CasError>;

  /** Read the whole payload into memory */
  readonly read: (hash: Integrity) => Effect.Effect<Uint8Array, CasNotFoundError | CasError>;

  readonly has: (hash: Integrity) => Effect.Effect<boolean, CasError>;
}

export const Cas = Context.GenericTag<Cas>("@app/Cas");

// -------------------------------------------------------------------------------------
// Shared helpers for implementations
// -------------------------------------------------------------------------------------

export const toBytes = (content: Uint8Array | string): Uint8Array =>
  typeof content === "string" ? new TextEncoder().encode(content) : content;

/** Running sha256 over written chunks */
export const makeHasher = () => {
  const hash = createHash("sha256");
  return {
    update: (chunk: Uint8Array) => {
      hash.update(chunk);
    },
    digest: (): Integrity => Integrity.fromDigest(hash.digest()),
  };
};

export const alreadyCommitted = (hash: Integrity) =>
  CasError.make({ cause: new Error("writer already committed"), context: { hash } });

export const insertWith =
  (writer: Cas["writer"]) =>
  (content: Uint8Array | string): Effect.Effect<Integrity, CasError> =>
    Effect.scoped(
      Effect.gen(function* () {
        const w = yield* writer;
        yield* w.write(toBytes(content));
        return yield* w.commit;
      }),
    );

export const readWith =
  (reader: Cas["reader"]) =>
  (hash: Integrity): Effect.Effect<Uint8Array, CasNotFoundError | CasError> =>
    reader(hash).pipe(
      Effect.flatMap(Stream.runCollect),
      Effect.map((chunks) => Buffer.concat(Array.from(chunks))),
    );
