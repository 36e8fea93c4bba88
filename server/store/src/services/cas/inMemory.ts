/**
 * In-memory implementation of Cas
 */
import { Effect, Layer, Option, Ref, Stream } from "effect";

import { Integrity } from "../../domain.js";
import {
  alreadyCommitted,
  Cas,
  type CasError,
  CasNotFoundError,
  CasTypeId,
  type CasWriter,
  insertWith,
  makeHasher,
  readWith,
} from "./service.js";

export const inMemoryLayer: Layer.Layer<Cas> = Layer.sync(Cas, () => {
  const blobs = new Map<Integrity, Uint8Array>();

  const writer = Effect.gen(function* () {
    const committed = yield* Ref.make(Option.none<Integrity>());
    const chunks: Uint8Array[] = [];
    const hasher = makeHasher();

    const ifOpen = <A, E>(onOpen: () => Effect.Effect<A, E>) =>
      Ref.get(committed).pipe(
        Effect.flatMap(
          Option.match<Effect.Effect<A, E | CasError>, Integrity>({
            onSome: (hash) => Effect.fail(alreadyCommitted(hash)),
            onNone: onOpen,
          }),
        ),
      );

    return {
      write: (chunk) =>
        ifOpen(() =>
          Effect.sync(() => {
            chunks.push(Uint8Array.from(chunk));
            hasher.update(chunk);
          }),
        ),
      commit: ifOpen(() =>
        Effect.gen(function* () {
          const hash = hasher.digest();
          blobs.set(hash, Buffer.concat(chunks));
          yield* Ref.set(committed, Option.some(hash));
          return hash;
        }),
      ),
    } satisfies CasWriter;
  });

  const reader = (hash: Integrity) =>
    Option.match(Option.fromNullable(blobs.get(hash)), {
      onNone: () => Effect.fail(CasNotFoundError.make({ hash })),
      onSome: (bytes) => Effect.succeed(Stream.make(bytes)),
    });

  return Cas.of({
    [CasTypeId]: CasTypeId,
    writer,
    reader,
    insert: insertWith(writer),
    read: readWith(reader),
    has: (hash) => Effect.sync(() => blobs.has(hash)),
  });
});
