/**
 * File-system implementation of Cas
 *
 * Committed content lives at {root}/content/{hex[0..2]}/{hex[2..]}.
 * Writes stream into {root}/tmp and are renamed into place on commit.
 */
import { randomUUID } from "node:crypto";

import * as Fs from "@effect/platform/FileSystem";
import * as Path from "@effect/platform/Path";
import { Effect, Layer, Option, Ref, Stream } from "effect";

import { Integrity } from "../../domain.js";
import {
  alreadyCommitted,
  Cas,
  CasError,
  CasNotFoundError,
  CasTypeId,
  type CasWriter,
  insertWith,
  makeHasher,
  readWith,
} from "./service.js";

export const fileSystemLayer = (
  root: string,
): Layer.Layer<Cas, CasError, Fs.FileSystem | Path.Path> =>
  Layer.effect(
    Cas,
    Effect.gen(function* () {
      const fs = yield* Fs.FileSystem;
      const path = yield* Path.Path;

      const contentDir = path.join(root, "content");
      const tmpDir = path.join(root, "tmp");

      yield* fs.makeDirectory(contentDir, { recursive: true });
      yield* fs.makeDirectory(tmpDir, { recursive: true });

      const locate = (hash: Integrity) => {
        const hex = Integrity.toHex(hash);
        return path.join(contentDir, hex.slice(0, 2), hex.slice(2));
      };

      const writer = Effect.gen(function* () {
        const tmpPath = path.join(tmpDir, randomUUID());
        const committed = yield* Ref.make(Option.none<Integrity>());

        // Registered before the handle is opened, so it runs after the handle closes
        yield* Effect.addFinalizer(() =>
          Ref.get(committed).pipe(
            Effect.flatMap(
              Option.match({
                onSome: () => Effect.void,
                onNone: () =>
                  fs.remove(tmpPath, { force: true }).pipe(
                    Effect.catchAll((error) =>
                      Effect.logWarning("failed to discard uncommitted CAS write", error),
                    ),
                  ),
              }),
            ),
          ),
        );

        const file = yield* fs.open(tmpPath, { flag: "w" });
        const hasher = makeHasher();

        const write = (chunk: Uint8Array) =>
          Ref.get(committed).pipe(
            Effect.flatMap(
              Option.match({
                onSome: (hash) => Effect.fail(alreadyCommitted(hash)),
                onNone: () =>
                  chunk.length === 0
                    ? Effect.void
                    : file.writeAll(chunk).pipe(
                        Effect.tap(() => Effect.sync(() => hasher.update(chunk))),
                        Effect.mapError((cause) => CasError.make({ cause, context: { tmpPath } })),
                      ),
              }),
            ),
          );

        const commit = Ref.get(committed).pipe(
          Effect.flatMap(
            Option.match({
              onSome: (hash) => Effect.fail(alreadyCommitted(hash)),
              onNone: () =>
                Effect.gen(function* () {
                  yield* file.sync;
                  const hash = hasher.digest();
                  const target = locate(hash);
                  yield* fs.makeDirectory(path.dirname(target), { recursive: true });
                  yield* fs.rename(tmpPath, target);
                  yield* Ref.set(committed, Option.some(hash));
                  return hash;
                }).pipe(Effect.mapError((cause) => CasError.make({ cause, context: { tmpPath } }))),
            }),
          ),
        );

        return { write, commit } satisfies CasWriter;
      }).pipe(Effect.mapError((cause) => CasError.make({ cause })));

      const has = (hash: Integrity) =>
        fs.exists(locate(hash)).pipe(
          Effect.mapError((cause) => CasError.make({ cause, context: { hash } })),
        );

      const reader = (hash: Integrity) =>
        Effect.gen(function* () {
          const target = locate(hash);
          if (!(yield* has(hash))) {
            return yield* CasNotFoundError.make({ hash });
          }
          return fs
            .stream(target)
            .pipe(Stream.mapError((cause) => CasError.make({ cause, context: { hash } })));
        });

      return Cas.of({
        [CasTypeId]: CasTypeId,
        writer,
        reader,
        insert: insertWith(writer),
        read: readWith(reader),
        has,
      });
    }).pipe(Effect.mapError((cause) => CasError.make({ cause }))),
  );
