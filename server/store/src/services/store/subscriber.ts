/**
 * Reply channel for one reader
 *
 * A bounded queue of Takes. The reader drains it as a Stream; shutting the
 * queue down is how either side hangs up.
 */
import { Effect, Exit, Queue, Scope, Stream, Take } from "effect";

import type { Frame } from "../../domain.js";

export const CAPACITY = 100;

export interface Subscriber {
  /** Blocks while the queue is full. Resolves to false once the reader has gone. */
  readonly send: (frame: Frame) => Effect.Effect<boolean>;
  /** End of a non-following read */
  readonly end: Effect.Effect<boolean>;
  readonly shutdown: Effect.Effect<void>;
  /** Scope of the reader; heartbeat fibers live here */
  readonly scope: Scope.Scope;
  readonly stream: Stream.Stream<Frame>;
}

export const make = (scope: Scope.Scope): Effect.Effect<Subscriber> =>
  Effect.gen(function* () {
    const queue = yield* Queue.bounded<Take.Take<Frame>>(CAPACITY);
    yield* Scope.addFinalizer(scope, Queue.shutdown(queue));

    const offer = (take: Take.Take<Frame>) =>
      Effect.gen(function* () {
        if (yield* Queue.isShutdown(queue)) return false;
        // offer is interrupted if the queue shuts down while it waits
        const exit = yield* Effect.exit(Queue.offer(queue, take));
        return Exit.isSuccess(exit);
      });

    const subscriber: Subscriber = {
      send: (frame) => offer(Take.of(frame)),
      end: offer(Take.end),
      shutdown: Queue.shutdown(queue),
      scope,
      stream: Stream.fromQueue(queue, { shutdown: true }).pipe(Stream.flattenTake),
    };
    return subscriber;
  });
