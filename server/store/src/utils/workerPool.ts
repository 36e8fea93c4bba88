/**
 * Fixed-size worker pool with a quiescence barrier
 *
 * Unlike Effect.forEach with a concurrency limit, jobs arrive one at a time from
 * any number of callers, and callers can later wait until everything submitted
 * so far has finished.
 */
import { Deferred, Effect, Option, Queue, Scope, Stream, SubscriptionRef } from "effect";

/**
 * Handle returned by makeWorkerPool
 */
export interface WorkerPool {
  /**
   * Hand `job` to an idle worker.
   * - Suspends until a worker has accepted the job; there is no backlog
   * - A caller interrupted while waiting withdraws the job
   * - Does not wait for the job to finish, and never sees its result
   * - Failures and defects are logged by the worker, not propagated
   */
  readonly execute: <E, R>(job: Effect.Effect<void, E, R>) => Effect.Effect<void, never, R>;

  /**
   * Wait until no job is running. Returns at once when the pool is idle.
   */
  readonly waitForCompletion: Effect.Effect<void>;

  /** Number of jobs currently running */
  readonly active: Effect.Effect<number>;
}

interface Handoff {
  readonly job: Effect.Effect<void, unknown>;
  readonly accepted: Deferred.Deferred<void>;
}

/**
 * Creates a pool of `size` long-lived worker fibers, interrupted when the scope closes.
 *
 * @example
 * ```ts
 * const pool = yield* makeWorkerPool(4)
 *
 * for (const path of paths) {
 *   yield* pool.execute(index(path))
 * }
 *
 * // every index(path) has finished
 * yield* pool.waitForCompletion
 * ```
 */
export const makeWorkerPool = (size: number): Effect.Effect<WorkerPool, never, Scope.Scope> =>
  Effect.gen(function* () {
    const handoff = yield* Queue.unbounded<Handoff>();
    const active = yield* SubscriptionRef.make(0);

    const worker = (n: number) =>
      Queue.take(handoff).pipe(
        Effect.flatMap(({ job, accepted }) =>
          Effect.gen(function* () {
            // Counted before the caller is released, so a barrier right after execute sees it
            const running = yield* SubscriptionRef.updateAndGet(active, (k) => k + 1);
            // False when the caller gave up waiting; the job is then never run
            if (!(yield* Deferred.succeed(accepted, undefined))) return;
            yield* Effect.logDebug(`worker ${n} accepted a job, ${running} running`);
            yield* job.pipe(Effect.catchAllCause((cause) => Effect.logError("job failed", cause)));
          }).pipe(Effect.ensuring(SubscriptionRef.update(active, (k) => k - 1))),
        ),
        Effect.forever,
      );

    yield* Effect.addFinalizer(() => Queue.shutdown(handoff));
    yield* Effect.forEach(
      Array.from({ length: size }, (_, n) => n),
      (n) => Effect.forkScoped(worker(n)),
      { discard: true },
    );

    const execute = <E, R>(job: Effect.Effect<void, E, R>): Effect.Effect<void, never, R> =>
      Effect.gen(function* () {
        const context = yield* Effect.context<R>();
        const parent = yield* Effect.option(Effect.currentSpan);
        const accepted = yield* Deferred.make<void>();

        const provided = Effect.provide(job, context);
        yield* Queue.offer(handoff, {
          job: Option.match(parent, {
            onNone: () => provided,
            onSome: (span) => Effect.withParentSpan(provided, span),
          }),
          accepted,
        });
        yield* Deferred.await(accepted).pipe(
          Effect.onInterrupt(() => Deferred.interrupt(accepted)),
        );
      });

    const waitForCompletion = active.changes.pipe(
      Stream.takeUntil((n) => n === 0),
      Stream.runDrain,
    );

    return { execute, waitForCompletion, active: SubscriptionRef.get(active) };
  });
