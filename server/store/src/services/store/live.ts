/**
 * Live implementation of Store
 *
 * Appends, replays and retention sweeps all run on a single command-loop
 * fiber. A follower is registered and the next append is fanned out on the
 * same sequential timeline, so a follower can neither miss a frame nor see
 * one twice.
 */
import * as Fs from "@effect/platform/FileSystem";
import * as Path from "@effect/platform/Path";
import {
  Cause,
  Clock,
  Data,
  Deferred,
  Duration,
  Effect,
  Layer,
  Option,
  Queue,
  Schema,
  Stream,
} from "effect";
import { Scru128Generator } from "scru128";

import {
  FollowOption,
  Frame,
  FrameDraft,
  FrameId,
  PULSE_TOPIC,
  type ReadOptions,
  synthetic,
  THRESHOLD_TOPIC,
  Ttl,
} from "../../domain.js";
import { Cas, CasError, fileSystemLayer } from "../cas/index.js";
import {
  Bound,
  Partition,
  PartitionError,
  type RangeOptions,
  sqliteLayer,
} from "../partition/index.js";
import { type AppendWithContentInput, FrameCorruptionError, Store } from "./service.js";
import * as Subscriber from "./subscriber.js";

// -------------------------------------------------------------------------------------
// Commands
// -------------------------------------------------------------------------------------

type Command = Data.TaggedEnum<{
  Append: { readonly draft: FrameDraft; readonly reply: Deferred.Deferred<Frame> };
  Read: { readonly subscriber: Subscriber.Subscriber; readonly options: ReadOptions };
  Collect: { readonly reply: Deferred.Deferred<ReadonlyArray<FrameId>> };
}>;
const Command = Data.taggedEnum<Command>();

export const COMMAND_CAPACITY = 32;

// -------------------------------------------------------------------------------------
// Frame codec
// -------------------------------------------------------------------------------------

const FrameJson = Schema.parseJson(Frame);
const encodeFrame = Schema.encode(FrameJson);
const decodeFrame = Schema.decode(FrameJson);

/** A record that fails to decode is fatal */
const decode = (id: FrameId, value: string): Effect.Effect<Frame> =>
  decodeFrame(value).pipe(
    Effect.catchAll((cause) => Effect.die(FrameCorruptionError.make({ id, cause }))),
  );

// -------------------------------------------------------------------------------------
// Ids
// -------------------------------------------------------------------------------------

const ROLLBACK_ALLOWANCE_MS = 10_000;

/**
 * SCRU128 ids stamped from the Effect Clock. Strictly greater than `last`
 * (the newest persisted id) even if the wall clock went backwards between runs.
 */
const makeIdGenerator = (last: Option.Option<FrameId>): Effect.Effect<FrameId> => {
  const generator = new Scru128Generator();
  let previous = last;

  return Effect.flatMap(Clock.currentTimeMillis, (now) =>
    Effect.sync(() => {
      // SCRU128 timestamps start at 1
      const timestamp = Math.max(now, 1);
      let id = FrameId.fromScru128(generator.generateOrResetCore(timestamp, ROLLBACK_ALLOWANCE_MS));
      if (Option.isSome(previous) && id <= previous.value) {
        const floor = FrameId.timestamp(previous.value) + 1;
        id = FrameId.fromScru128(
          generator.generateOrResetCore(Math.max(timestamp, floor), ROLLBACK_ALLOWANCE_MS),
        );
      }
      previous = Option.some(id);
      return id;
    }),
  );
};

// -------------------------------------------------------------------------------------
// Store layer
// -------------------------------------------------------------------------------------

/**
 * Store over whichever Partition and Cas are provided.
 *
 * @param path - Reported as `Store.path`; storage location is up to the provided layers
 */
export const liveLayer = (path: string): Layer.Layer<Store, never, Partition | Cas> =>
  Layer.scoped(
    Store,
    Effect.gen(function* () {
      const partition = yield* Partition;
      const cas = yield* Cas;

      const newest = yield* partition.range({ reverse: true }).pipe(
        Stream.map(([id]) => id),
        Stream.runHead,
        Effect.orDie,
      );
      const nextId = makeIdGenerator(newest);

      const commands = yield* Queue.bounded<Command>(COMMAND_CAPACITY);

      // Only touched from the command loop
      const subscribers = new Set<Subscriber.Subscriber>();

      const scan = (options: RangeOptions) =>
        partition.range(options).pipe(
          Stream.orDie,
          Stream.mapEffect(([id, value]) => decode(id, value)),
        );

      // ---------------------------------------------------------------------------------
      // Append
      // ---------------------------------------------------------------------------------

      const broadcast = (frame: Frame) =>
        Effect.gen(function* () {
          for (const subscriber of Array.from(subscribers)) {
            if (!(yield* subscriber.send(frame))) {
              subscribers.delete(subscriber);
              yield* Effect.logDebug(`dropped subscriber, ${subscribers.size} remaining`);
            }
          }
        });

      const handleAppend = Effect.fn("Store.append")(function* (draft: FrameDraft) {
        const id = yield* nextId;
        const frame = Frame.make({ ...draft, id });

        if (frame.ttl._tag !== "Ephemeral") {
          const value = yield* encodeFrame(frame).pipe(Effect.orDie);
          yield* partition.insert(id, value).pipe(Effect.orDie);
        }

        yield* broadcast(frame);
        return frame;
      });

      // ---------------------------------------------------------------------------------
      // Read
      // ---------------------------------------------------------------------------------

      /** Resolves to false if the reader hung up part way */
      const replay = (subscriber: Subscriber.Subscriber, options: ReadOptions) =>
        Effect.gen(function* () {
          const frames = scan(
            options.lastId === undefined ? {} : { lower: Bound.Excluded({ key: options.lastId }) },
          );
          const strategy = options.compactionStrategy;

          if (strategy === undefined) {
            let open = true;
            yield* Stream.runForEachWhile(frames, (frame) =>
              subscriber.send(frame).pipe(
                Effect.map((sent) => {
                  open = sent;
                  return sent;
                }),
              ),
            );
            return open;
          }

          // Latest frame per key; a re-seen key moves to the back
          const latest = new Map<string, Frame>();
          yield* Stream.runForEach(frames, (frame) =>
            Effect.sync(() => {
              const key = strategy(frame);
              if (Option.isSome(key)) {
                latest.delete(key.value);
                latest.set(key.value, frame);
              }
            }),
          );
          for (const frame of latest.values()) {
            if (!(yield* subscriber.send(frame))) return false;
          }
          return true;
        });

      const heartbeat = (subscriber: Subscriber.Subscriber, interval: Duration.Duration) =>
        Effect.gen(function* () {
          while (true) {
            yield* Effect.sleep(interval);
            const id = yield* nextId;
            if (!(yield* subscriber.send(synthetic(PULSE_TOPIC, id)))) return;
          }
        });

      const handleRead = Effect.fn("Store.read")(function* (
        subscriber: Subscriber.Subscriber,
        options: ReadOptions,
      ) {
        const follow = options.follow ?? FollowOption.Off;
        const tail = options.tail ?? false;

        if (!tail && !(yield* replay(subscriber, options))) return;

        if (follow._tag === "Off") {
          yield* subscriber.end;
          return;
        }

        if (!tail && options.compactionStrategy === undefined) {
          const id = yield* nextId;
          if (!(yield* subscriber.send(synthetic(THRESHOLD_TOPIC, id)))) return;
        }

        subscribers.add(subscriber);

        if (follow._tag === "WithHeartbeat") {
          yield* Effect.forkIn(heartbeat(subscriber, follow.interval), subscriber.scope);
        }
      });

      // ---------------------------------------------------------------------------------
      // Collect
      // ---------------------------------------------------------------------------------

      const handleCollect = Effect.fn("Store.collect")(function* () {
        const now = yield* Clock.currentTimeMillis;
        const seenPerTopic = new Map<string, number>();
        const expired: FrameId[] = [];

        // Newest first, so a frame's rank within its topic is known when it is reached
        yield* Stream.runForEach(scan({ reverse: true }), (frame) =>
          Effect.sync(() => {
            const rank = (seenPerTopic.get(frame.topic) ?? 0) + 1;
            seenPerTopic.set(frame.topic, rank);
            const ttl = frame.ttl;
            if (ttl._tag === "Head" && rank > ttl.n) {
              expired.push(frame.id);
            } else if (
              ttl._tag === "Time" &&
              FrameId.timestamp(frame.id) + Duration.toMillis(ttl.duration) < now
            ) {
              expired.push(frame.id);
            }
          }),
        );

        for (const id of expired) {
          yield* partition.remove(id).pipe(Effect.orDie);
        }
        if (expired.length > 0) {
          yield* Effect.log(`collected ${expired.length} expired frames`);
        }
        return expired.reverse();
      });

      // ---------------------------------------------------------------------------------
      // Command loop
      // ---------------------------------------------------------------------------------

      const process = (command: Command) =>
        Command.$match(command, {
          Append: ({ draft, reply }) =>
            handleAppend(draft).pipe(
              Effect.exit,
              Effect.flatMap((exit) => Effect.zipRight(Deferred.done(reply, exit), exit)),
            ),
          Read: ({ subscriber, options }) => handleRead(subscriber, options),
          Collect: ({ reply }) =>
            handleCollect().pipe(
              Effect.exit,
              Effect.flatMap((exit) => Effect.zipRight(Deferred.done(reply, exit), exit)),
            ),
        });

      // Succeeds when the loop is shut down, fails with the cause if it died
      const halted = yield* Deferred.make<void>();

      const shutdown = Effect.gen(function* () {
        yield* Queue.shutdown(commands);
        for (const subscriber of subscribers) {
          yield* subscriber.shutdown;
        }
        subscribers.clear();
      });

      const teardown = (cause: Cause.Cause<never>) =>
        Effect.gen(function* () {
          if (Cause.isInterruptedOnly(cause)) {
            yield* Deferred.succeed(halted, undefined);
          } else {
            yield* Effect.logFatal("store command loop died", cause);
            yield* Deferred.failCause(halted, cause);
          }
          yield* shutdown;
        });

      yield* Queue.take(commands).pipe(
        Effect.flatMap(process),
        Effect.forever,
        Effect.onError(teardown),
        Effect.forkScoped,
      );

      // Runs before the loop fiber is interrupted, and also covers a loop that never started
      yield* Effect.addFinalizer(() =>
        Deferred.succeed(halted, undefined).pipe(Effect.zipRight(shutdown)),
      );

      yield* Effect.logDebug("store opened").pipe(
        Effect.annotateLogs({ path, newest: Option.getOrNull(newest) }),
      );

      // ---------------------------------------------------------------------------------
      // Service
      // ---------------------------------------------------------------------------------

      const submit = <A>(make: (reply: Deferred.Deferred<A>) => Command) =>
        Effect.gen(function* () {
          const reply = yield* Deferred.make<A>();
          yield* Queue.offer(commands, make(reply));
          return yield* Effect.raceFirst(
            Deferred.await(reply),
            Deferred.await(halted).pipe(Effect.zipRight(Effect.interrupt)),
          );
        });

      const append = (draft: FrameDraft) =>
        submit<Frame>((reply) => Command.Append({ draft, reply }));

      return Store.of({
        path,

        append,

        appendWithContent: <E>({ topic, content, meta, ttl }: AppendWithContentInput<E>) =>
          Effect.scoped(
            Effect.gen(function* () {
              const writer = yield* cas.writer;
              yield* Stream.runForEach(content, (chunk) => writer.write(chunk));
              return yield* writer.commit;
            }),
          ).pipe(
            Effect.flatMap((hash) =>
              append(
                FrameDraft.make({
                  topic,
                  hash: Option.some(hash),
                  meta: Option.fromNullable(meta),
                  ttl: ttl ?? Ttl.Forever,
                }),
              ),
            ),
          ),

        read: (options = {}) =>
          Effect.gen(function* () {
            const scope = yield* Effect.scope;
            const subscriber = yield* Subscriber.make(scope);
            yield* Queue.offer(commands, Command.Read({ subscriber, options }));
            return subscriber.stream.pipe(Stream.interruptWhen(Deferred.await(halted)));
          }),

        get: (id) =>
          partition.get(id).pipe(
            Effect.orDie,
            Effect.flatMap(
              Option.match({
                onNone: () => Effect.succeedNone,
                onSome: (value) => Effect.asSome(decode(id, value)),
              }),
            ),
          ),

        head: (topic) =>
          scan({ reverse: true }).pipe(
            Stream.filter((frame) => frame.topic === topic),
            Stream.runHead,
          ),

        collect: submit<ReadonlyArray<FrameId>>((reply) => Command.Collect({ reply })),

        casWriter: cas.writer,
        casReader: cas.reader,
        casInsert: cas.insert,
        casRead: cas.read,
      });
    }),
  );

/**
 * Store persisted under `path`: SQLite partition at {path}/partition/stream.db,
 * content at {path}/cas.
 */
export const layer = (
  path: string,
): Layer.Layer<Store, PartitionError | CasError, Fs.FileSystem | Path.Path> =>
  Layer.unwrapEffect(
    Effect.gen(function* () {
      const fs = yield* Fs.FileSystem;
      const paths = yield* Path.Path;

      const partitionDir = paths.join(path, "partition");
      yield* fs
        .makeDirectory(partitionDir, { recursive: true })
        .pipe(Effect.mapError((cause) => PartitionError.make({ cause })));

      return liveLayer(path).pipe(
        Layer.provide(
          Layer.merge(
            sqliteLayer(paths.join(partitionDir, "stream.db")),
            fileSystemLayer(paths.join(path, "cas")),
          ),
        ),
      );
    }),
  );
