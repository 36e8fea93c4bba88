/**
 * Shared domain types for the event store
 */
import { Duration, Effect, Either, Option, ParseResult, Schema } from "effect";
import { Scru128Id } from "scru128";

// -------------------------------------------------------------------------------------
// Branded primitives
// -------------------------------------------------------------------------------------

const isScru128 = (s: string): boolean =>
  Either.isRight(Either.try(() => Scru128Id.fromString(s)));

// Canonical form is lowercase, so stored keys compare as strings in creation order
const FrameId_ = Schema.String.pipe(
  Schema.pattern(/^[0-9a-z]{25}$/),
  Schema.filter(isScru128, { message: () => "expected a SCRU128 identifier" }),
  Schema.brand("FrameId"),
);
type FrameId_ = typeof FrameId_.Type;

/** Accepts either case on input, always decodes to the canonical lowercase form */
const FrameIdFromString = Schema.transform(
  Schema.String.pipe(Schema.pattern(/^[0-9A-Za-z]{25}$/)),
  FrameId_,
  {
    strict: true,
    decode: (s) => s.toLowerCase(),
    encode: (id) => id,
  },
);

const FrameIdExtensions = {
  make: FrameId_.make,
  /** Unix milliseconds embedded in the identifier */
  timestamp: (id: FrameId_): number => Scru128Id.fromString(id).timestamp,
  fromScru128: (id: Scru128Id): FrameId_ => FrameId_.make(id.toString()),
};

export const FrameId = Object.assign(FrameIdFromString, FrameIdExtensions);
export type FrameId = FrameId_;

const Integrity_ = Schema.String.pipe(
  Schema.pattern(/^sha256-[A-Za-z0-9+/]{43}=$/),
  Schema.brand("Integrity"),
);
type Integrity_ = typeof Integrity_.Type;

const IntegrityExtensions = {
  fromDigest: (digest: Uint8Array): Integrity_ =>
    Integrity_.make(`sha256-${Buffer.from(digest).toString("base64")}`),
  /** Hex form of the digest, used to lay content out on disk */
  toHex: (integrity: Integrity_): string =>
    Buffer.from(integrity.slice("sha256-".length), "base64").toString("hex"),
};

/** Subresource-Integrity style digest of a CAS payload */
export const Integrity = Object.assign(Integrity_, IntegrityExtensions);
export type Integrity = Integrity_;

// -------------------------------------------------------------------------------------
// Retention policy
// -------------------------------------------------------------------------------------

const TtlForever = Schema.TaggedStruct("Forever", {});
const TtlEphemeral = Schema.TaggedStruct("Ephemeral", {});
const TtlTime = Schema.TaggedStruct("Time", { duration: Schema.DurationFromSelf });
const TtlHead = Schema.TaggedStruct("Head", {
  n: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
});

const TtlUnion = Schema.Union(TtlForever, TtlEphemeral, TtlTime, TtlHead);
export type Ttl = typeof TtlUnion.Type;

const parseTtl = (token: string): Option.Option<Ttl> => {
  if (token === "forever") return Option.some(TtlForever.make({}));
  if (token === "ephemeral") return Option.some(TtlEphemeral.make({}));
  const time = /^time:(\d+)$/.exec(token);
  if (time) return Option.some(TtlTime.make({ duration: Duration.millis(Number(time[1])) }));
  const head = /^head:([1-9]\d*)$/.exec(token);
  if (head) return Option.some(TtlHead.make({ n: Number(head[1]) }));
  return Option.none();
};

const formatTtl = (ttl: Ttl): string => {
  switch (ttl._tag) {
    case "Forever":
      return "forever";
    case "Ephemeral":
      return "ephemeral";
    case "Time":
      return `time:${Math.round(Duration.toMillis(ttl.duration))}`;
    case "Head":
      return `head:${ttl.n}`;
  }
};

/** Ttl encoded as its wire token: forever | ephemeral | time:<millis> | head:<n> */
const TtlFromString = Schema.transformOrFail(Schema.String, TtlUnion, {
  strict: true,
  decode: (token, _, ast) =>
    Option.match(parseTtl(token), {
      onNone: () =>
        ParseResult.fail(
          new ParseResult.Type(
            ast,
            token,
            `invalid TTL "${token}": expected forever, ephemeral, time:<milliseconds> or head:<n>`,
          ),
        ),
      onSome: ParseResult.succeed,
    }),
  encode: (ttl) => ParseResult.succeed(formatTtl(ttl)),
});

export const Ttl = Object.assign(TtlFromString, {
  Forever: TtlForever.make({}),
  Ephemeral: TtlEphemeral.make({}),
  Time: (duration: Duration.DurationInput): Ttl =>
    TtlTime.make({ duration: Duration.decode(duration) }),
  Head: (n: number): Ttl => TtlHead.make({ n }),
  parse: (token: string): Effect.Effect<Ttl, ParseResult.ParseError> =>
    Schema.decode(TtlFromString)(token),
  format: formatTtl,
});

// -------------------------------------------------------------------------------------
// FrameDraft (base) -> Frame (extended with id)
// -------------------------------------------------------------------------------------

/** Frame draft - what callers provide to append */
export class FrameDraft extends Schema.Class<FrameDraft>("FrameDraft")({
  topic: Schema.String,
  hash: Schema.optionalWith(Schema.OptionFromNullOr(Integrity), {
    default: () => Option.none(),
  }),
  meta: Schema.optionalWith(Schema.OptionFromNullOr(Schema.Unknown), {
    default: () => Option.none(),
  }),
  ttl: Schema.optionalWith(Ttl, { default: () => Ttl.Forever }),
}) {}

/** Full frame with the id assigned by the store */
export class Frame extends FrameDraft.extend<Frame>("Frame")({
  id: FrameId,
}) {}

/** Marks the end of replayed history on a following read */
export const THRESHOLD_TOPIC = "xs.threshold";

/** Heartbeat emitted on a following read with a heartbeat interval */
export const PULSE_TOPIC = "xs.pulse";

export const synthetic = (topic: string, id: FrameId): Frame =>
  Frame.make({ id, topic, ttl: Ttl.Ephemeral });

// -------------------------------------------------------------------------------------
// Read options
// -------------------------------------------------------------------------------------

const FollowOff = Schema.TaggedStruct("Off", {});
const FollowOn = Schema.TaggedStruct("On", {});
const FollowWithHeartbeat = Schema.TaggedStruct("WithHeartbeat", {
  interval: Schema.DurationFromSelf,
});

const FollowUnion = Schema.Union(FollowOff, FollowOn, FollowWithHeartbeat);
export type FollowOption = typeof FollowUnion.Type;

const parseFollow = (value: string): Option.Option<FollowOption> => {
  if (value === "" || value === "yes" || value === "true") return Option.some(FollowOn.make({}));
  if (/^\d+$/.test(value)) {
    return Option.some(FollowWithHeartbeat.make({ interval: Duration.millis(Number(value)) }));
  }
  if (value === "false" || value === "no") return Option.some(FollowOff.make({}));
  return Option.none();
};

/** Follow encoded as a query value: "" | yes | true | <millis> | false | no */
const FollowFromString = Schema.transformOrFail(Schema.String, FollowUnion, {
  strict: true,
  decode: (value, _, ast) =>
    Option.match(parseFollow(value), {
      onNone: () =>
        ParseResult.fail(new ParseResult.Type(ast, value, "invalid value for follow option")),
      onSome: ParseResult.succeed,
    }),
  encode: (follow) => {
    switch (follow._tag) {
      case "Off":
        return ParseResult.succeed("false");
      case "On":
        return ParseResult.succeed("true");
      case "WithHeartbeat":
        return ParseResult.succeed(String(Math.round(Duration.toMillis(follow.interval))));
    }
  },
});

export const FollowOption = Object.assign(FollowFromString, {
  Off: FollowOff.make({}),
  On: FollowOn.make({}),
  WithHeartbeat: (interval: Duration.DurationInput): FollowOption =>
    FollowWithHeartbeat.make({ interval: Duration.decode(interval) }),
});

const TailFromString = Schema.transform(Schema.String, Schema.Boolean, {
  strict: true,
  decode: (value) => !(value === "false" || value === "no" || value === "0"),
  encode: (tail) => (tail ? "true" : "false"),
});

/** Maps a frame to its dedup key; frames mapped to None are left out of a compacted replay */
export type CompactionStrategy = (frame: Frame) => Option.Option<string>;

export interface ReadOptions {
  /** Replay nothing, go straight to live frames */
  readonly tail?: boolean;
  readonly follow?: FollowOption;
  /** Resume point (exclusive) */
  readonly lastId?: FrameId;
  readonly compactionStrategy?: CompactionStrategy;
}

const ReadQuery = Schema.Struct({
  follow: Schema.optional(FollowFromString),
  tail: Schema.optional(TailFromString),
  "last-id": Schema.optional(FrameId),
});

export const ReadOptions = {
  /** Decode read options from a URL query string, e.g. `follow=5000&last-id=...` */
  fromQuery: (query: string | undefined): Effect.Effect<ReadOptions, ParseResult.ParseError> =>
    Schema.decodeUnknown(ReadQuery)(Object.fromEntries(new URLSearchParams(query ?? ""))).pipe(
      Effect.map(
        (q): ReadOptions => ({
          ...(q.follow !== undefined && { follow: q.follow }),
          ...(q.tail !== undefined && { tail: q.tail }),
          ...(q["last-id"] !== undefined && { lastId: q["last-id"] }),
        }),
      ),
    ),
};
