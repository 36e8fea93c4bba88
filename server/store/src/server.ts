import { createServer } from "node:http";

import {
  FileSystem,
  HttpMiddleware,
  HttpRouter,
  HttpServer,
  HttpServerRequest,
  HttpServerResponse,
} from "@effect/platform";
import { NodeHttpServer } from "@effect/platform-node";
import { Effect, Layer, Schema, Stream } from "effect";

import { Frame, Integrity, ReadOptions, Ttl } from "./domain.js";
import * as Store from "./services/store/index.js";

const requestUrl = (req: HttpServerRequest.HttpServerRequest) =>
  new URL(req.url, "http://localhost");

const encodeFrame = Schema.encode(Frame);

const badRequest = (error: { readonly message: string }) =>
  HttpServerResponse.json({ error: error.message }, { status: 400 });

// GET /stream -> newline-delimited JSON frames
const streamHandler = Effect.gen(function* () {
  const req = yield* HttpServerRequest.HttpServerRequest;
  const options = yield* ReadOptions.fromQuery(requestUrl(req).search);
  const store = yield* Store.Store;

  const body = Stream.unwrapScoped(store.read(options)).pipe(
    Stream.mapEffect((frame) => Effect.orDie(encodeFrame(frame))),
    Stream.map((encoded) => `${JSON.stringify(encoded)}\n`),
    Stream.encodeText,
  );

  return HttpServerResponse.stream(body, { contentType: "application/x-ndjson" });
}).pipe(Effect.withSpan("http.read"), Effect.catchTag("ParseError", badRequest));

// GET /cas?hash=sha256-... -> raw content
const casHandler = Effect.gen(function* () {
  const req = yield* HttpServerRequest.HttpServerRequest;
  const hash = yield* Schema.decodeUnknown(Integrity)(requestUrl(req).searchParams.get("hash"));
  const store = yield* Store.Store;
  const content = yield* store.casReader(hash);

  return HttpServerResponse.stream(content, { contentType: "application/octet-stream" });
}).pipe(
  Effect.withSpan("http.cas"),
  Effect.catchTags({
    ParseError: badRequest,
    CasNotFoundError: (error) => HttpServerResponse.json({ error: error.message }, { status: 404 }),
  }),
);

// POST /<topic>?ttl=... -> body into the CAS, frame appended
const appendHandler = Effect.gen(function* () {
  const req = yield* HttpServerRequest.HttpServerRequest;
  const url = requestUrl(req);
  const topic = url.pathname.replace(/^\/+/, "") || "stream";
  const ttlParam = url.searchParams.get("ttl");
  // Checked before the body is touched
  const ttl = ttlParam === null ? Ttl.Forever : yield* Ttl.parse(ttlParam);

  const store = yield* Store.Store;
  const frame = yield* store.appendWithContent({ topic, content: req.stream, ttl });

  return yield* HttpServerResponse.json(yield* encodeFrame(frame));
}).pipe(
  Effect.withSpan("http.append"),
  Effect.tapError((error) => Effect.logError("Request failed", error)),
  Effect.catchTags({
    ParseError: badRequest,
    RequestError: badRequest,
  }),
);

// Anything else on GET
const placeholderHandler = HttpServerResponse.text("hai", { contentType: "text/html" });

// Router + serve layer (without Node HTTP - for testing)
export const AppLive = HttpRouter.empty.pipe(
  HttpRouter.get("/stream", streamHandler),
  HttpRouter.get("/cas", casHandler),
  HttpRouter.get("*", Effect.succeed(placeholderHandler)),
  HttpRouter.post("*", appendHandler),
  HttpServer.serve(HttpMiddleware.logger),
  HttpServer.withLogAddress,
);

/** Full server layer on a Unix socket; a stale socket file is removed first */
export const ServerLive = (socketPath: string) =>
  Layer.unwrapEffect(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      yield* fs.remove(socketPath, { force: true });
      return AppLive.pipe(Layer.provide(NodeHttpServer.layer(createServer, { path: socketPath })));
    }),
  );
