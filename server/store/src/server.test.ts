import { createServer } from "node:http";

import { HttpClient, HttpClientRequest, HttpServer } from "@effect/platform";
import { NodeHttpClient, NodeHttpServer } from "@effect/platform-node";
import { describe, expect, it } from "@effect/vitest";
import { Chunk, Effect, Layer, Schema, Stream } from "effect";

import { Frame, Ttl } from "./domain.js";
import { AppLive } from "./server.js";
import * as Cas from "./services/cas/index.js";
import * as Partition from "./services/partition/index.js";
import * as Store from "./services/store/index.js";

// Build test layers using the actual server
const HttpLive = NodeHttpServer.layer(createServer, { port: 0 });

const StoreLive = Store.liveLayer("memory").pipe(
  Layer.provide(Layer.merge(Partition.inMemoryLayer, Cas.inMemoryLayer)),
);

const TestClient = HttpServer.layerTestClient.pipe(
  Layer.provide(NodeHttpClient.layer),
  Layer.provide(AppLive.pipe(Layer.provide(StoreLive))),
  Layer.provide(HttpLive),
);

const HELLO_WORLD = "sha256-uU0nuZNNPgilLlLX2n2r+sSE7+N6U4DukIj3rOLvzek=";

const decodeFrame = Schema.decodeUnknown(Frame);
const decodeFrameLine = Schema.decodeUnknown(Schema.parseJson(Frame));

const post = (url: string, body: string) =>
  Effect.flatMap(HttpClient.HttpClient, (client) =>
    client.execute(HttpClientRequest.post(url).pipe(HttpClientRequest.bodyText(body))),
  );

const get = (url: string) =>
  Effect.flatMap(HttpClient.HttpClient, (client) => client.execute(HttpClientRequest.get(url)));

const postFrame = (url: string, body: string) =>
  post(url, body).pipe(
    Effect.flatMap((response) => response.json),
    Effect.flatMap(decodeFrame),
  );

describe("Gateway", () => {
  it.live("GET / returns the placeholder page", () =>
    Effect.gen(function* () {
      const response = yield* get("/");

      expect(response.status).toBe(200);
      expect(response.headers["content-type"]).toContain("text/html");
      expect(yield* response.text).toBe("hai");
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("POST stores the body and appends a frame on the path's topic", () =>
    Effect.gen(function* () {
      const frame = yield* postFrame("/notes", "hello world");

      expect(frame.topic).toBe("notes");
      expect(frame.hash._tag === "Some" && frame.hash.value).toBe(HELLO_WORLD);
      expect(frame.ttl).toEqual(Ttl.Forever);
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("POST to the root uses the stream topic and honours ttl", () =>
    Effect.gen(function* () {
      const frame = yield* postFrame("/?ttl=head:2", "x");

      expect(frame.topic).toBe("stream");
      expect(frame.ttl).toEqual(Ttl.Head(2));
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("POST with a malformed ttl is rejected", () =>
    Effect.gen(function* () {
      const response = yield* post("/notes?ttl=sometimes", "hello world");
      const stream = yield* get("/stream");

      expect(response.status).toBe(400);
      expect(yield* stream.text).toBe("");
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("GET /cas returns stored content", () =>
    Effect.gen(function* () {
      yield* postFrame("/notes", "hello world");

      const response = yield* get(`/cas?hash=${encodeURIComponent(HELLO_WORLD)}`);

      expect(response.status).toBe(200);
      expect(yield* response.text).toBe("hello world");
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("GET /cas distinguishes unknown and malformed digests", () =>
    Effect.gen(function* () {
      const unknown = yield* get(`/cas?hash=${encodeURIComponent(HELLO_WORLD)}`);
      const malformed = yield* get("/cas?hash=md5-abc");

      expect(unknown.status).toBe(404);
      expect(malformed.status).toBe(400);
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("GET /stream returns frames as newline-delimited JSON", () =>
    Effect.gen(function* () {
      const first = yield* postFrame("/a", "1");
      const second = yield* postFrame("/b", "2");

      const response = yield* get("/stream");
      const lines = (yield* response.text).split("\n").filter((line) => line.length > 0);
      const frames = yield* Effect.forEach(lines, (line) => decodeFrameLine(line));

      expect(response.headers["content-type"]).toBe("application/x-ndjson");
      expect(frames.map((frame) => frame.id)).toEqual([first.id, second.id]);
      expect(frames.map((frame) => frame.topic)).toEqual(["a", "b"]);
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("GET /stream?follow keeps streaming past the threshold", () =>
    Effect.gen(function* () {
      const first = yield* postFrame("/a", "1");

      const response = yield* get("/stream?follow");
      const lines = yield* response.stream.pipe(
        Stream.decodeText(),
        Stream.splitLines,
        Stream.take(2),
        Stream.runCollect,
      );
      const frames = yield* Effect.forEach(Chunk.toReadonlyArray(lines), (line) => decodeFrameLine(line));

      expect(frames.map((frame) => frame.topic)).toEqual(["a", "xs.threshold"]);
      expect(frames[0].id).toBe(first.id);
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("GET /stream rejects malformed read options", () =>
    Effect.gen(function* () {
      const response = yield* get("/stream?last-id=123");

      expect(response.status).toBe(400);
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );

  it.live("other methods get 404", () =>
    Effect.gen(function* () {
      const client = yield* HttpClient.HttpClient;
      const response = yield* client.execute(HttpClientRequest.put("/notes"));

      expect(response.status).toBe(404);
    }).pipe(Effect.provide(TestClient), Effect.scoped),
  );
});
