import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Config, Effect, Layer, Logger, LogLevel } from "effect";

import { ServerLive } from "./server.js";
import * as Store from "./services/store/index.js";

// -------------------------------------------------------------------------------------
// Configuration
// -------------------------------------------------------------------------------------
// XS_STORE_PATH - storage directory; the gateway listens on {XS_STORE_PATH}/sock
// XS_LOG_LEVEL  - All | Trace | Debug | Info | Warning | Error | Fatal | None
// -------------------------------------------------------------------------------------
const StorePath = Config.string("XS_STORE_PATH").pipe(Config.withDefault(".data/store"));
const MinimumLogLevel = Config.logLevel("XS_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info));

const main = Effect.gen(function* () {
  const path = yield* StorePath;
  const level = yield* MinimumLogLevel;

  const MainLive = ServerLive(`${path}/sock`).pipe(Layer.provide(Store.layer(path)));

  yield* Layer.launch(MainLive).pipe(Logger.withMinimumLogLevel(level));
}).pipe(Effect.provide(NodeContext.layer));

NodeRuntime.runMain(main);
