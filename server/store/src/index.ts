/**
 * Embeddable event store: an append-only frame log with live followers,
 * content-addressed payloads and an HTTP gateway on a local socket.
 */
export * from "./domain.js";
export * as Cas from "./services/cas/index.js";
export * as Partition from "./services/partition/index.js";
export * as Store from "./services/store/index.js";
export { AppLive, ServerLive } from "./server.js";
export { makeWorkerPool, type WorkerPool } from "./utils/workerPool.js";
