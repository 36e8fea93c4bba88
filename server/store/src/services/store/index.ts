/**
 * Store - the event log: a single-writer command loop over a Partition and a Cas
 */

// Re-export service definition
export { FrameCorruptionError, Store } from "./service.js";
export type { AppendWithContentInput } from "./service.js";

// Re-export layers
export { COMMAND_CAPACITY, layer, liveLayer } from "./live.js";
export { CAPACITY as READER_CAPACITY } from "./subscriber.js";
