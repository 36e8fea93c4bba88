/**
 * Partition - ordered, durable map from frame id to serialized frame
 */

// Re-export service definition
export {
  Bound,
  inRange,
  PAGE_SIZE,
  Partition,
  PartitionError,
  PartitionTypeId,
} from "./service.js";
export type { RangeOptions } from "./service.js";

// Re-export layers
export { inMemoryLayer } from "./inMemory.js";
export { sqliteLayer } from "./sqlite.js";
