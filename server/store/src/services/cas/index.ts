/**
 * Cas - content-addressed storage for frame payloads
 */

// Re-export service definition
export type { CasWriter } from "./service.js";
export { Cas, CasError, CasNotFoundError, CasTypeId } from "./service.js";

// Re-export layers
export { inMemoryLayer } from "./inMemory.js";
export { fileSystemLayer } from "./fileSystem.js";
