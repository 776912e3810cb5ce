/**
 * Dispatch Module - Public API
 */

// Types
export type { DispatchCycle, DispatchSnapshot } from "./schema.js";
export type { Dispatcher, DispatcherDeps } from "./service.js";

export { INITIAL_DISPATCH_SNAPSHOT } from "./schema.js";

// Service functions
export { createDispatcher } from "./service.js";
