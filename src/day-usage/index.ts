/**
 * Day Usage Module - Public API
 */

// Types
export type {
  DayUsageState,
  DayUsageUpdate,
  RegisterInput,
} from "./schema.js";
export type { DayUsageError } from "./errors.js";
export type { UsageAggregator } from "./service.js";

export { DAY_KEY_LENGTH, INITIAL_DAY_USAGE_STATE } from "./schema.js";

// Error utilities
export { formatDayUsageError } from "./errors.js";

// Service functions
export { createUsageAggregator } from "./service.js";

// Pure transformations
export { applyReading, extractDayKey } from "./transform.js";
