/**
 * Day Usage Module - Service Layer
 *
 * Owns one DayUsageState and logs the notable transitions.
 */
import type { Result } from "neverthrow";

import { createLogger } from "../logger.js";
import type { DayUsageError } from "./errors.js";
import { formatDayUsageError } from "./errors.js";
import type { DayUsageState, RegisterInput } from "./schema.js";
import { INITIAL_DAY_USAGE_STATE } from "./schema.js";
import { applyReading } from "./transform.js";

const log = createLogger("usage");

export type UsageAggregator = Readonly<{
  /** Apply a reading and return the current day total (kWh). */
  update: (input: RegisterInput) => Result<number, DayUsageError>;
  getState: () => DayUsageState;
  reset: () => void;
}>;

/**
 * Create an aggregator with its own memory-resident state.
 */
export function createUsageAggregator(
  initial: DayUsageState = INITIAL_DAY_USAGE_STATE,
): UsageAggregator {
  let state = initial;

  return {
    update(input) {
      const result = applyReading(state, input);

      if (result.isErr()) {
        log.warn(
          { timestamp: input.timestamp },
          formatDayUsageError(result.error),
        );
        return result.map((update) => update.state.dayTotal);
      }

      const update = result.value;

      if (update.dayChanged) {
        log.info(
          { previousDay: state.dayKey || null, day: update.state.dayKey },
          "Day boundary crossed, day total reset",
        );
      }
      if (update.delta === null) {
        log.info(
          {
            baselineDelivered: update.state.baselineDelivered,
            baselineReturned: update.state.baselineReturned,
          },
          "Register baseline established",
        );
      }
      if (update.registerRollback) {
        log.warn(
          { delta: update.delta, timestamp: input.timestamp },
          "Meter register moved backwards, delta applied unmodified",
        );
      }

      state = update.state;
      return result.map((u) => u.state.dayTotal);
    },

    getState() {
      return state;
    },

    reset() {
      state = INITIAL_DAY_USAGE_STATE;
    },
  };
}
