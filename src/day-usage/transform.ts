/**
 * Day Usage Module - Pure Transformations
 *
 * Day-key extraction and the aggregation step. No side effects.
 */
import { type Result, err, ok } from "neverthrow";

import type { DayUsageError } from "./errors.js";
import { invalidTimestamp } from "./errors.js";
import type { DayUsageState, DayUsageUpdate, RegisterInput } from "./schema.js";
import { DAY_KEY_LENGTH } from "./schema.js";

/**
 * Extract the YYMMDD day key from a meter timestamp.
 *
 * @example
 * extractDayKey("241019153000S"); // ok("241019")
 */
export function extractDayKey(
  timestamp: string,
): Result<string, DayUsageError> {
  if (timestamp.length < DAY_KEY_LENGTH) {
    return err(invalidTimestamp(timestamp));
  }
  return ok(timestamp.slice(0, DAY_KEY_LENGTH));
}

/**
 * Apply one reading to the day state.
 *
 * The first reading after start only records the baseline, so a restart never
 * produces a delta against registers from before it. Baselines are refreshed
 * on every reading, including the one that crosses a day boundary.
 */
export function applyReading(
  state: DayUsageState,
  input: RegisterInput,
): Result<DayUsageUpdate, DayUsageError> {
  return extractDayKey(input.timestamp).map((dayKey) => {
    const dayChanged = dayKey !== state.dayKey;
    let dayTotal = dayChanged ? 0 : state.dayTotal;

    const delivered = input.delivered1 + input.delivered2;
    const returned = input.returned1 + input.returned2;

    let delta: number | null = null;
    let registerRollback = false;

    if (state.baselineDelivered !== null && state.baselineReturned !== null) {
      const deliveredDelta = delivered - state.baselineDelivered;
      const returnedDelta = returned - state.baselineReturned;
      registerRollback = deliveredDelta < 0 || returnedDelta < 0;
      delta = deliveredDelta - returnedDelta;
      dayTotal += delta;
    }

    return {
      state: {
        dayKey,
        dayTotal,
        baselineDelivered: delivered,
        baselineReturned: returned,
      },
      dayChanged,
      delta,
      registerRollback,
    };
  });
}
