/**
 * Day Usage Module - Types
 *
 * State for the running daily net-energy total.
 */
// =============================================================================
// Register Input
// =============================================================================

/**
 * Cumulative tariff registers plus the reading timestamp (kWh).
 */
export type RegisterInput = Readonly<{
  /** Meter timestamp, YYMMDDhhmmss followed by S or W */
  timestamp: string;
  delivered1: number;
  delivered2: number;
  returned1: number;
  returned2: number;
}>;

// =============================================================================
// Day Usage State
// =============================================================================

/**
 * Running day total. A null baseline means no reading has been seen yet.
 */
export type DayUsageState = Readonly<{
  /** Date prefix of the last reading, "" before the first one */
  dayKey: string;
  /** Net energy (import - export) since the last day boundary */
  dayTotal: number;
  baselineDelivered: number | null;
  baselineReturned: number | null;
}>;

export const INITIAL_DAY_USAGE_STATE: DayUsageState = {
  dayKey: "",
  dayTotal: 0,
  baselineDelivered: null,
  baselineReturned: null,
};

/**
 * Length of the date prefix of a meter timestamp (YYMMDD).
 */
export const DAY_KEY_LENGTH = 6;

// =============================================================================
// Update Outcome
// =============================================================================

export type DayUsageUpdate = Readonly<{
  state: DayUsageState;
  /** True when this reading crossed into a new day */
  dayChanged: boolean;
  /** Net delta applied, or null when the reading only set the baseline */
  delta: number | null;
  /** True when a register sum moved backwards */
  registerRollback: boolean;
}>;
