/**
 * Dispatch Module - Schemas and Types
 *
 * State kept between telegram cycles for the query and display surfaces.
 */
import type { GaugeState } from "../gauge/index.js";
import type { RelayOutcome } from "../relay/index.js";
import type { MeterReading } from "../telegram/index.js";

// =============================================================================
// Cycle
// =============================================================================

/**
 * Everything computed from one telegram.
 */
export type DispatchCycle = Readonly<{
  reading: MeterReading;
  relay: RelayOutcome;
  /** kW, import positive */
  netPower: number;
  gauge: GaugeState;
  /** kWh; null when the aggregator rejected the reading */
  dayTotal: number | null;
  dayTotalText: string | null;
  dayKey: string;
}>;

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Latest computed values and cycle counters.
 */
export type DispatchSnapshot = Readonly<{
  netPower: number | null;
  dayTotal: number | null;
  dayKey: string | null;
  gauge: GaugeState | null;
  lastTimestamp: string | null;
  lastCycleAt: number | null;
  counters: Readonly<{
    telegrams: number;
    dropped: number;
    aggregationErrors: number;
    relayed: number;
  }>;
}>;

export const INITIAL_DISPATCH_SNAPSHOT: DispatchSnapshot = {
  netPower: null,
  dayTotal: null,
  dayKey: null,
  gauge: null,
  lastTimestamp: null,
  lastCycleAt: null,
  counters: {
    telegrams: 0,
    dropped: 0,
    aggregationErrors: 0,
    relayed: 0,
  },
};
