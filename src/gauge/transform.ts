/**
 * Gauge Module - Pure Transformations
 *
 * Power-to-dial mapping and fixed-width number formatting.
 */
import type { GaugeCalibration, GaugeSign, GaugeState } from "./schema.js";
import {
  DEFAULT_GAUGE_CALIBRATION,
  ENERGY_UNIT,
  POWER_UNIT,
} from "./schema.js";

// =============================================================================
// Number Formatting
// =============================================================================

/**
 * Round half away from zero to the given number of decimals.
 *
 * @example
 * roundHalfAwayFromZero(-2.25, 1); // -2.3
 */
export function roundHalfAwayFromZero(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

/**
 * Fixed-point text with exactly `decimals` fraction digits, left-padded with
 * spaces to `minWidth`.
 *
 * @example
 * formatFixed(3.14159, 1, 5); // "  3.1"
 */
export function formatFixed(
  value: number,
  decimals: number,
  minWidth: number,
): string {
  return roundHalfAwayFromZero(value, decimals)
    .toFixed(decimals)
    .padStart(minWidth, " ");
}

// =============================================================================
// Gauge Mapping
// =============================================================================

/**
 * Map net power (kW, import positive) onto the dial.
 * Values outside the calibration range give angles outside -90..90.
 *
 * @example
 * mapGauge(0); // { angle: -45, sign: "import", text: "0.0 kW" }
 */
export function mapGauge(
  netPower: number,
  calibration: GaugeCalibration = DEFAULT_GAUGE_CALIBRATION,
): GaugeState {
  const { returnMax, consumptionMax } = calibration;
  const angle =
    -90 + ((netPower + returnMax) / (returnMax + consumptionMax)) * 180;

  return {
    angle,
    sign: gaugeSign(netPower),
    text: formatPower(netPower),
  };
}

export function gaugeSign(netPower: number): GaugeSign {
  return netPower < 0 ? "export" : "import";
}

/**
 * Magnitude of a power value for display: "0.5 kW", "10.0 kW".
 */
export function formatPower(netPower: number): string {
  const magnitude = roundHalfAwayFromZero(Math.abs(netPower), 1);
  const width = magnitude >= 10 ? 4 : 3;
  return `${formatFixed(magnitude, 1, width)} ${POWER_UNIT}`;
}

/**
 * Signed day total for display: " 3.2 kWh", "-1.5 kWh".
 */
export function formatDayTotal(dayTotal: number): string {
  return `${formatFixed(dayTotal, 1, 4)} ${ENERGY_UNIT}`;
}
