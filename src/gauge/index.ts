/**
 * Gauge Module - Public API
 */

// Types
export type { GaugeCalibration, GaugeSign, GaugeState } from "./schema.js";

export { DEFAULT_GAUGE_CALIBRATION } from "./schema.js";

// Pure transformations
export {
  formatDayTotal,
  formatFixed,
  formatPower,
  gaugeSign,
  mapGauge,
  roundHalfAwayFromZero,
} from "./transform.js";
