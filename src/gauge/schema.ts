/**
 * Gauge Module - Types
 *
 * Calibration and output shape of the power dial.
 */

/**
 * Power (kW) at the two ends of the dial.
 */
export type GaugeCalibration = Readonly<{
  returnMax: number;
  consumptionMax: number;
}>;

export const DEFAULT_GAUGE_CALIBRATION: GaugeCalibration = {
  returnMax: 6,
  consumptionMax: 18,
};

/**
 * Power flow direction shown by the dial colour.
 */
export type GaugeSign = "import" | "export";

export type GaugeState = Readonly<{
  /** Needle angle in degrees, nominally -90..90, not clamped */
  angle: number;
  sign: GaugeSign;
  /** Absolute power with unit, e.g. " 1.2 kW" */
  text: string;
}>;

export const POWER_UNIT = "kW";
export const ENERGY_UNIT = "kWh";
