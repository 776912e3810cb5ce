/**
 * Gauge transformation tests.
 */
import { describe, expect, it } from "vitest";
import {
  formatDayTotal,
  formatFixed,
  formatPower,
  mapGauge,
  roundHalfAwayFromZero,
} from "../transform.js";

describe("roundHalfAwayFromZero", () => {
  it("rounds halves up for positive values", () => {
    expect(roundHalfAwayFromZero(1.25, 1)).toBe(1.3);
  });

  it("rounds halves down for negative values", () => {
    expect(roundHalfAwayFromZero(-1.25, 1)).toBe(-1.3);
  });

  it("rounds to whole numbers", () => {
    expect(roundHalfAwayFromZero(2.5, 0)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5, 0)).toBe(-3);
  });
});

describe("formatFixed", () => {
  it("pads to the minimum width", () => {
    expect(formatFixed(3.14159, 1, 5)).toBe("  3.1");
  });

  it("does not truncate values wider than the minimum", () => {
    expect(formatFixed(1234.56, 1, 3)).toBe("1234.6");
  });

  it("always renders the requested fraction digits", () => {
    expect(formatFixed(7, 2, 0)).toBe("7.00");
  });

  it("keeps the sign of negative values", () => {
    expect(formatFixed(-2.25, 1, 5)).toBe(" -2.3");
  });
});

describe("mapGauge", () => {
  it("maps zero power to -45 degrees with default calibration", () => {
    expect(mapGauge(0).angle).toBe(-45);
  });

  it("maps full consumption to 90 degrees", () => {
    expect(mapGauge(18).angle).toBe(90);
  });

  it("maps full return to -90 degrees", () => {
    expect(mapGauge(-6).angle).toBe(-90);
  });

  it("does not clamp values outside the calibration range", () => {
    expect(mapGauge(30).angle).toBe(180);
    expect(mapGauge(-12).angle).toBe(-135);
  });

  it("uses a custom calibration", () => {
    expect(mapGauge(0, { returnMax: 5, consumptionMax: 5 }).angle).toBe(0);
  });

  it("shows export for negative power", () => {
    expect(mapGauge(-0.001).sign).toBe("export");
    expect(mapGauge(-5).sign).toBe("export");
  });

  it("shows import for zero and positive power", () => {
    expect(mapGauge(0).sign).toBe("import");
    expect(mapGauge(2.4).sign).toBe("import");
  });

  it("formats the magnitude crossing ten after rounding", () => {
    expect(mapGauge(9.96).text).toBe("10.0 kW");
  });

  it("formats export power without a sign", () => {
    expect(mapGauge(-1.25)).toEqual({
      angle: -90 + ((-1.25 + 6) / 24) * 180,
      sign: "export",
      text: "1.3 kW",
    });
  });
});

describe("formatPower", () => {
  it("uses three characters below ten", () => {
    expect(formatPower(0.5)).toBe("0.5 kW");
    expect(formatPower(0)).toBe("0.0 kW");
  });

  it("uses four characters from ten upwards", () => {
    expect(formatPower(12.34)).toBe("12.3 kW");
  });
});

describe("formatDayTotal", () => {
  it("pads small totals to four characters", () => {
    expect(formatDayTotal(3.2)).toBe(" 3.2 kWh");
  });

  it("keeps a negative total signed", () => {
    expect(formatDayTotal(-1.5)).toBe("-1.5 kWh");
  });
});
