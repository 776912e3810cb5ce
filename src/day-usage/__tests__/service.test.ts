/**
 * Usage aggregator service tests.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

const logger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  trace: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => logger,
}));

import { INITIAL_DAY_USAGE_STATE } from "../schema.js";
import { createUsageAggregator } from "../service.js";

describe("UsageAggregator", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("first update never changes the day total", () => {
    const aggregator = createUsageAggregator();

    const total = aggregator.update({
      timestamp: "241019100000S",
      delivered1: 9000,
      delivered2: 7000,
      returned1: 300,
      returned2: 200,
    });

    expect(total._unsafeUnwrap()).toBe(0);
    expect(aggregator.getState().baselineDelivered).toBe(16000);
    expect(aggregator.getState().baselineReturned).toBe(500);
  });

  test("returns the accumulated total after a delta", () => {
    const aggregator = createUsageAggregator();
    aggregator.update({
      timestamp: "241019100000S",
      delivered1: 3,
      delivered2: 2,
      returned1: 0,
      returned2: 0,
    });

    const total = aggregator.update({
      timestamp: "241019100010S",
      delivered1: 4,
      delivered2: 2.5,
      returned1: 0.5,
      returned2: 0,
    });

    expect(total._unsafeUnwrap()).toBe(1);
  });

  test("leaves state untouched on a short timestamp", () => {
    const aggregator = createUsageAggregator();
    aggregator.update({
      timestamp: "241019100000S",
      delivered1: 5,
      delivered2: 0,
      returned1: 0,
      returned2: 0,
    });
    const before = aggregator.getState();

    const total = aggregator.update({
      timestamp: "24",
      delivered1: 50,
      delivered2: 0,
      returned1: 0,
      returned2: 0,
    });

    expect(total.isErr()).toBe(true);
    expect(aggregator.getState()).toBe(before);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test("logs a warning when a register moves backwards", () => {
    const aggregator = createUsageAggregator();
    const base = { delivered2: 0, returned1: 0, returned2: 0 };
    aggregator.update({ timestamp: "241019100000S", delivered1: 10, ...base });
    aggregator.update({ timestamp: "241019100010S", delivered1: 9, ...base });

    expect(logger.warn).toHaveBeenCalledWith(
      { delta: -1, timestamp: "241019100010S" },
      "Meter register moved backwards, delta applied unmodified",
    );
  });

  test("reset returns to the initial state", () => {
    const aggregator = createUsageAggregator();
    aggregator.update({
      timestamp: "241019100000S",
      delivered1: 5,
      delivered2: 0,
      returned1: 0,
      returned2: 0,
    });

    aggregator.reset();

    expect(aggregator.getState()).toEqual(INITIAL_DAY_USAGE_STATE);
  });
});
