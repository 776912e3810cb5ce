/**
 * Dispatch Service Tests
 *
 * Full telegram cycles through the real relay, aggregator and gauge mapper.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationFailed: vi.fn(),
}));

import { createUsageAggregator } from "../../day-usage/index.js";
import { DEFAULT_GAUGE_CALIBRATION } from "../../gauge/index.js";
import { logOperationFailed } from "../../logger.js";
import type { RelayConsumer } from "../../relay/index.js";
import { createTelegramRelay, telegramChecksum } from "../../relay/index.js";
import type { DispatchCycle } from "../schema.js";
import { INITIAL_DISPATCH_SNAPSHOT } from "../schema.js";
import { createDispatcher } from "../service.js";

const encode = (text: string) => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

type TelegramValues = {
  timestamp: string;
  delivered: [number, number];
  returned: [number, number];
  power: [number, number];
};

function telegramBody(values: TelegramValues): string {
  const kwh = (v: number) => `${v.toFixed(3).padStart(10, "0")}*kWh`;
  const kw = (v: number) => `${v.toFixed(3).padStart(6, "0")}*kW`;
  return (
    "ISK5\\2M550T-1012\r\n\r\n" +
    `0-0:1.0.0(${values.timestamp})\r\n` +
    `1-0:1.8.1(${kwh(values.delivered[0])})\r\n` +
    `1-0:1.8.2(${kwh(values.delivered[1])})\r\n` +
    `1-0:2.8.1(${kwh(values.returned[0])})\r\n` +
    `1-0:2.8.2(${kwh(values.returned[1])})\r\n` +
    `1-0:1.7.0(${kw(values.power[0])})\r\n` +
    `1-0:2.7.0(${kw(values.power[1])})\r\n`
  );
}

function telegramText(values: TelegramValues): string {
  const body = telegramBody(values);
  return `/${body}!${telegramChecksum(encode(body))}\r\n`;
}

const FIRST: TelegramValues = {
  timestamp: "241019100000S",
  delivered: [100, 200],
  returned: [10, 20],
  power: [1.5, 0],
};

const SECOND: TelegramValues = {
  timestamp: "241019100010S",
  delivered: [100.5, 200],
  returned: [10, 20.25],
  power: [0, 2.25],
};

function setup() {
  const relay = createTelegramRelay();
  const aggregator = createUsageAggregator();
  const cycles: DispatchCycle[] = [];
  const dispatcher = createDispatcher({
    relay,
    aggregator,
    calibration: DEFAULT_GAUGE_CALIBRATION,
    verifyChecksum: true,
    onCycle: (cycle) => cycles.push(cycle),
    now: () => 1700000000000,
  });
  return { relay, aggregator, dispatcher, cycles };
}

function recordingConsumer(): RelayConsumer & { writes: Uint8Array[] } {
  const writes: Uint8Array[] = [];
  return {
    id: "test-consumer",
    writes,
    write: (chunk) => {
      writes.push(chunk);
    },
    close: vi.fn(),
  };
}

describe("Dispatcher", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("starts with an empty snapshot", () => {
    const { dispatcher } = setup();
    expect(dispatcher.getSnapshot()).toEqual(INITIAL_DISPATCH_SNAPSHOT);
  });

  test("first telegram sets gauge and a zero day total", () => {
    const { dispatcher, cycles } = setup();

    const cycle = dispatcher
      .handleTelegram(encode(telegramText(FIRST)))
      ._unsafeUnwrap();

    expect(cycle.netPower).toBe(1.5);
    expect(cycle.gauge).toEqual({
      angle: -33.75,
      sign: "import",
      text: "1.5 kW",
    });
    expect(cycle.dayTotal).toBe(0);
    expect(cycle.dayTotalText).toBe(" 0.0 kWh");
    expect(cycle.relay).toEqual({ delivered: false, reason: "no_consumer" });
    expect(cycles).toEqual([cycle]);
  });

  test("second telegram accumulates the net delta", () => {
    const { dispatcher } = setup();
    dispatcher.handleTelegram(encode(telegramText(FIRST)));

    const cycle = dispatcher
      .handleTelegram(encode(telegramText(SECOND)))
      ._unsafeUnwrap();

    expect(cycle.dayTotal).toBe(0.25);
    expect(cycle.gauge.sign).toBe("export");
    expect(cycle.gauge.text).toBe("2.3 kW");
    expect(dispatcher.getSnapshot()).toEqual({
      netPower: -2.25,
      dayTotal: 0.25,
      dayKey: "241019",
      gauge: cycle.gauge,
      lastTimestamp: "241019100010S",
      lastCycleAt: 1700000000000,
      counters: {
        telegrams: 2,
        dropped: 0,
        aggregationErrors: 0,
        relayed: 0,
      },
    });
  });

  test("relays the telegram body re-framed to the attached consumer", () => {
    const { dispatcher, relay } = setup();
    const consumer = recordingConsumer();
    relay.attach(consumer);

    const text = telegramText(FIRST);
    dispatcher.handleTelegram(encode(text));

    expect(consumer.writes).toHaveLength(1);
    const [frame] = consumer.writes;
    expect(frame && decode(frame)).toBe(`${text}\0`);
    expect(dispatcher.getSnapshot().counters.relayed).toBe(1);
  });

  test("drops a telegram with a bad checksum", () => {
    const { dispatcher, cycles, relay } = setup();
    const consumer = recordingConsumer();
    relay.attach(consumer);

    const corrupted = telegramText(FIRST).replace(/![0-9A-F]{4}/, "!0000");
    const result = dispatcher.handleTelegram(encode(corrupted));

    expect(result._unsafeUnwrapErr().type).toBe("CHECKSUM_MISMATCH");
    expect(consumer.writes).toHaveLength(0);
    expect(cycles).toHaveLength(0);
    expect(dispatcher.getSnapshot()).toEqual({
      ...INITIAL_DISPATCH_SNAPSHOT,
      counters: { ...INITIAL_DISPATCH_SNAPSHOT.counters, telegrams: 1, dropped: 1 },
    });
  });

  test("keeps the previous day total when the timestamp is unusable", () => {
    const { dispatcher } = setup();
    dispatcher.handleTelegram(encode(telegramText(FIRST)));
    dispatcher.handleTelegram(encode(telegramText(SECOND)));

    const cycle = dispatcher
      .handleTelegram(
        encode(telegramText({ ...SECOND, timestamp: "2410", power: [3, 0] })),
      )
      ._unsafeUnwrap();

    expect(cycle.dayTotal).toBeNull();
    expect(cycle.dayTotalText).toBeNull();
    expect(cycle.gauge.text).toBe("3.0 kW");

    const snapshot = dispatcher.getSnapshot();
    expect(snapshot.dayTotal).toBe(0.25);
    expect(snapshot.netPower).toBe(3);
    expect(snapshot.counters.aggregationErrors).toBe(1);
    expect(logOperationFailed).toHaveBeenCalledTimes(1);
  });

  test("resets the day total on a new day", () => {
    const { dispatcher } = setup();
    dispatcher.handleTelegram(encode(telegramText(FIRST)));
    dispatcher.handleTelegram(encode(telegramText(SECOND)));

    const cycle = dispatcher
      .handleTelegram(
        encode(telegramText({ ...SECOND, timestamp: "241020000000S" })),
      )
      ._unsafeUnwrap();

    expect(cycle.dayTotal).toBe(0);
    expect(cycle.dayKey).toBe("241020");
  });
});
