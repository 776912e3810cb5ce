/**
 * Dispatch Module - Service Layer
 *
 * Runs one cycle per received telegram: parse, relay, aggregate, map.
 * The relay, aggregator and listener are injected; nothing here is global.
 */
import { type Result, err, ok } from "neverthrow";

import type { UsageAggregator } from "../day-usage/index.js";
import { formatDayUsageError } from "../day-usage/index.js";
import type { GaugeCalibration } from "../gauge/index.js";
import { formatDayTotal, mapGauge } from "../gauge/index.js";
import { createLogger, logOperationFailed } from "../logger.js";
import type { TelegramRelay } from "../relay/index.js";
import type { TelegramError } from "../telegram/index.js";
import {
  formatTelegramError,
  netPower as readNetPower,
  parseTelegram,
} from "../telegram/index.js";
import type { DispatchCycle, DispatchSnapshot } from "./schema.js";
import { INITIAL_DISPATCH_SNAPSHOT } from "./schema.js";

const log = createLogger("dispatch");

export type DispatcherDeps = Readonly<{
  relay: Pick<TelegramRelay, "relay">;
  aggregator: UsageAggregator;
  calibration: GaugeCalibration;
  verifyChecksum: boolean;
  onCycle?: (cycle: DispatchCycle) => void;
  now?: () => number;
}>;

export type Dispatcher = Readonly<{
  handleTelegram: (payload: Uint8Array) => Result<DispatchCycle, TelegramError>;
  getSnapshot: () => DispatchSnapshot;
}>;

/**
 * Create the per-telegram dispatcher.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const now = deps.now ?? Date.now;
  let snapshot: DispatchSnapshot = INITIAL_DISPATCH_SNAPSHOT;

  const runCycle = (
    raw: Uint8Array,
    reading: DispatchCycle["reading"],
  ): DispatchCycle => {
    const relay = deps.relay.relay(raw);

    const totalResult = deps.aggregator.update({
      timestamp: reading.timestamp,
      delivered1: reading.deliveredTariff1,
      delivered2: reading.deliveredTariff2,
      returned1: reading.returnedTariff1,
      returned2: reading.returnedTariff2,
    });

    if (totalResult.isErr()) {
      logOperationFailed(
        log,
        "aggregateDayUsage",
        formatDayUsageError(totalResult.error),
        { timestamp: reading.timestamp },
      );
    }

    const netPower = readNetPower(reading);
    const dayTotal = totalResult.isOk() ? totalResult.value : null;

    return {
      reading,
      relay,
      netPower,
      gauge: mapGauge(netPower, deps.calibration),
      dayTotal,
      dayTotalText: dayTotal === null ? null : formatDayTotal(dayTotal),
      dayKey: deps.aggregator.getState().dayKey,
    };
  };

  return {
    handleTelegram(payload) {
      const counters = snapshot.counters;
      const parsed = parseTelegram(payload, {
        verifyChecksum: deps.verifyChecksum,
      });

      if (parsed.isErr()) {
        snapshot = {
          ...snapshot,
          counters: {
            ...counters,
            telegrams: counters.telegrams + 1,
            dropped: counters.dropped + 1,
          },
        };
        log.warn(
          { error: parsed.error.type },
          formatTelegramError(parsed.error),
        );
        return err(parsed.error);
      }

      const cycle = runCycle(parsed.value.raw, parsed.value.reading);

      snapshot = {
        netPower: cycle.netPower,
        // A rejected reading keeps the previous total
        dayTotal: cycle.dayTotal ?? snapshot.dayTotal,
        dayKey: cycle.dayTotal === null ? snapshot.dayKey : cycle.dayKey,
        gauge: cycle.gauge,
        lastTimestamp: cycle.reading.timestamp,
        lastCycleAt: now(),
        counters: {
          ...counters,
          telegrams: counters.telegrams + 1,
          aggregationErrors:
            counters.aggregationErrors + (cycle.dayTotal === null ? 1 : 0),
          relayed: counters.relayed + (cycle.relay.delivered ? 1 : 0),
        },
      };

      log.debug(
        {
          timestamp: cycle.reading.timestamp,
          netPower: cycle.netPower,
          dayTotal: cycle.dayTotal,
          relayed: cycle.relay.delivered,
        },
        "Telegram dispatched",
      );

      deps.onCycle?.(cycle);
      return ok(cycle);
    },

    getSnapshot() {
      return snapshot;
    },
  };
}
