/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { GaugeState } from "../gauge/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Gauge update for the power dial.
 */
export type GaugeEvent = Readonly<{
  type: "gauge";
  netPower: number;
  gauge: GaugeState;
  dayTotalText: string | null;
}>;

/**
 * Day total update (kWh).
 */
export type DayTotalEvent = Readonly<{
  type: "day_total";
  dayTotal: number;
  dayKey: string;
}>;

/**
 * Relay consumer attached or gone.
 */
export type RelayEvent = Readonly<{
  type: "relay";
  connected: boolean;
}>;

/**
 * Telegram source (MQTT broker) connection up or down.
 */
export type MqttEvent = Readonly<{
  type: "mqtt";
  connected: boolean;
}>;

/**
 * System state snapshot (initial state on connect).
 */
export type SystemStateEvent = Readonly<{
  type: "system_state";
  netPower: number | null;
  dayTotal: number | null;
  gauge: GaugeState | null;
  lastTimestamp: string | null;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | GaugeEvent
  | DayTotalEvent
  | RelayEvent
  | MqttEvent
  | SystemStateEvent;
