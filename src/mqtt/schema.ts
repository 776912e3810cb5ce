/**
 * MQTT Module - Schemas and Types
 *
 * Defines the data shapes for telegram messages arriving over MQTT.
 */
import { z } from "zod";

/**
 * JSON envelope used by some P1 dongles instead of the bare telegram.
 * Topic: p1monitor/telegram
 */
export const TelegramEnvelopeSchema = z.object({
  telegram: z.string().min(1).describe("Complete telegram text"),
  timestamp: z.number().optional().describe("Dongle receive time (ms)"),
});

/**
 * Message counters since connect.
 */
export type MqttStats = Readonly<{
  received: number;
  undecodable: number;
  lastMessageAt: number | null;
}>;

export const INITIAL_MQTT_STATS: MqttStats = {
  received: 0,
  undecodable: 0,
  lastMessageAt: null,
};
