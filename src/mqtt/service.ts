/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and message handling.
 * Connects to broker, subscribes to the telegram topic, and hands every
 * decoded telegram to the registered handler.
 */
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";

import { config } from "../config.js";
import { createLogger } from "../logger.js";
import type { MqttStats } from "./schema.js";
import { INITIAL_MQTT_STATS } from "./schema.js";
import { decodeTelegramPayload } from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;
let stats: MqttStats = INITIAL_MQTT_STATS;

/**
 * Callbacks for telegrams and broker connectivity.
 */
export type MqttEventHandlers = {
  onTelegram?: (telegram: Uint8Array) => void;
  onConnect?: () => void;
  onDisconnect?: () => void;
};

let eventHandlers: MqttEventHandlers = {};

/**
 * Get message counters (read-only).
 */
export function getMqttStats(): MqttStats {
  return stats;
}

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * @returns true if connection initiated successfully
 */
export function initializeMqttClient(
  handlers: MqttEventHandlers = {},
): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  eventHandlers = handlers;

  log.info({ broker: config.MQTT_BROKER_URL }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(config.MQTT_BROKER_URL, {
      reconnectPeriod: 5000, // Reconnect every 5 seconds
      connectTimeout: 10000, // 10 second connection timeout
    });

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    log.error({ error }, "Failed to initialize MQTT client");
    return false;
  }
}

/**
 * Set up MQTT client event handlers.
 */
function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");

    subscribeToTelegrams(client);

    eventHandlers.onConnect?.();
  });

  client.on("message", (topic, message) => {
    handleMessage(topic, message);
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
    eventHandlers.onDisconnect?.();
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

function subscribeToTelegrams(client: MqttClient): void {
  const topic = config.MQTT_TOPIC_TELEGRAM;

  client.subscribe(topic, (err) => {
    if (err) {
      log.error({ topic, error: err.message }, "Failed to subscribe to topic");
    } else {
      log.debug({ topic }, "Subscribed to topic");
    }
  });
}

/**
 * Handle incoming MQTT message.
 */
function handleMessage(topic: string, payload: Buffer): void {
  stats = {
    ...stats,
    received: stats.received + 1,
    lastMessageAt: Date.now(),
  };

  const telegram = decodeTelegramPayload(payload);
  if (!telegram) {
    stats = { ...stats, undecodable: stats.undecodable + 1 };
    log.debug(
      { topic, bytes: payload.length },
      "Ignoring payload without telegram",
    );
    return;
  }

  eventHandlers.onTelegram?.(telegram);
}

// =============================================================================
// Client Control
// =============================================================================

/**
 * Check if MQTT client is connected.
 */
export function isConnected(): boolean {
  return mqttClient?.connected ?? false;
}

/**
 * Disconnect and clean up MQTT client.
 */
export function disconnectMqttClient(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end(true);
    mqttClient = null;
    stats = INITIAL_MQTT_STATS;
  }
}
