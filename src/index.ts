/**
 * P1 Relay - Application Entry Point
 *
 * Wires the telegram pipeline and serves it:
 * - MQTT telegram source
 * - Dispatcher (relay, day usage, gauge)
 * - TCP relay listener for the downstream consumer
 * - Hono HTTP server with query endpoints and SSE
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import { config, getGaugeCalibration, getRelayConfig } from "./config.js";
import { createUsageAggregator } from "./day-usage/index.js";
import { createDispatcher } from "./dispatch/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationStart,
} from "./logger.js";
import {
  disconnectMqttClient,
  getMqttStats,
  initializeMqttClient,
  isConnected,
} from "./mqtt/index.js";
import { createTelegramRelay, startRelayServer } from "./relay/index.js";
import {
  broadcastDayTotal,
  broadcastGauge,
  broadcastMqttStatus,
  broadcastRelayStatus,
  disconnectAllClients,
} from "./sse/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP
// =============================================================================

const startTime = Date.now();
logOperationStart(log, "startup");

const calibration = getGaugeCalibration();
const relayConfig = getRelayConfig();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    mqttBroker: config.MQTT_BROKER_URL,
    telegramTopic: config.MQTT_TOPIC_TELEGRAM,
    verifyCrc: config.VERIFY_TELEGRAM_CRC,
    relayPort: relayConfig.port,
    gauge: calibration,
  },
  "Configuration loaded",
);

// =============================================================================
// TELEGRAM PIPELINE
// =============================================================================

const relay = createTelegramRelay({ onConsumerChange: broadcastRelayStatus });
const aggregator = createUsageAggregator();

const dispatcher = createDispatcher({
  relay,
  aggregator,
  calibration,
  verifyChecksum: config.VERIFY_TELEGRAM_CRC,
  onCycle: (cycle) => {
    broadcastGauge(cycle.netPower, cycle.gauge, cycle.dayTotalText);
    if (cycle.dayTotal !== null) {
      broadcastDayTotal(cycle.dayTotal, cycle.dayKey);
    }
  },
});

const relayServer = startRelayServer(relay, relayConfig);

initializeMqttClient({
  onTelegram: (telegram) => {
    dispatcher.handleTelegram(telegram);
  },
  onConnect: () => broadcastMqttStatus(true),
  onDisconnect: () => broadcastMqttStatus(false),
});

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route(
  "/",
  createRoutes({
    dispatcher,
    relay,
    mqtt: { isConnected, getStats: getMqttStats },
  }),
);

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0", // Bind to all interfaces for remote access
  },
  (info) => {
    logOperationComplete(log, "startup", startTime, { port: info.port });
    log.info(
      { port: info.port, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  disconnectMqttClient();

  relay.close();
  relayServer.close();

  disconnectAllClients();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
