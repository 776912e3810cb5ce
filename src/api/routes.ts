/**
 * API routes for the P1 relay.
 *
 * - /api/health - Health check
 * - /api/power - Current net power (kW), plain text
 * - /api/today - Day total (kWh), plain text
 * - /api/state - Full snapshot as JSON
 * - /api/events - SSE stream for the display
 */
import { Hono } from "hono";
import type { Dispatcher } from "../dispatch/index.js";
import { createLogger } from "../logger.js";
import type { MqttStats } from "../mqtt/index.js";
import type { TelegramRelay } from "../relay/index.js";
import { createSseStream, getClientCount, removeClient } from "../sse/index.js";

const log = createLogger("api");

const VERSION = "1.0.0";

export type RouteDeps = Readonly<{
  dispatcher: Pick<Dispatcher, "getSnapshot">;
  relay: Pick<TelegramRelay, "hasConsumer">;
  mqtt: Readonly<{
    isConnected: () => boolean;
    getStats: () => MqttStats;
  }>;
}>;

/**
 * Build the route table around the running dispatcher.
 */
export function createRoutes(deps: RouteDeps): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const snapshot = deps.dispatcher.getSnapshot();

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: VERSION,
      mqtt: {
        connected: deps.mqtt.isConnected(),
        ...deps.mqtt.getStats(),
      },
      relayConsumer: deps.relay.hasConsumer(),
      sseClients: getClientCount(),
      lastTelegram: snapshot.lastTimestamp,
      counters: snapshot.counters,
    });
  });

  routes.get("/api/version", (c) => {
    return c.json({ version: VERSION });
  });

  // ===========================================================================
  // Query Surfaces
  // ===========================================================================

  /**
   * Current net power in kW (import positive).
   */
  routes.get("/api/power", (c) => {
    const { netPower } = deps.dispatcher.getSnapshot();
    if (netPower === null) {
      return c.text("No reading yet", 503);
    }
    return c.text(String(netPower));
  });

  /**
   * Net energy since midnight (meter time) in kWh.
   */
  routes.get("/api/today", (c) => {
    const { dayTotal } = deps.dispatcher.getSnapshot();
    if (dayTotal === null) {
      return c.text("No reading yet", 503);
    }
    return c.text(String(dayTotal));
  });

  routes.get("/api/state", (c) => {
    return c.json(deps.dispatcher.getSnapshot());
  });

  // ===========================================================================
  // Server-Sent Events Stream
  // ===========================================================================

  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    const snapshot = deps.dispatcher.getSnapshot();

    const { stream, clientId } = createSseStream({
      type: "system_state",
      netPower: snapshot.netPower,
      dayTotal: snapshot.dayTotal,
      gauge: snapshot.gauge,
      lastTimestamp: snapshot.lastTimestamp,
    });

    log.info({ requestId, clientId }, "SSE client connected");

    c.req.raw.signal.addEventListener("abort", () => {
      removeClient(clientId);
    });

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}
