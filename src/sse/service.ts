/**
 * SSE Module - Service Layer
 *
 * Pushes gauge, day total and link status to the attached displays.
 * Each display is a ReadableStream controller keyed by client id; a display
 * starts from the system_state snapshot the route hands in.
 */
import type { GaugeState } from "../gauge/index.js";
import { createLogger } from "../logger.js";
import type { SseEvent, SystemStateEvent } from "./schema.js";

const log = createLogger("sse");

const clients = new Map<number, ReadableStreamDefaultController<Uint8Array>>();
let nextClientId = 1;

const encoder = new TextEncoder();

function encodeEvent(event: SseEvent): Uint8Array {
  return encoder.encode(
    `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`,
  );
}

export function getClientCount(): number {
  return clients.size;
}

/**
 * Open a stream for one display, seeded with the current state.
 */
export function createSseStream(initial: SystemStateEvent): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      clients.set(clientId, controller);
      controller.enqueue(encodeEvent(initial));
      log.info({ clientId, displays: clients.size }, "Display attached");
    },
    cancel() {
      removeClient(clientId);
    },
  });

  return { stream, clientId };
}

export function removeClient(clientId: number): void {
  if (clients.delete(clientId)) {
    log.info({ clientId, displays: clients.size }, "Display detached");
  }
}

/**
 * Enqueue on every display; a display whose stream is gone is dropped.
 */
function publish(event: SseEvent): void {
  if (clients.size === 0) return;

  const data = encodeEvent(event);
  for (const [clientId, controller] of clients) {
    try {
      controller.enqueue(data);
    } catch (error) {
      clients.delete(clientId);
      log.debug(
        { clientId, eventType: event.type, error },
        "Dropped closed display stream",
      );
    }
  }
}

export function broadcastGauge(
  netPower: number,
  gauge: GaugeState,
  dayTotalText: string | null,
): void {
  publish({ type: "gauge", netPower, gauge, dayTotalText });
}

export function broadcastDayTotal(dayTotal: number, dayKey: string): void {
  publish({ type: "day_total", dayTotal, dayKey });
}

export function broadcastRelayStatus(connected: boolean): void {
  publish({ type: "relay", connected });
}

export function broadcastMqttStatus(connected: boolean): void {
  publish({ type: "mqtt", connected });
}

/**
 * Close every display stream (shutdown).
 */
export function disconnectAllClients(): void {
  for (const [clientId, controller] of clients) {
    try {
      controller.close();
    } catch (error) {
      log.trace({ clientId, error }, "Display stream already closed");
    }
  }
  clients.clear();
}
