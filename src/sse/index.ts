/**
 * SSE Module - Public API
 */

export type {
  DayTotalEvent,
  GaugeEvent,
  MqttEvent,
  RelayEvent,
  SseEvent,
  SystemStateEvent,
} from "./schema.js";

export {
  broadcastDayTotal,
  broadcastGauge,
  broadcastMqttStatus,
  broadcastRelayStatus,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  removeClient,
} from "./service.js";
