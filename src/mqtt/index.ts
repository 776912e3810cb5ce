/**
 * MQTT Module - Public API
 *
 * Exports types, service functions, and transformations for the MQTT module.
 */

// Types
export type { MqttStats } from "./schema.js";
export type { MqttEventHandlers } from "./service.js";

// Service functions
export {
  disconnectMqttClient,
  getMqttStats,
  initializeMqttClient,
  isConnected,
} from "./service.js";

// Pure transformations
export { decodeTelegramPayload } from "./transform.js";
