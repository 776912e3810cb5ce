/**
 * Relay Module - Public API
 */

// Types
export type { ConsumerSlot, RelayConsumer, RelayOutcome } from "./schema.js";
export type { TelegramRelay, TelegramRelayOptions } from "./service.js";

// Service functions (side effects)
export {
  createConsumerSlot,
  createTelegramRelay,
  socketConsumer,
  startRelayServer,
} from "./service.js";

// Pure transformations
export {
  crc16,
  formatChecksum,
  frameTelegram,
  telegramChecksum,
} from "./transform.js";
