/**
 * Telegram Module - Public API
 */

// Types
export type {
  MeterField,
  MeterReading,
  ParseOptions,
  ParsedTelegram,
  TelegramFrame,
} from "./schema.js";
export type { TelegramError } from "./errors.js";

export { MeterReadingSchema, OBIS_FIELDS } from "./schema.js";

// Error utilities
export { formatTelegramError } from "./errors.js";

// Pure transformations
export {
  netPower,
  parseObisNumber,
  parseTelegram,
  readMeterReading,
  readObisValue,
  splitTelegram,
  verifyChecksum,
} from "./transform.js";
