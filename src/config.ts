/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * P1 Relay configuration covering:
 * - Server settings
 * - Telegram source (MQTT)
 * - Downstream relay listener
 * - Gauge calibration
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8083).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("P1Relay").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Telegram Source (MQTT)
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .describe("MQTT broker connection URL"),
  MQTT_TOPIC_TELEGRAM: z
    .string()
    .default("p1monitor/telegram")
    .describe("MQTT topic carrying complete raw P1 telegrams"),
  VERIFY_TELEGRAM_CRC: envBoolean(true).describe(
    "Drop incoming telegrams whose CRC does not match",
  ),

  // ==========================================================================
  // Relay Listener
  // ==========================================================================
  RELAY_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(2323)
    .describe("TCP port the downstream consumer connects to"),
  RELAY_CLIENT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(15000)
    .describe("Inactivity timeout for an accepted consumer (ms)"),

  // ==========================================================================
  // Gauge Calibration
  // ==========================================================================
  GAUGE_RETURN_MAX: z.coerce
    .number()
    .positive()
    .default(6)
    .describe("Export power (kW) at full left deflection"),
  GAUGE_CONSUMPTION_MAX: z.coerce
    .number()
    .positive()
    .default(18)
    .describe("Import power (kW) at full right deflection"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Gauge calibration bounds for the power dial.
 */
export function getGaugeCalibration(): Readonly<{
  returnMax: number;
  consumptionMax: number;
}> {
  return {
    returnMax: config.GAUGE_RETURN_MAX,
    consumptionMax: config.GAUGE_CONSUMPTION_MAX,
  };
}

/**
 * Relay listener configuration object for service layer.
 */
export function getRelayConfig(): Readonly<{
  port: number;
  clientTimeoutMs: number;
}> {
  return {
    port: config.RELAY_PORT,
    clientTimeoutMs: config.RELAY_CLIENT_TIMEOUT_MS,
  };
}
