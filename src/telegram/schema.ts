/**
 * Telegram Module - Schemas and Types
 *
 * Defines the parsed shape of a DSMR P1 telegram.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Meter Reading
// =============================================================================

/**
 * Values read from one telegram. Energy in kWh, power in kW.
 */
export const MeterReadingSchema = z.object({
  timestamp: z.string().describe("0-0:1.0.0 - YYMMDDhhmmss + S/W"),
  deliveredTariff1: z.number().nonnegative().describe("1-0:1.8.1"),
  deliveredTariff2: z.number().nonnegative().describe("1-0:1.8.2"),
  returnedTariff1: z.number().nonnegative().describe("1-0:2.8.1"),
  returnedTariff2: z.number().nonnegative().describe("1-0:2.8.2"),
  powerDelivered: z.number().nonnegative().describe("1-0:1.7.0"),
  powerReturned: z.number().nonnegative().describe("1-0:2.7.0"),
});

export type MeterReading = Readonly<z.infer<typeof MeterReadingSchema>>;

export type MeterField = keyof MeterReading;

/**
 * OBIS reference for every reading field.
 */
export const OBIS_FIELDS: Readonly<Record<MeterField, string>> = {
  timestamp: "0-0:1.0.0",
  deliveredTariff1: "1-0:1.8.1",
  deliveredTariff2: "1-0:1.8.2",
  returnedTariff1: "1-0:2.8.1",
  returnedTariff2: "1-0:2.8.2",
  powerDelivered: "1-0:1.7.0",
  powerReturned: "1-0:2.7.0",
};

// =============================================================================
// Parsed Telegram
// =============================================================================

/**
 * Telegram body between the "/" and "!" markers, plus the checksum that
 * followed "!" (absent before DSMR 4).
 */
export type TelegramFrame = Readonly<{
  raw: Uint8Array;
  checksum: string | null;
}>;

export type ParsedTelegram = Readonly<{
  raw: Uint8Array;
  reading: MeterReading;
}>;

export type ParseOptions = Readonly<{
  verifyChecksum: boolean;
}>;
