/**
 * Telegram Module - Pure Transformations
 *
 * Splits a P1 telegram into its body and checksum and reads the OBIS objects
 * the relay needs. No side effects.
 */
import { Result, err, ok } from "neverthrow";

import { telegramChecksum } from "../relay/transform.js";
import type { TelegramError } from "./errors.js";
import {
  checksumMismatch,
  invalidValue,
  malformedFrame,
  missingField,
} from "./errors.js";
import type {
  MeterField,
  MeterReading,
  ParseOptions,
  ParsedTelegram,
  TelegramFrame,
} from "./schema.js";
import { MeterReadingSchema, OBIS_FIELDS } from "./schema.js";

const START_MARKER = 0x2f; // "/"
const END_MARKER = 0x21; // "!"
const CHECKSUM_PATTERN = /^[0-9A-Fa-f]{4}$/;
const TRAILER_END = /[\r\n\0]/;
const NUMBER_PATTERN = /^\d+(\.\d+)?$/;

// =============================================================================
// Framing
// =============================================================================

/**
 * Locate the "/" ... "!" body of a telegram and the checksum after it.
 * Anything before "/" is line noise and is skipped. An empty line after "!"
 * means the meter sends no checksum; anything else must be 4 hex digits.
 */
export function splitTelegram(
  payload: Uint8Array,
): Result<TelegramFrame, TelegramError> {
  const start = payload.indexOf(START_MARKER);
  if (start < 0) {
    return err(malformedFrame('No "/" start marker'));
  }

  const end = payload.indexOf(END_MARKER, start + 1);
  if (end < 0) {
    return err(malformedFrame('No "!" end marker'));
  }

  const [trailer = ""] = new TextDecoder()
    .decode(payload.subarray(end + 1))
    .split(TRAILER_END, 1);

  if (trailer !== "" && !CHECKSUM_PATTERN.test(trailer)) {
    return err(malformedFrame(`Unreadable checksum "${trailer}"`));
  }

  return ok({
    raw: payload.slice(start + 1, end),
    checksum: trailer === "" ? null : trailer.toUpperCase(),
  });
}

/**
 * Check the received checksum. Telegrams without one always pass.
 */
export function verifyChecksum(
  frame: TelegramFrame,
): Result<TelegramFrame, TelegramError> {
  if (frame.checksum === null) {
    return ok(frame);
  }

  const computed = telegramChecksum(frame.raw);
  if (computed !== frame.checksum) {
    return err(checksumMismatch(computed, frame.checksum));
  }

  return ok(frame);
}

// =============================================================================
// OBIS Objects
// =============================================================================

/**
 * Read the first value of an OBIS object, e.g. "001234.567*kWh" for
 * "1-0:1.8.1(001234.567*kWh)". Returns null when the object is absent.
 */
export function readObisValue(body: string, obis: string): string | null {
  const prefix = `${obis}(`;

  for (const line of body.split(/\r?\n/)) {
    if (!line.startsWith(prefix)) continue;

    const close = line.indexOf(")", prefix.length);
    if (close < 0) return null;

    return line.slice(prefix.length, close);
  }

  return null;
}

/**
 * Parse a numeric OBIS value, dropping its "*unit" suffix.
 */
export function parseObisNumber(value: string): number | null {
  const [number = ""] = value.split("*");
  return NUMBER_PATTERN.test(number) ? Number.parseFloat(number) : null;
}

function readNumber(
  body: string,
  field: MeterField,
): Result<number, TelegramError> {
  const obis = OBIS_FIELDS[field];
  const value = readObisValue(body, obis);
  if (value === null) return err(missingField(obis));

  const parsed = parseObisNumber(value);
  if (parsed === null) return err(invalidValue(obis, value));

  return ok(parsed);
}

/**
 * Extract a MeterReading from a telegram body.
 */
export function readMeterReading(
  body: string,
): Result<MeterReading, TelegramError> {
  const timestamp = readObisValue(body, OBIS_FIELDS.timestamp);
  if (timestamp === null) {
    return err(missingField(OBIS_FIELDS.timestamp));
  }

  return Result.combine([
    readNumber(body, "deliveredTariff1"),
    readNumber(body, "deliveredTariff2"),
    readNumber(body, "returnedTariff1"),
    readNumber(body, "returnedTariff2"),
    readNumber(body, "powerDelivered"),
    readNumber(body, "powerReturned"),
  ]).andThen(
    ([
      deliveredTariff1,
      deliveredTariff2,
      returnedTariff1,
      returnedTariff2,
      powerDelivered,
      powerReturned,
    ]) => {
      const parsed = MeterReadingSchema.safeParse({
        timestamp,
        deliveredTariff1,
        deliveredTariff2,
        returnedTariff1,
        returnedTariff2,
        powerDelivered,
        powerReturned,
      });

      if (!parsed.success) {
        return err(malformedFrame(parsed.error.message));
      }
      return ok(parsed.data);
    },
  );
}

// =============================================================================
// Telegram Parsing
// =============================================================================

/**
 * Parse a complete telegram into its raw body and reading.
 */
export function parseTelegram(
  payload: Uint8Array,
  options: ParseOptions = { verifyChecksum: true },
): Result<ParsedTelegram, TelegramError> {
  return splitTelegram(payload)
    .andThen((frame) =>
      options.verifyChecksum ? verifyChecksum(frame) : ok(frame),
    )
    .andThen((frame) =>
      readMeterReading(new TextDecoder().decode(frame.raw)).map((reading) => ({
        raw: frame.raw,
        reading,
      })),
    );
}

/**
 * Net power in kW: import positive, export negative.
 */
export function netPower(reading: MeterReading): number {
  return reading.powerDelivered - reading.powerReturned;
}
