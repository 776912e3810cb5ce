/**
 * Telegram Module - Error Types
 *
 * Typed error unions for telegram parsing.
 * Errors are values, not exceptions.
 */

export type TelegramError =
  | {
      readonly type: "MALFORMED_FRAME";
      readonly message: string;
    }
  | {
      readonly type: "CHECKSUM_MISMATCH";
      readonly message: string;
      readonly expected: string;
      readonly actual: string;
    }
  | {
      readonly type: "MISSING_FIELD";
      readonly message: string;
      readonly obis: string;
    }
  | {
      readonly type: "INVALID_VALUE";
      readonly message: string;
      readonly obis: string;
      readonly value: string;
    };

export function malformedFrame(message: string): TelegramError {
  return { type: "MALFORMED_FRAME", message };
}

export function checksumMismatch(
  expected: string,
  actual: string,
): TelegramError {
  return {
    type: "CHECKSUM_MISMATCH",
    message: `Telegram carries ${actual}, computed ${expected}`,
    expected,
    actual,
  };
}

export function missingField(obis: string): TelegramError {
  return { type: "MISSING_FIELD", message: `No ${obis} object`, obis };
}

export function invalidValue(obis: string, value: string): TelegramError {
  return {
    type: "INVALID_VALUE",
    message: `${obis} has unreadable value "${value}"`,
    obis,
    value,
  };
}

/**
 * Format a TelegramError for logging.
 */
export function formatTelegramError(error: TelegramError): string {
  switch (error.type) {
    case "MALFORMED_FRAME":
      return `Malformed telegram: ${error.message}`;
    case "CHECKSUM_MISMATCH":
      return `Checksum mismatch: ${error.message}`;
    case "MISSING_FIELD":
      return `Missing field: ${error.message}`;
    case "INVALID_VALUE":
      return `Invalid value: ${error.message}`;
  }
}
