/**
 * Day Usage Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type DayUsageError = {
  readonly type: "INVALID_TIMESTAMP";
  readonly message: string;
  readonly timestamp: string;
};

/**
 * Create an INVALID_TIMESTAMP error.
 */
export function invalidTimestamp(timestamp: string): DayUsageError {
  return {
    type: "INVALID_TIMESTAMP",
    message: `Timestamp "${timestamp}" is shorter than a YYMMDD date prefix`,
    timestamp,
  };
}

/**
 * Format a DayUsageError for logging.
 */
export function formatDayUsageError(error: DayUsageError): string {
  switch (error.type) {
    case "INVALID_TIMESTAMP":
      return `Invalid timestamp: ${error.message}`;
  }
}
