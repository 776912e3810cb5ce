/**
 * MQTT Module - Pure Transformations
 *
 * Pure functions for decoding MQTT payloads.
 * No side effects, no I/O - just data in, data out.
 */
import { TelegramEnvelopeSchema } from "./schema.js";

/**
 * Decode a telegram payload. Accepts the bare telegram bytes or a JSON
 * envelope carrying the telegram text.
 *
 * @returns Telegram bytes or null if the payload carries no telegram
 */
export function decodeTelegramPayload(payload: Uint8Array): Uint8Array | null {
  const firstByte = firstNonWhitespace(payload);

  if (firstByte === 0x7b) {
    // "{"
    const data = parseJsonPayload(payload);
    if (!data) return null;

    const parsed = TelegramEnvelopeSchema.safeParse(data);
    if (!parsed.success) return null;

    return new TextEncoder().encode(parsed.data.telegram);
  }

  return payload.includes(0x2f) ? payload : null;
}

function firstNonWhitespace(payload: Uint8Array): number | null {
  for (const byte of payload) {
    if (byte !== 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0d) {
      return byte;
    }
  }
  return null;
}

/**
 * Parse JSON from a payload.
 *
 * @returns Parsed JSON object or null if invalid
 */
function parseJsonPayload(payload: Uint8Array): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(new TextDecoder().decode(payload));

    if (
      typeof parsed !== "object" ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      return null;
    }

    return { ...parsed };
  } catch {
    return null;
  }
}
