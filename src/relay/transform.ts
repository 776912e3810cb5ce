/**
 * Relay Module - Pure Transformations
 *
 * CRC-16 checksum and telegram framing. No I/O.
 */

const FRAME_START = 0x2f; // "/"
const FRAME_END = 0x21; // "!"
const FRAME_TRAILER = Uint8Array.of(0x0d, 0x0a, 0x00); // CR LF NUL

// =============================================================================
// Checksum
// =============================================================================

/**
 * CRC-16/ARC (reflected polynomial 0xA001, initial value 0).
 *
 * @example
 * crc16(new TextEncoder().encode("123456789")); // 0xBB3D
 */
export function crc16(data: Uint8Array, initial = 0): number {
  let crc = initial;

  for (const byte of data) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
    }
  }

  return crc & 0xffff;
}

/**
 * Format a checksum as 4 uppercase hex digits.
 */
export function formatChecksum(crc: number): string {
  return (crc & 0xffff).toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Checksum of a telegram body as it appears on the wire: "/" + raw + "!".
 */
export function telegramChecksum(raw: Uint8Array): string {
  let crc = crc16(Uint8Array.of(FRAME_START));
  crc = crc16(raw, crc);
  crc = crc16(Uint8Array.of(FRAME_END), crc);
  return formatChecksum(crc);
}

// =============================================================================
// Framing
// =============================================================================

/**
 * Build the wire frame for a raw telegram:
 * "/" + raw + "!" + HHHH + "\r\n" + 0x00
 */
export function frameTelegram(raw: Uint8Array): Uint8Array {
  const checksum = new TextEncoder().encode(telegramChecksum(raw));
  const frame = new Uint8Array(
    1 + raw.length + 1 + checksum.length + FRAME_TRAILER.length,
  );

  let offset = 0;
  frame[offset++] = FRAME_START;
  frame.set(raw, offset);
  offset += raw.length;
  frame[offset++] = FRAME_END;
  frame.set(checksum, offset);
  offset += checksum.length;
  frame.set(FRAME_TRAILER, offset);

  return frame;
}
