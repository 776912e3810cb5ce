/**
 * Relay Module - Types
 *
 * Shapes for the downstream consumer slot.
 */

// =============================================================================
// Consumer
// =============================================================================

/**
 * A downstream connection that receives framed telegrams.
 * write() may throw when the underlying connection is gone.
 */
export type RelayConsumer = Readonly<{
  id: string;
  write: (chunk: Uint8Array) => void;
  close: () => void;
}>;

/**
 * Single-slot registry: at most one occupant at any time.
 */
export type ConsumerSlot<T extends Pick<RelayConsumer, "close">> = Readonly<{
  /** Close the previous occupant (if any), then install the new one. */
  replace: (next: T) => void;
  /** Current occupant or null. */
  current: () => T | null;
  /** Remove the occupant without closing it. Returns false if it was not the occupant. */
  release: (occupant: T) => boolean;
  /** Close and remove the occupant. */
  clear: () => void;
}>;

/**
 * Outcome of a relay call, mostly for logging and tests.
 */
export type RelayOutcome =
  | { readonly delivered: false; readonly reason: "no_consumer" | "write_failed" }
  | { readonly delivered: true; readonly consumerId: string; readonly bytes: number };
