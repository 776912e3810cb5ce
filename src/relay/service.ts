/**
 * Relay Module - Service Layer
 *
 * Owns the single downstream consumer slot and writes framed telegrams to it.
 * The TCP listener attaches every accepted socket, dropping the previous one.
 */
import { type Server, type Socket, createServer } from "node:net";

import { createLogger } from "../logger.js";
import type { ConsumerSlot, RelayConsumer, RelayOutcome } from "./schema.js";
import { frameTelegram } from "./transform.js";

const log = createLogger("relay");

// =============================================================================
// Consumer Slot
// =============================================================================

/**
 * Create a single-slot registry. replace() always closes the previous
 * occupant before installing the next one.
 */
export function createConsumerSlot<
  T extends Pick<RelayConsumer, "close">,
>(): ConsumerSlot<T> {
  let occupant: T | null = null;

  const closeQuietly = (target: T): void => {
    try {
      target.close();
    } catch (error) {
      log.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "Closing previous consumer failed",
      );
    }
  };

  return {
    replace(next) {
      const previous = occupant;
      occupant = null;
      if (previous && previous !== next) {
        closeQuietly(previous);
      }
      occupant = next;
    },
    current() {
      return occupant;
    },
    release(target) {
      if (occupant !== target) return false;
      occupant = null;
      return true;
    },
    clear() {
      const previous = occupant;
      occupant = null;
      if (previous) {
        closeQuietly(previous);
      }
    },
  };
}

// =============================================================================
// Telegram Relay
// =============================================================================

export type TelegramRelay = Readonly<{
  /** Attach a new consumer, closing any existing one. */
  attach: (consumer: RelayConsumer) => void;
  /** Forget a consumer that went away on its own. */
  detach: (consumer: RelayConsumer) => void;
  /** Frame and forward a raw telegram. No-op without a consumer. */
  relay: (raw: Uint8Array) => RelayOutcome;
  hasConsumer: () => boolean;
  /** Close the active consumer (for shutdown). */
  close: () => void;
}>;

export type TelegramRelayOptions = Readonly<{
  slot?: ConsumerSlot<RelayConsumer>;
  /** Called after a consumer is attached or the slot becomes empty. */
  onConsumerChange?: (connected: boolean) => void;
}>;

/**
 * Create a telegram relay with its own consumer slot.
 */
export function createTelegramRelay(
  options: TelegramRelayOptions = {},
): TelegramRelay {
  const slot = options.slot ?? createConsumerSlot<RelayConsumer>();

  return {
    attach(consumer) {
      const previous = slot.current();
      slot.replace(consumer);
      log.info(
        { consumerId: consumer.id, replaced: previous?.id ?? null },
        "Relay consumer attached",
      );
      options.onConsumerChange?.(true);
    },

    detach(consumer) {
      if (slot.release(consumer)) {
        log.info({ consumerId: consumer.id }, "Relay consumer detached");
        options.onConsumerChange?.(false);
      }
    },

    relay(raw) {
      const consumer = slot.current();
      if (!consumer) {
        return { delivered: false, reason: "no_consumer" };
      }

      const frame = frameTelegram(raw);

      try {
        consumer.write(frame);
      } catch (error) {
        // Dropped on purpose: the next accepted consumer is the only recovery.
        log.debug(
          {
            consumerId: consumer.id,
            error: error instanceof Error ? error.message : String(error),
          },
          "Relay write failed",
        );
        return { delivered: false, reason: "write_failed" };
      }

      log.trace(
        { consumerId: consumer.id, bytes: frame.length },
        "Telegram relayed",
      );
      return { delivered: true, consumerId: consumer.id, bytes: frame.length };
    },

    hasConsumer() {
      return slot.current() !== null;
    },

    close() {
      if (slot.current()) {
        slot.clear();
        options.onConsumerChange?.(false);
      }
    },
  };
}

// =============================================================================
// TCP Listener
// =============================================================================

/**
 * Wrap a socket as a relay consumer. Writes to a destroyed socket throw so
 * the relay can report them.
 */
export function socketConsumer(socket: Socket): RelayConsumer {
  const id = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;

  return {
    id,
    write(chunk) {
      if (socket.destroyed || !socket.writable) {
        throw new Error("Socket is not writable");
      }
      socket.write(chunk);
    },
    close() {
      socket.destroy();
    },
  };
}

/**
 * Accept downstream consumers on a TCP port. Every accepted connection
 * replaces the previous one.
 */
export function startRelayServer(
  relay: TelegramRelay,
  options: Readonly<{ port: number; clientTimeoutMs: number }>,
): Server {
  const server = createServer((socket) => {
    const consumer = socketConsumer(socket);

    socket.setTimeout(options.clientTimeoutMs);
    socket.setNoDelay(true);

    socket.on("timeout", () => {
      // Only a consumer that stopped draining is dropped; idle readers are fine.
      if (socket.writableLength > 0) {
        log.warn(
          { consumerId: consumer.id, pendingBytes: socket.writableLength },
          "Relay consumer stalled, dropping",
        );
        socket.destroy();
      }
    });

    socket.on("error", (error) => {
      log.debug(
        { consumerId: consumer.id, error: error.message },
        "Relay consumer socket error",
      );
    });

    socket.on("close", () => {
      relay.detach(consumer);
    });

    relay.attach(consumer);
  });

  server.on("error", (error) => {
    log.error({ error: error.message }, "Relay listener error");
  });

  server.listen(options.port, () => {
    log.info({ port: options.port }, "Relay listener started");
  });

  return server;
}
