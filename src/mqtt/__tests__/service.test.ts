/**
 * MQTT Module - Service Tests
 *
 * Drives the client callbacks through a stand-in for the mqtt client.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

type Listener = (...args: unknown[]) => void;

const broker = vi.hoisted(() => {
  const listeners = new Map<string, Listener>();
  return {
    listeners,
    client: {
      connected: false,
      on: (event: string, listener: Listener) => {
        listeners.set(event, listener);
      },
      subscribe: vi.fn(),
      end: vi.fn(),
    },
  };
});

vi.mock("mqtt", () => ({
  default: { connect: vi.fn(() => broker.client) },
}));

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
    MQTT_BROKER_URL: "mqtt://broker.test:1883",
    MQTT_TOPIC_TELEGRAM: "p1monitor/telegram",
  },
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
  }),
}));

import {
  disconnectMqttClient,
  getMqttStats,
  initializeMqttClient,
} from "../service.js";

function emit(event: string, ...args: unknown[]): void {
  const listener = broker.listeners.get(event);
  if (!listener) throw new Error(`No listener for ${event}`);
  listener(...args);
}

describe("MQTT Service", () => {
  const onTelegram = vi.fn();
  const onConnect = vi.fn();
  const onDisconnect = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    broker.listeners.clear();
    initializeMqttClient({ onTelegram, onConnect, onDisconnect });
  });

  afterEach(() => {
    disconnectMqttClient();
  });

  test("subscribes to the telegram topic and reports the connection", () => {
    emit("connect");

    expect(broker.client.subscribe).toHaveBeenCalledWith(
      "p1monitor/telegram",
      expect.any(Function),
    );
    expect(onConnect).toHaveBeenCalledTimes(1);
  });

  test("reports a closed connection", () => {
    emit("close");

    expect(onDisconnect).toHaveBeenCalledTimes(1);
  });

  test("hands a telegram payload to the handler", () => {
    const payload = Buffer.from("/KFM5\r\n\r\n!7016\r\n");

    emit("message", "p1monitor/telegram", payload);

    expect(onTelegram).toHaveBeenCalledWith(payload);
    expect(getMqttStats().received).toBe(1);
    expect(getMqttStats().undecodable).toBe(0);
  });

  test("counts a payload without telegram", () => {
    emit("message", "p1monitor/telegram", Buffer.from("online"));

    expect(onTelegram).not.toHaveBeenCalled();
    expect(getMqttStats()).toMatchObject({ received: 1, undecodable: 1 });
  });
});
