import { afterEach, describe, expect, it } from "vitest";
import type { PromotionEventEnvelope } from "../contracts/events.js";
import { setLogHandler, type LogEntry } from "../logger.js";
import { PromotionEventBus } from "./event-bus.js";

const event: PromotionEventEnvelope = {
  type: "transition",
  timestamp: "2026-01-01T00:00:00.000Z",
  run_id: "run-1",
  data: { from: "REQUESTED", to: "DEPLOYING" }
};

afterEach(() => {
  setLogHandler(null);
});

describe("PromotionEventBus", () => {
  it("delivers to every subscriber even when one throws", () => {
    const logs: LogEntry[] = [];
    setLogHandler((entry) => logs.push(entry));
    const bus = new PromotionEventBus();
    const seen: string[] = [];

    bus.subscribe(() => {
      throw new Error("boom");
    });
    bus.subscribe((received) => seen.push(received.run_id));
    bus.on("transition", (received: PromotionEventEnvelope) => seen.push(received.type));

    expect(() => bus.emitEvent(event)).not.toThrow();
    expect(seen).toEqual(["run-1", "transition"]);
    expect(logs.map((entry) => [entry.level, entry.message, entry.context.error])).toEqual([
      ["warn", "event listener failed", "boom"]
    ]);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new PromotionEventBus();
    const seen: string[] = [];
    const unsubscribe = bus.subscribe((received) => seen.push(received.type));

    bus.emitEvent(event);
    unsubscribe();
    bus.emitEvent(event);

    expect(seen).toEqual(["transition"]);
  });
});
