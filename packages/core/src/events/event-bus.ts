import { EventEmitter } from "node:events";
import type { PromotionEventEnvelope } from "../contracts/events.js";
import { errorMessage } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logger.js";

export type PromotionEventListener = (event: PromotionEventEnvelope) => void;

/**
 * Fans orchestrator events out to subscribers. A listener that throws is
 * logged and skipped; the emitter and the remaining listeners carry on.
 */
export class PromotionEventBus extends EventEmitter {
  private readonly log: Logger;

  constructor(logger: Logger = rootLogger) {
    super();
    this.log = logger.child({ component: "event-bus" });
  }

  emitEvent<T>(event: PromotionEventEnvelope<T>): void {
    this.deliver("event", event);
    this.deliver(event.type, event);
  }

  subscribe(listener: PromotionEventListener): () => void {
    this.on("event", listener);
    return () => {
      this.off("event", listener);
    };
  }

  private deliver<T>(channel: string, event: PromotionEventEnvelope<T>): void {
    for (const listener of this.listeners(channel)) {
      try {
        Reflect.apply(listener, this, [event]);
      } catch (error) {
        this.log.warn("event listener failed", {
          type: event.type,
          run_id: event.run_id,
          error: errorMessage(error)
        });
      }
    }
  }
}
