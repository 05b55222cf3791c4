import {
  errorMessage,
  logger as rootLogger,
  sleep,
  type Logger,
  type NotificationSink,
  type PromotionEventEnvelope,
  type WebhookConfig
} from "@releasegate/core";

export interface WebhookDispatcherOptions {
  fetch?: typeof fetch;
  /** Delay before retry number `attempt` (1-based). */
  backoffMs?: (attempt: number) => number;
  logger?: Logger;
}

const defaultBackoff = (attempt: number) => Math.min(2 ** attempt * 250, 5_000);

/** Posts orchestrator events to the configured webhooks. Delivery never blocks a run. */
export class WebhookDispatcher implements NotificationSink {
  private readonly fetchImpl: typeof fetch;
  private readonly backoffMs: (attempt: number) => number;
  private readonly log: Logger;

  constructor(
    private readonly hooks: WebhookConfig[],
    options: WebhookDispatcherOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.backoffMs = options.backoffMs ?? defaultBackoff;
    this.log = (options.logger ?? rootLogger).child({ component: "webhooks" });
  }

  notify(event: PromotionEventEnvelope): Promise<void> {
    return this.dispatch(event);
  }

  async dispatch(event: PromotionEventEnvelope): Promise<void> {
    if (this.hooks.length === 0) {
      return;
    }

    await Promise.all(
      this.hooks
        .filter((hook) => hook.on.includes("*") || hook.on.includes(event.type))
        .map((hook) => this.sendWithRetry(hook, event))
    );
  }

  private async sendWithRetry(hook: WebhookConfig, event: PromotionEventEnvelope): Promise<void> {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        const response = await this.fetchImpl(hook.url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            ...hook.headers
          },
          body: JSON.stringify(event)
        });

        if (!response.ok) {
          throw new Error(`Webhook failed: HTTP ${response.status}`);
        }

        return;
      } catch (error) {
        if (attempt > hook.retries) {
          this.log.warn("webhook delivery failed", {
            url: hook.url,
            event: event.type,
            run_id: event.run_id,
            attempts: attempt,
            error: errorMessage(error)
          });
          return;
        }

        await sleep(this.backoffMs(attempt));
      }
    }
  }
}
