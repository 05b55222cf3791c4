import type { Server as HttpServer } from "node:http";
import { Hono } from "hono";
import type { Context } from "hono";
import { serve } from "@hono/node-server";
import { WebSocketServer } from "ws";
import { ZodError } from "zod";
import {
  ApproveRequestSchema,
  CancelRequestSchema,
  ConflictError,
  HistoryQuerySchema,
  InvalidStateError,
  RejectRequestSchema,
  ReleaseGateError,
  RunNotFoundError,
  SubmitLatestRequestSchema,
  SubmitRequestSchema,
  UnknownEnvironmentError,
  errorMessage,
  logger as rootLogger,
  toEnvironmentView,
  toRunView,
  type Logger,
  type PromotionEventEnvelope,
  type PromotionOrchestrator,
  type RunStore
} from "@releasegate/core";

export interface ReleaseGateServerOptions {
  orchestrator: PromotionOrchestrator;
  /** Closed on stop(); also the source of replayed events on the SSE stream. */
  store: RunStore;
  host?: string;
  port?: number;
  logger?: Logger;
}

type ErrorStatus = 400 | 404 | 409 | 500;

const encoder = new TextEncoder();

/**
 * HTTP control plane over one orchestrator. Routes only translate requests
 * into orchestrator calls; every promotion decision happens in the core.
 */
export class ReleaseGateServer {
  readonly app = new Hono();
  readonly orchestrator: PromotionOrchestrator;

  private readonly store: RunStore;
  private readonly log: Logger;
  private readonly host: string;
  private readonly port: number;

  private server?: ReturnType<typeof serve>;
  private ws?: WebSocketServer;
  private unsubscribeBroadcast?: () => void;

  constructor(options: ReleaseGateServerOptions) {
    this.orchestrator = options.orchestrator;
    this.store = options.store;
    this.host = options.host ?? "127.0.0.1";
    this.port = options.port ?? 4600;
    this.log = (options.logger ?? rootLogger).child({ component: "server" });
    this.orchestrator.recover();

    this.setupApp();
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      hostname: this.host,
      port: this.port
    });

    this.ws = new WebSocketServer({ server: this.server as unknown as HttpServer, path: "/ws" });
    this.unsubscribeBroadcast = this.orchestrator.subscribe((event) => {
      this.broadcast(event);
    });
    this.log.info("control plane listening", { address: this.getAddress() });
  }

  async stop(): Promise<void> {
    this.unsubscribeBroadcast?.();
    await this.orchestrator.shutdown();
    this.ws?.close();
    this.server?.close();
    this.store.close();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }

  private setupApp(): void {
    this.app.get("/health", (c) => c.json({ ok: true }));

    this.app.get("/api/environments", (c) =>
      c.json({ environments: this.orchestrator.listEnvironments().map(toEnvironmentView) })
    );

    this.app.post("/api/promotions", async (c) => {
      try {
        const body = SubmitRequestSchema.parse(await c.req.json().catch(() => ({})));
        const run = this.orchestrator.submit({
          artifactId: body.artifact_id,
          environment: body.environment,
          requestedBy: body.requested_by,
          trigger: body.trigger
        });
        return c.json(toRunView(run), 202);
      } catch (error) {
        return this.errorResponse(c, error);
      }
    });

    this.app.post("/api/promotions/latest", async (c) => {
      try {
        const body = SubmitLatestRequestSchema.parse(await c.req.json().catch(() => ({})));
        const run = await this.orchestrator.submitLatestApproved(body.environment, body.requested_by);
        return c.json(toRunView(run), 202);
      } catch (error) {
        return this.errorResponse(c, error);
      }
    });

    this.app.get("/api/promotions", (c) => {
      const parsed = HistoryQuerySchema.safeParse({ limit: c.req.query("limit") });
      const limit = parsed.success ? parsed.data.limit : 20;
      return c.json({ runs: this.orchestrator.listRuns(limit).map(toRunView) });
    });

    this.app.get("/api/promotions/:id", (c) => {
      const run = this.orchestrator.getRun(c.req.param("id"));
      if (!run) {
        return this.errorResponse(c, new RunNotFoundError(c.req.param("id")));
      }
      return c.json(toRunView(run));
    });

    this.app.post("/api/promotions/:id/approve", async (c) => {
      try {
        const body = ApproveRequestSchema.parse(await c.req.json().catch(() => ({})));
        const run = this.orchestrator.approve(c.req.param("id"), body.approver, body.comment);
        return c.json(toRunView(run));
      } catch (error) {
        return this.errorResponse(c, error);
      }
    });

    this.app.post("/api/promotions/:id/reject", async (c) => {
      try {
        const body = RejectRequestSchema.parse(await c.req.json().catch(() => ({})));
        const run = this.orchestrator.reject(c.req.param("id"), body.approver, body.reason);
        return c.json(toRunView(run));
      } catch (error) {
        return this.errorResponse(c, error);
      }
    });

    this.app.post("/api/promotions/:id/cancel", async (c) => {
      try {
        const body = CancelRequestSchema.parse(await c.req.json().catch(() => ({})));
        const run = this.orchestrator.cancel(c.req.param("id"), body.reason);
        return c.json(toRunView(run));
      } catch (error) {
        return this.errorResponse(c, error);
      }
    });

    this.app.get("/api/events", (c) => {
      const runId = c.req.query("run_id") ?? null;
      let unsubscribe: (() => void) | undefined;

      const stream = new ReadableStream<Uint8Array>({
        start: (controller) => {
          const send = (event: PromotionEventEnvelope) => {
            if (runId === null || event.run_id === runId) {
              controller.enqueue(encoder.encode(encodeSSE(event)));
            }
          };

          for (const event of this.store.getRecentEvents(runId, 25).reverse()) {
            send(event);
          }
          unsubscribe = this.orchestrator.subscribe(send);
          controller.enqueue(
            encoder.encode(`event: connected\ndata: ${JSON.stringify({ run_id: runId })}\n\n`)
          );

          c.req.raw.signal.addEventListener(
            "abort",
            () => {
              unsubscribe?.();
            },
            { once: true }
          );
        },
        cancel: () => {
          unsubscribe?.();
        }
      });

      return new Response(stream, {
        headers: {
          "Content-Type": "text/event-stream",
          "Cache-Control": "no-cache",
          Connection: "keep-alive"
        }
      });
    });
  }

  private errorResponse(c: Context, error: unknown): Response {
    const [status, body] = describeError(error);
    if (status === 500) {
      this.log.error("request failed", { path: c.req.path, error: errorMessage(error) });
    }
    return c.json(body, status);
  }

  private broadcast(event: PromotionEventEnvelope): void {
    if (!this.ws) {
      return;
    }
    const payload = JSON.stringify(event);
    for (const client of this.ws.clients) {
      if (client.readyState === 1) {
        client.send(payload);
      }
    }
  }
}

interface ErrorBody {
  error: string;
  code?: string;
  active_run_id?: string;
}

function describeError(error: unknown): [ErrorStatus, ErrorBody] {
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    return [400, { error: message, code: "INVALID_REQUEST" }];
  }
  if (error instanceof ConflictError) {
    return [409, { error: error.message, code: error.code, active_run_id: error.activeRunId }];
  }
  if (error instanceof RunNotFoundError) {
    return [404, { error: error.message, code: error.code }];
  }
  if (error instanceof InvalidStateError) {
    return [409, { error: error.message, code: error.code }];
  }
  if (error instanceof UnknownEnvironmentError || error instanceof ReleaseGateError) {
    return [400, { error: error.message, code: error.code }];
  }
  return [500, { error: errorMessage(error) }];
}

function encodeSSE(event: PromotionEventEnvelope): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}
