import type { z } from "zod";
import {
  EnvironmentListResponseSchema,
  ErrorResponseSchema,
  RunListResponseSchema,
  RunViewSchema,
  type EnvironmentView,
  type RunView
} from "@releasegate/core";

export const DEFAULT_BASE_URL = "http://127.0.0.1:4600";

export interface ReleaseGateClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

export interface SubmitOptions {
  artifactId: string;
  environment: string;
  requestedBy?: string;
  trigger?: "build" | "manual";
}

/** A non-2xx answer from the control plane. */
export class ReleaseGateApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    readonly activeRunId?: string
  ) {
    super(message);
    this.name = "ReleaseGateApiError";
  }
}

/** Typed client for the releasegate HTTP control plane. */
export class ReleaseGateClient {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ReleaseGateClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? process.env.RELEASEGATE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  async health(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/health`);
      return res.ok;
    } catch {
      return false;
    }
  }

  async listEnvironments(): Promise<EnvironmentView[]> {
    const body = await this.request("GET", "/api/environments", EnvironmentListResponseSchema);
    return body.environments;
  }

  submit(options: SubmitOptions): Promise<RunView> {
    return this.request("POST", "/api/promotions", RunViewSchema, {
      artifact_id: options.artifactId,
      environment: options.environment,
      ...(options.requestedBy ? { requested_by: options.requestedBy } : {}),
      ...(options.trigger ? { trigger: options.trigger } : {})
    });
  }

  submitLatest(environment: string, requestedBy?: string): Promise<RunView> {
    return this.request("POST", "/api/promotions/latest", RunViewSchema, {
      environment,
      ...(requestedBy ? { requested_by: requestedBy } : {})
    });
  }

  getRun(id: string): Promise<RunView> {
    return this.request("GET", `/api/promotions/${encodeURIComponent(id)}`, RunViewSchema);
  }

  async listRuns(limit = 20): Promise<RunView[]> {
    const body = await this.request("GET", `/api/promotions?limit=${limit}`, RunListResponseSchema);
    return body.runs;
  }

  approve(id: string, approver: string, comment?: string): Promise<RunView> {
    return this.request("POST", `/api/promotions/${encodeURIComponent(id)}/approve`, RunViewSchema, {
      approver,
      ...(comment ? { comment } : {})
    });
  }

  reject(id: string, approver: string, reason?: string): Promise<RunView> {
    return this.request("POST", `/api/promotions/${encodeURIComponent(id)}/reject`, RunViewSchema, {
      approver,
      ...(reason ? { reason } : {})
    });
  }

  cancel(id: string, reason?: string): Promise<RunView> {
    return this.request(
      "POST",
      `/api/promotions/${encodeURIComponent(id)}/cancel`,
      RunViewSchema,
      reason ? { reason } : {}
    );
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T>,
    body?: unknown
  ): Promise<T> {
    const init: RequestInit = {
      method,
      ...(body !== undefined ? { headers: { "Content-Type": "application/json" } } : {}),
      ...(body !== undefined ? { body: JSON.stringify(body) } : {})
    };

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    const data: unknown = await response.json().catch(() => ({}));

    if (!response.ok) {
      const parsed = ErrorResponseSchema.safeParse(data);
      if (parsed.success) {
        throw new ReleaseGateApiError(
          parsed.data.error,
          response.status,
          parsed.data.code,
          parsed.data.active_run_id
        );
      }
      throw new ReleaseGateApiError(`HTTP ${response.status}`, response.status);
    }
    return schema.parse(data);
  }
}
