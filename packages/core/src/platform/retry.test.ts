import { afterEach, describe, expect, it, vi } from "vitest";
import { TerminalResourceError, TransientResourceError, classifyResourceError } from "../errors.js";
import { DEFAULT_RETRY_POLICY, computeBackoffMs, withRetry } from "./retry.js";

const fastPolicy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 4, jitterMs: 0 };

afterEach(() => {
  vi.useRealTimers();
});

describe("classifyResourceError", () => {
  it("separates transient from terminal errors", () => {
    expect(classifyResourceError(new TransientResourceError("throttled"))).toBe("transient");
    expect(classifyResourceError(new TerminalResourceError("bad config"))).toBe("terminal");
    expect(classifyResourceError({ status: 503 })).toBe("transient");
    expect(classifyResourceError({ status: 429 })).toBe("transient");
    expect(classifyResourceError({ status: 400 })).toBe("terminal");
    expect(classifyResourceError({ retryable: true })).toBe("transient");
    expect(classifyResourceError(new Error("who knows"))).toBe("terminal");
    expect(classifyResourceError("a string")).toBe("terminal");
  });
});

describe("computeBackoffMs", () => {
  it("doubles from the base delay and caps at the maximum", () => {
    const noJitter = () => 0;
    expect(computeBackoffMs(1, DEFAULT_RETRY_POLICY, noJitter)).toBe(1_000);
    expect(computeBackoffMs(2, DEFAULT_RETRY_POLICY, noJitter)).toBe(2_000);
    expect(computeBackoffMs(5, DEFAULT_RETRY_POLICY, noJitter)).toBe(16_000);
    expect(computeBackoffMs(9, DEFAULT_RETRY_POLICY, noJitter)).toBe(16_000);
  });

  it("adds up to the configured jitter", () => {
    expect(computeBackoffMs(1, DEFAULT_RETRY_POLICY, () => 0.5)).toBe(1_200);
  });
});

describe("withRetry", () => {
  it("retries transient errors until the call succeeds", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new TransientResourceError("throttled");
        return "ok";
      },
      { policy: fastPolicy }
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("gives up after the attempt cap", async () => {
    let calls = 0;
    const failing = withRetry(
      async () => {
        calls += 1;
        throw new TransientResourceError("throttled");
      },
      { policy: fastPolicy }
    );

    await expect(failing).rejects.toThrow("gave up after 3 attempts: throttled");
    await expect(failing).rejects.toBeInstanceOf(TerminalResourceError);
    expect(calls).toBe(3);
  });

  it("does not retry terminal errors", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new TerminalResourceError("quota exceeded");
        },
        { policy: fastPolicy }
      )
    ).rejects.toThrow("quota exceeded");
    expect(calls).toBe(1);
  });

  it("stops when the next delay would pass the deadline", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const deadline = Date.now() + 500;

    await expect(
      withRetry(
        async () => {
          throw new TransientResourceError("throttled");
        },
        { policy: DEFAULT_RETRY_POLICY, deadline, random: () => 0 }
      )
    ).rejects.toThrow("deadline reached after 1 attempts: throttled");
  });
});
