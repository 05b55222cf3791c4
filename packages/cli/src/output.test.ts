import { describe, expect, it } from "vitest";
import { describePolicy } from "./output.js";

describe("describePolicy", () => {
  it("lists every configured bound", () => {
    expect(
      describePolicy({
        min_accuracy: 0.9,
        max_latency_p95_ms: 250,
        max_error_rate: 0.01,
        requires_human_approval: true
      })
    ).toBe("accuracy >= 0.9, p95 <= 250ms, errors <= 0.01, human approval");
  });

  it("says none for an empty policy", () => {
    expect(describePolicy({ requires_human_approval: false })).toBe("none");
  });
});
