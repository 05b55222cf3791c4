const DURATION_RE = /^(\d+)(ms|s|m|h|d)$/;

export type DurationUnit = "ms" | "s" | "m" | "h" | "d";

const MULTIPLIER: Record<DurationUnit, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000
};

export const DURATION_PATTERN = DURATION_RE;

function isDurationUnit(value: string): value is DurationUnit {
  return value in MULTIPLIER;
}

/** Accepts `30s`, `10m`, `1h`, `500ms`, `1d`, or a number of milliseconds. */
export function parseDuration(input: string | number): number {
  if (typeof input === "number") {
    if (!Number.isFinite(input) || input < 0) {
      throw new Error(`Invalid duration: ${input}. Milliseconds must be a non-negative number.`);
    }
    return input;
  }

  const match = DURATION_RE.exec(input.trim());
  const unit = match?.[2];
  if (!match || !unit || !isDurationUnit(unit)) {
    throw new Error(`Invalid duration: ${input}. Use formats like 30s, 10m, 1h, 1d.`);
  }
  return Number(match[1]) * MULTIPLIER[unit];
}

export function formatDuration(ms: number): string {
  if (ms < 1_000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${Math.round(ms / 1_000)}s`;
  }
  if (ms < 3_600_000) {
    return `${Math.round(ms / 60_000)}m`;
  }
  if (ms < 86_400_000) {
    return `${Math.round(ms / 3_600_000)}h`;
  }
  return `${Math.round(ms / 86_400_000)}d`;
}
