export * from "./errors.js";
export * from "./logger.js";

export * from "./config/schema.js";
export * from "./config/loader.js";
export * from "./config/environments.js";
export * from "./config/settings.js";

export * from "./contracts/api.js";
export * from "./contracts/events.js";

export * from "./db/store.js";
export * from "./db/memory-store.js";

export * from "./events/event-bus.js";
export * from "./monitor/readiness-poller.js";

export * from "./platform/ports.js";
export * from "./platform/retry.js";

export * from "./simulation/platform.js";

export * from "./state/approvals.js";
export * from "./state/machine.js";
export * from "./state/orchestrator.js";
export * from "./state/types.js";

export * from "./statistics/evaluate-gate.js";
export * from "./statistics/percentiles.js";

export * from "./utils/async.js";
export * from "./utils/duration.js";

export * from "./validation/types.js";
export * from "./validation/validator.js";
