export * from "./server.js";
export * from "./bootstrap.js";
export * from "./services/webhook-dispatcher.js";
