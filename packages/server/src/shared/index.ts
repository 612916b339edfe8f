export * from "./backoff.js";
export * from "./circuit-breaker.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./managed-connection.js";
export * from "./message-queue.js";
export * from "./messages.js";
export * from "./retry.js";
export * from "./task-group.js";
export * from "./transport.js";
