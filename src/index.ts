/**
 * stageline - public entry point.
 */

export * from "./core/errors/pipeline-errors";
export * from "./core/models/json";
export * from "./core/config/config-schema";
export * from "./core/config/config-loader";
export * from "./core/config/config-resolver";
export * from "./core/store";
export * from "./core/provider";
export * from "./core/pipeline";
export * from "./core/events/event-bus";
export * from "./core/orchestrator/pipeline-orchestrator";
export * from "./core/pipeline-system";
export { sanitizeForLogging } from "./core/utils/log-sanitizer";
