export * from "./context-store";
export * from "./stage-cache";
export * from "./redis-stage-cache";
