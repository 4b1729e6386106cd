/**
 * Provider module - text providers and the gateway in front of them
 */

export * from "./text-provider";
export * from "./provider-presets";
export * from "./failure-classifier";
export * from "./provider-gateway";
export * from "./http-text-provider";
export * from "./command-text-provider";
export * from "./dry-run-provider";
export * from "./provider-factory";
