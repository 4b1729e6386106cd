/**
 * Pipeline module - stage contract, prompt stages and their loading
 */

export * from "./pipeline-stage";
export * from "./stage-result";
export * from "./cache-key";
export * from "./prompt-stage";
export * from "./stage-loader";
export * from "./stage-registry";
