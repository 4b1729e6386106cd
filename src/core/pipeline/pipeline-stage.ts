/**
 * PipelineStage - base interface for analysis stages.
 *
 * A stage reads from the shared context, builds a request, calls the provider
 * gateway and hands its raw output back to the orchestrator, which owns every
 * context and cache write.
 */

import { EffectiveStageConfig } from "../config/config-resolver";
import { JsonValue } from "../models/json";
import { ContextReader } from "../store/context-store";
import { ExecutionResult } from "./stage-result";

/**
 * Identifies a stage and declares the context keys it produces and reads.
 */
export interface StageDescriptor {
  /** Unique stage identifier */
  name: string;

  /** Human-readable description */
  description: string;

  /** Context keys this stage owns and writes */
  outputKeys: string[];

  /**
   * Context keys this stage is interested in. Used for cache-key construction
   * and opportunistic reads; not enforced dependencies.
   */
  inputKeys: string[];

  /** Ordering hint used only when the configuration has no explicit order */
  order?: number;
}

/**
 * Everything a stage sees while it runs.
 */
export interface StageExecutionContext {
  runId: string;

  /** Frozen view of the context as of stage start */
  context: ContextReader;

  config: EffectiveStageConfig;

  signal: AbortSignal;

  /**
   * Send a request to this stage's configured provider with its generation
   * parameters and retry policy.
   */
  generate(request: string): Promise<ExecutionResult>;
}

export interface PipelineStage {
  readonly descriptor: StageDescriptor;

  /**
   * Deterministic fingerprint of this stage's effective inputs.
   */
  cacheKey(context: ContextReader, config: EffectiveStageConfig): string;

  /**
   * Execute this stage.
   *
   * @returns `success` carrying the raw output, or a failure
   */
  execute(ctx: StageExecutionContext): Promise<ExecutionResult>;

  /**
   * Turn raw output (fresh or cached) into context writes keyed by output key.
   *
   * @throws StageOutputInvalidError when the output has the wrong shape
   */
  project(rawOutput: string, config: EffectiveStageConfig): Record<string, JsonValue>;
}
