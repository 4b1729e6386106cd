/**
 * ExecutionResult - tagged outcome of one stage attempt.
 *
 * Produced by the ProviderGateway (and by stages wrapping it), consumed by the
 * PipelineOrchestrator.
 */

import { StageFailureKind } from "../errors/pipeline-errors";

export type ExecutionResult =
  | { type: "success"; output: string; attempts: number }
  | {
      type: "recoverable_failure";
      kind: StageFailureKind;
      reason: string;
      attempts: number;
    }
  | {
      type: "terminal_failure";
      kind: StageFailureKind;
      reason: string;
      attempts: number;
    };

export type FailedExecutionResult = Exclude<ExecutionResult, { type: "success" }>;

/**
 * Helper functions to create execution results
 */
export const ExecutionResult = {
  Success: (output: string, attempts: number = 1): ExecutionResult => ({
    type: "success",
    output,
    attempts,
  }),

  TerminalFailure: (
    kind: StageFailureKind,
    reason: string,
    attempts: number
  ): ExecutionResult => ({
    type: "terminal_failure",
    kind,
    reason,
    attempts,
  }),
};

/**
 * Per-stage state machine.
 *
 * pending → (cache_hit | invoking) → (succeeded | failed_recovered | failed_halted)
 */
export type StageState =
  | "pending"
  | "cache_hit"
  | "invoking"
  | "succeeded"
  | "failed_recovered"
  | "failed_halted";

export type FallbackMode = "use-cache" | "use-default-value" | "skip" | "halt-pipeline";

/**
 * What actually happened when a fallback was applied. `use-cache` without a
 * previous entry degrades to `skip`.
 */
export type AppliedFallback = "use-cache" | "use-default-value" | "skip";

export interface DegradationRecord {
  stageName: string;
  kind: StageFailureKind;
  reason: string;
  fallback: FallbackMode;
  appliedFallback: AppliedFallback;
}

export interface StageReport {
  stageName: string;
  state: StageState;
  cacheKey?: string;
  /** Output came from the stage cache rather than a provider call */
  cacheHit: boolean;
  attempts: number;
  elapsedMs: number;
  writtenKeys: string[];
  degradation?: DegradationRecord;
}
