/**
 * Pipeline error taxonomy.
 *
 * Every error raised by the core carries a `kind` so the orchestrator and the
 * CLI can report failures without string matching on messages.
 */

import type { ContextStore } from "../store/context-store";

export type PipelineErrorKind =
  | "config"
  | "provider_unavailable"
  | "provider_transient"
  | "stage_output_invalid"
  | "context_ownership"
  | "halted"
  | "cancelled";

/**
 * Failure kinds a stage attempt can end with.
 */
export type StageFailureKind =
  | "provider_unavailable"
  | "provider_transient"
  | "stage_output_invalid";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed document, unknown provider or unknown stage reference.
 * Always fatal, always raised before any provider call.
 */
export class ConfigError extends PipelineError {
  readonly kind = "config" as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message, options);
  }
}

/**
 * Missing or invalid credential, backend not installed or unreachable.
 */
export class ProviderUnavailableError extends PipelineError {
  readonly kind = "provider_unavailable" as const;

  constructor(
    public readonly providerId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${providerId}] ${message}`, options);
  }
}

/**
 * Rate limit, transient network failure or empty response. Eligible for retry.
 */
export class ProviderTransientError extends PipelineError {
  readonly kind = "provider_transient" as const;

  constructor(
    public readonly providerId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${providerId}] ${message}`, options);
  }
}

export class ProviderTimeoutError extends PipelineError {
  readonly kind = "provider_transient" as const;

  constructor(
    public readonly providerId: string,
    public readonly timeoutMs: number
  ) {
    super(`[${providerId}] Attempt timed out after ${timeoutMs}ms`);
  }
}

/**
 * Non-2xx HTTP response. Retry eligibility follows the status code.
 */
export class ProviderHttpError extends PipelineError {
  readonly kind: "provider_unavailable" | "provider_transient";

  constructor(
    public readonly providerId: string,
    public readonly status: number,
    body: string
  ) {
    super(`[${providerId}] HTTP ${status}: ${body}`);
    this.kind = isTransientStatus(status) ? "provider_transient" : "provider_unavailable";
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;
}

/**
 * Raised by a stage whose output does not have the expected shape.
 */
export class StageOutputInvalidError extends PipelineError {
  readonly kind = "stage_output_invalid" as const;

  constructor(
    public readonly stageName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Stage "${stageName}" produced invalid output: ${message}`, options);
  }
}

export class ContextOwnershipError extends PipelineError {
  readonly kind = "context_ownership" as const;

  constructor(
    public readonly key: string,
    public readonly owner: string,
    public readonly producer: string
  ) {
    super(`Context key "${key}" is owned by "${owner}" and cannot be written by "${producer}"`);
  }
}

/**
 * A required stage configured with halt-pipeline failed.
 */
export class PipelineHaltedError extends PipelineError {
  readonly kind = "halted" as const;

  constructor(
    public readonly stageName: string,
    public readonly failureKind: StageFailureKind,
    public readonly reason: string,
    public readonly context: ContextStore
  ) {
    super(`Pipeline halted at stage "${stageName}" (${failureKind}): ${reason}`);
  }
}

export class PipelineCancelledError extends PipelineError {
  readonly kind = "cancelled" as const;

  /** Set by the orchestrator once the run's context is known. */
  context?: ContextStore;

  constructor(message = "Pipeline run was cancelled", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
