/**
 * Failure classification: decides whether a provider failure is worth retrying.
 */

import {
  PipelineError,
  StageFailureKind,
  errorMessage,
} from "../errors/pipeline-errors";

export interface FailureClassification {
  kind: StageFailureKind;
  recoverable: boolean;
  reason: string;
}

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
]);

export function classifyFailure(error: unknown): FailureClassification {
  const reason = errorMessage(error);

  if (error instanceof PipelineError) {
    switch (error.kind) {
      case "provider_transient":
        return { kind: "provider_transient", recoverable: true, reason };
      case "stage_output_invalid":
        return { kind: "stage_output_invalid", recoverable: false, reason };
      default:
        return { kind: "provider_unavailable", recoverable: false, reason };
    }
  }

  // A system error code anywhere in the cause chain decides; ENOTFOUND,
  // ENOENT and other unlisted codes are terminal
  const code = findErrorCode(error);
  if (code) {
    return TRANSIENT_NETWORK_CODES.has(code) || code.startsWith("UND_ERR_")
      ? { kind: "provider_transient", recoverable: true, reason }
      : { kind: "provider_unavailable", recoverable: false, reason };
  }

  // undici reports connection failures as TypeError("fetch failed") with the
  // socket error as cause
  if (error instanceof TypeError && /fetch failed/i.test(error.message)) {
    return { kind: "provider_transient", recoverable: true, reason };
  }

  if (error instanceof Error && error.name === "TimeoutError") {
    return { kind: "provider_transient", recoverable: true, reason };
  }

  return { kind: "provider_unavailable", recoverable: false, reason };
}

function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}
