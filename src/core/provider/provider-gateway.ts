/**
 * ProviderGateway - routes generation requests to interchangeable providers.
 *
 * ## Execution Algorithm
 * 1. Look up the provider by identifier (unknown → terminal failure, no attempt)
 * 2. Run one attempt, bounded by the per-attempt timeout
 * 3. Classify a failure; terminal failures return immediately
 * 4. Recoverable failures are retried with exponential backoff until the
 *    retry budget is spent, then escalated to a terminal failure
 *
 * ## Usage
 * ```typescript
 * const gateway = new ProviderGateway([geminiProvider, dryRunProvider]);
 *
 * const result = await gateway.execute("gemini", prompt, params, {
 *   timeoutMs: 60_000,
 *   retryCount: 2,
 *   baseDelayMs: 1000,
 *   maxDelayMs: 30_000,
 * });
 * ```
 */

import {
  PipelineCancelledError,
  ProviderTimeoutError,
} from "../errors/pipeline-errors";
import { ExecutionResult } from "../pipeline/stage-result";
import { sanitizeForLogging } from "../utils/log-sanitizer";
import { classifyFailure } from "./failure-classifier";
import { GenerationParams, ProviderValidation, TextProvider } from "./text-provider";

export interface RetryPolicy {
  /** Upper bound for each individual attempt */
  timeoutMs: number;
  /** Retries after the first attempt; total attempts = 1 + retryCount */
  retryCount: number;
  /** Delay before the first retry; doubles for each following retry */
  baseDelayMs: number;
  /** Ceiling for the computed delay */
  maxDelayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ProviderGatewayOptions {
  /** Replaces the real timer, mainly for tests */
  sleep?: SleepFn;
}

/**
 * Delay before retry number `retry` (1-based).
 */
export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (retry - 1), maxDelayMs);
}

export class ProviderGateway {
  private providers = new Map<string, TextProvider>();
  private sleep: SleepFn;

  constructor(initialProviders: TextProvider[] = [], options: ProviderGatewayOptions = {}) {
    for (const provider of initialProviders) {
      this.register(provider);
    }
    this.sleep = options.sleep ?? abortableSleep;
  }

  // ── Provider Management ──────────────────────────────────────────

  register(provider: TextProvider): void {
    this.providers.set(provider.id, provider);
  }

  unregister(id: string): boolean {
    return this.providers.delete(id);
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  listProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  // ── Execution ────────────────────────────────────────────────────

  /**
   * Execute a request against a provider with retry, backoff and timeout.
   *
   * Resolves with `success` or `terminal_failure`; recoverable failures never
   * escape. Rejects with PipelineCancelledError when `signal` aborts.
   */
  async execute(
    providerId: string,
    request: string,
    params: GenerationParams,
    policy: RetryPolicy,
    signal?: AbortSignal
  ): Promise<ExecutionResult> {
    const provider = this.providers.get(providerId);
    if (!provider) {
      return ExecutionResult.TerminalFailure(
        "provider_unavailable",
        `Provider "${providerId}" is not registered`,
        0
      );
    }

    const maxAttempts = 1 + Math.max(0, policy.retryCount);
    let lastReason = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(signal);

      try {
        const output = await this.attempt(provider, request, params, policy.timeoutMs, signal);
        return ExecutionResult.Success(output, attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw new PipelineCancelledError(undefined, { cause: error });
        }

        const failure = classifyFailure(error);
        console.warn(
          `[ProviderGateway] ${providerId} attempt ${attempt}/${maxAttempts} failed (${failure.kind}): ${sanitizeForLogging(failure.reason)}`
        );

        if (!failure.recoverable) {
          return ExecutionResult.TerminalFailure(failure.kind, failure.reason, attempt);
        }
        lastReason = failure.reason;

        if (attempt < maxAttempts) {
          const delay = backoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs);
          try {
            await this.sleep(delay, signal);
          } catch (sleepError) {
            throw new PipelineCancelledError(undefined, { cause: sleepError });
          }
        }
      }
    }

    return ExecutionResult.TerminalFailure(
      "provider_transient",
      `Retry budget exhausted after ${maxAttempts} attempts: ${lastReason}`,
      maxAttempts
    );
  }

  /**
   * Cheap credential/reachability check. Unknown providers are reported, not thrown.
   */
  async validateProvider(providerId: string): Promise<ProviderValidation> {
    const provider = this.providers.get(providerId);
    if (!provider) {
      return {
        providerId,
        ok: false,
        credential: "not-required",
        reachable: false,
        detail: `Provider "${providerId}" is not registered`,
      };
    }
    try {
      return await provider.validate();
    } catch (error) {
      return {
        providerId,
        ok: false,
        credential: "not-required",
        reachable: false,
        detail: classifyFailure(error).reason,
      };
    }
  }

  private async attempt(
    provider: TextProvider,
    prompt: string,
    params: GenerationParams,
    timeoutMs: number,
    parentSignal?: AbortSignal
  ): Promise<string> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parentSignal?.reason);
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ProviderTimeoutError(provider.id, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(controller.signal.reason),
        { once: true }
      );
    });
    // The losing race branches must not surface as unhandled rejections
    timeout.catch(() => undefined);
    cancelled.catch(() => undefined);

    try {
      return await Promise.race([
        provider.generate({ prompt, params, signal: controller.signal }),
        timeout,
        cancelled,
      ]);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onParentAbort);
    }
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError();
  }
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
