/**
 * ProviderGateway tests - retry, backoff, timeout and cancellation
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { ProviderGateway, RetryPolicy, backoffDelay } from "../provider-gateway";
import { GenerationParams } from "../text-provider";
import {
  PipelineCancelledError,
  ProviderHttpError,
  ProviderTimeoutError,
  ProviderTransientError,
  ProviderUnavailableError,
} from "../../errors/pipeline-errors";
import { ScriptedProvider, hangUntilAborted, recordingSleep } from "../../__tests__/fakes";

const params: GenerationParams = { model: null, temperature: 0.7, maxTokens: 256 };

const policy: RetryPolicy = {
  timeoutMs: 5_000,
  retryCount: 2,
  baseDelayMs: 100,
  maxDelayMs: 250,
};

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect(backoffDelay(1, 1000, 30_000)).toBe(1000);
    expect(backoffDelay(2, 1000, 30_000)).toBe(2000);
    expect(backoffDelay(3, 1000, 30_000)).toBe(4000);
  });

  it("is capped at the maximum", () => {
    expect(backoffDelay(6, 1000, 30_000)).toBe(30_000);
  });
});

describe("ProviderGateway", () => {
  let clock: ReturnType<typeof recordingSleep>;

  beforeEach(() => {
    clock = recordingSleep();
  });

  it("returns success on the first attempt", async () => {
    const provider = new ScriptedProvider("fake", "hello");
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });

    const result = await gateway.execute("fake", "prompt", params, policy);

    expect(result).toEqual({ type: "success", output: "hello", attempts: 1 });
    expect(provider.prompts).toEqual(["prompt"]);
    expect(provider.requests[0].params).toEqual(params);
    expect(clock.delays).toEqual([]);
  });

  it("retries transient failures with exponential backoff", async () => {
    const provider = new ScriptedProvider("fake", [
      new ProviderTransientError("fake", "rate limited"),
      new ProviderHttpError("fake", 503, "overloaded"),
      "third time lucky",
    ]);
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });

    const result = await gateway.execute("fake", "prompt", params, policy);

    expect(result).toEqual({ type: "success", output: "third time lucky", attempts: 3 });
    expect(provider.callCount).toBe(3);
    expect(clock.delays).toEqual([100, 200]);
  });

  it("escalates to a terminal failure once the retry budget is spent", async () => {
    const provider = new ScriptedProvider("fake", new ProviderTransientError("fake", "rate limited"));
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });

    const result = await gateway.execute("fake", "prompt", params, { ...policy, retryCount: 3 });

    expect(result).toEqual({
      type: "terminal_failure",
      kind: "provider_transient",
      reason: "Retry budget exhausted after 4 attempts: [fake] rate limited",
      attempts: 4,
    });
    expect(provider.callCount).toBe(4);
    expect(clock.delays).toEqual([100, 200, 250]);
  });

  it("does not retry terminal failures", async () => {
    const provider = new ScriptedProvider("fake", new ProviderUnavailableError("fake", "Credential FAKE_KEY is missing"));
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });

    const result = await gateway.execute("fake", "prompt", params, policy);

    expect(result).toEqual({
      type: "terminal_failure",
      kind: "provider_unavailable",
      reason: "[fake] Credential FAKE_KEY is missing",
      attempts: 1,
    });
    expect(provider.callCount).toBe(1);
    expect(clock.delays).toEqual([]);
  });

  it("treats a 401 as terminal", async () => {
    const provider = new ScriptedProvider("fake", new ProviderHttpError("fake", 401, "bad key"));
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });

    const result = await gateway.execute("fake", "prompt", params, policy);

    expect(result.type).toBe("terminal_failure");
    expect(provider.callCount).toBe(1);
  });

  it("fails an unknown provider without any attempt", async () => {
    const gateway = new ProviderGateway([], { sleep: clock.sleep });

    const result = await gateway.execute("missing", "prompt", params, policy);

    expect(result).toEqual({
      type: "terminal_failure",
      kind: "provider_unavailable",
      reason: 'Provider "missing" is not registered',
      attempts: 0,
    });
  });

  it("bounds each attempt by the timeout and aborts the provider call", async () => {
    const provider = new ScriptedProvider("slow", hangUntilAborted);
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });

    const result = await gateway.execute("slow", "prompt", params, { ...policy, timeoutMs: 20, retryCount: 0 });

    expect(result).toEqual({
      type: "terminal_failure",
      kind: "provider_transient",
      reason: "Retry budget exhausted after 1 attempts: [slow] Attempt timed out after 20ms",
      attempts: 1,
    });
    expect(provider.requests[0].signal.aborted).toBe(true);
    expect(provider.requests[0].signal.reason).toBeInstanceOf(ProviderTimeoutError);
  });

  it("rejects with PipelineCancelledError when already aborted", async () => {
    const provider = new ScriptedProvider("fake", "unused");
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.execute("fake", "prompt", params, policy, controller.signal)).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
    expect(provider.callCount).toBe(0);
  });

  it("rejects with PipelineCancelledError when aborted mid-attempt", async () => {
    const provider = new ScriptedProvider("fake", hangUntilAborted);
    const gateway = new ProviderGateway([provider], { sleep: clock.sleep });
    const controller = new AbortController();

    const pending = gateway.execute("fake", "prompt", params, policy, controller.signal);
    controller.abort(new Error("stop"));

    await expect(pending).rejects.toBeInstanceOf(PipelineCancelledError);
    expect(provider.callCount).toBe(1);
  });

  it("keeps track of registered providers", () => {
    const gateway = new ProviderGateway([new ScriptedProvider("a", "x")]);
    gateway.register(new ScriptedProvider("b", "y"));

    expect(gateway.listProviders()).toEqual(["a", "b"]);
    expect(gateway.has("b")).toBe(true);
    expect(gateway.unregister("a")).toBe(true);
    expect(gateway.has("a")).toBe(false);
  });

  describe("validateProvider", () => {
    it("reports unregistered providers", async () => {
      const gateway = new ProviderGateway();

      const report = await gateway.validateProvider("ghost");

      expect(report.ok).toBe(false);
      expect(report.detail).toBe('Provider "ghost" is not registered');
    });

    it("delegates to the provider", async () => {
      const gateway = new ProviderGateway([new ScriptedProvider("a", "x", { ok: false, detail: "no key" })]);

      const report = await gateway.validateProvider("a");

      expect(report).toEqual({
        providerId: "a",
        ok: false,
        credential: "not-required",
        reachable: true,
        detail: "no key",
      });
    });

    it("turns a throwing validate into a failed report", async () => {
      const provider = new ScriptedProvider("a", "x");
      provider.validate = async () => {
        throw new Error("probe exploded");
      };
      const gateway = new ProviderGateway([provider]);

      const report = await gateway.validateProvider("a");

      expect(report.ok).toBe(false);
      expect(report.detail).toBe("probe exploded");
    });
  });
});
