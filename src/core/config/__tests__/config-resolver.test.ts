/**
 * ConfigResolver tests - layered precedence, ordering and validation
 */

import { describe, it, expect } from "@jest/globals";
import { ConfigResolver, toRetryPolicy } from "../config-resolver";
import { ConfigDocument } from "../config-schema";
import { ConfigError } from "../../errors/pipeline-errors";
import { StageDescriptor } from "../../pipeline/pipeline-stage";

function descriptor(name: string, order?: number): StageDescriptor {
  return { name, description: name, outputKeys: [`${name}_out`], inputKeys: [], order };
}

const STAGES = [descriptor("analysis"), descriptor("research"), descriptor("assembly")];

function resolverFor(document: ConfigDocument, stages: StageDescriptor[] = STAGES): ConfigResolver {
  return new ConfigResolver(document, {
    stages,
    isKnownProvider: (id) => ["gemini", "fake", "other"].includes(id),
  });
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("ConfigResolver.resolve", () => {
  it("falls back to built-ins for an empty document", () => {
    const config = resolverFor({}).resolve("analysis");

    expect(config).toEqual({
      stage: "analysis",
      provider: "gemini",
      generation: { model: null, temperature: 0.7, maxTokens: 8192 },
      retryCount: 2,
      timeoutSeconds: 120,
      backoffBaseMs: 1000,
      backoffMaxMs: 30000,
      required: true,
      fallbackMode: "halt-pipeline",
      defaultValue: "[unavailable]",
      options: {},
    });
  });

  it("prefers stage overrides, then defaults, then built-ins", () => {
    const resolver = resolverFor({
      defaults: { provider: "fake", temperature: 0.2, retryCount: 5 },
      stages: { research: { temperature: 0, required: false, retryCount: 0 } },
    });

    const research = resolver.resolve("research");
    expect(research.provider).toBe("fake");
    expect(research.generation.temperature).toBe(0);
    expect(research.retryCount).toBe(0);
    expect(research.required).toBe(false);
    expect(research.fallbackMode).toBe("skip");

    const analysis = resolver.resolve("analysis");
    expect(analysis.generation.temperature).toBe(0.2);
    expect(analysis.retryCount).toBe(5);

    expect(resolver.explain("research")).toEqual({
      provider: "defaults",
      model: "builtin",
      temperature: "stage",
      maxTokens: "builtin",
      retryCount: "stage",
      timeoutSeconds: "builtin",
      backoffBaseMs: "builtin",
      backoffMaxMs: "builtin",
      required: "stage",
      fallbackMode: "builtin",
      defaultValue: "builtin",
    });
  });

  it("lets an explicit null model override a default model", () => {
    const resolver = resolverFor({
      defaults: { model: "model-a" },
      stages: { assembly: { model: null } },
    });

    expect(resolver.resolve("analysis").generation.model).toBe("model-a");
    expect(resolver.resolve("assembly").generation.model).toBeNull();
    expect(resolver.explain("assembly").model).toBe("stage");
  });

  it("merges options shallowly", () => {
    const resolver = resolverFor({
      defaults: { options: { focus: "broad", depth: 1 } },
      stages: { research: { options: { focus: "narrow" } } },
    });

    expect(resolver.resolve("research").options).toEqual({ focus: "narrow", depth: 1 });
    expect(resolver.resolve("analysis").options).toEqual({ focus: "broad", depth: 1 });
  });

  it("freezes and memoizes the effective config", () => {
    const resolver = resolverFor({});
    const config = resolver.resolve("analysis");

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.generation)).toBe(true);
    expect(resolver.resolve("analysis")).toBe(config);
  });

  it("rejects an unknown provider, naming the layer it came from", () => {
    const resolver = resolverFor({ stages: { analysis: { provider: "nope" } } });

    expect(() => resolver.resolve("analysis")).toThrow(
      'Stage "analysis" references unknown provider "nope" (from stage)'
    );
  });

  it("rejects unregistered stages", () => {
    expect(() => resolverFor({}).resolve("ghost")).toThrow(ConfigError);
  });

  it("derives the retry policy", () => {
    const config = resolverFor({ defaults: { timeoutSeconds: 1.5, backoffBaseMs: 10, backoffMaxMs: 40 } }).resolve(
      "analysis"
    );

    expect(toRetryPolicy(config)).toEqual({ timeoutMs: 1500, retryCount: 2, baseDelayMs: 10, maxDelayMs: 40 });
  });
});

describe("ConfigResolver.resolutionOrder", () => {
  it("uses the explicit order, keeping the first of duplicates", () => {
    const resolver = resolverFor({ stageExecutionOrder: ["assembly", "analysis", "assembly"] });

    expect(resolver.resolutionOrder()).toEqual(["assembly", "analysis"]);
  });

  it("rejects unknown stages in the explicit order", () => {
    const err = caught(() => resolverFor({ stageExecutionOrder: ["analysis", "ghost"] }).resolutionOrder());

    expect(err).toBeInstanceOf(ConfigError);
    if (err instanceof ConfigError) {
      expect(err.issues).toEqual(['unknown stage "ghost"']);
    }
  });

  it("sorts by order hint, keeping registration order for ties", () => {
    const resolver = resolverFor({}, [descriptor("a", 30), descriptor("b"), descriptor("c", 10), descriptor("d")]);

    expect(resolver.resolutionOrder()).toEqual(["c", "a", "b", "d"]);
  });
});

describe("ConfigResolver.resolveAll", () => {
  it("returns every ordered config", () => {
    const { order, configs } = resolverFor({ defaults: { provider: "other" } }).resolveAll();

    expect(order).toEqual(["analysis", "research", "assembly"]);
    expect(Array.from(configs.values()).map((c) => c.provider)).toEqual(["other", "other", "other"]);
  });

  it("collects every problem into one ConfigError", () => {
    const err = caught(() =>
      resolverFor({
        stages: { analysis: { provider: "nope" }, assembly: { provider: "missing" } },
      }).resolveAll()
    );

    expect(err).toBeInstanceOf(ConfigError);
    if (err instanceof ConfigError) {
      expect(err.issues).toEqual([
        'Stage "analysis" references unknown provider "nope" (from stage)',
        'Stage "assembly" references unknown provider "missing" (from stage)',
      ]);
      expect(err.message.startsWith("Configuration is invalid")).toBe(true);
    }
  });
});
