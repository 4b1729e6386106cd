/**
 * ConfigResolver - resolves effective per-stage settings and stage order.
 *
 * ## Precedence (highest to lowest)
 * 1. `stages[name]` override
 * 2. `defaults` block
 * 3. built-in constant
 *
 * Absence at a layer falls through silently. The built-in layer is total, so
 * every (stage, setting) pair resolves to a defined value.
 */

import { ConfigError } from "../errors/pipeline-errors";
import { JsonObject, deepFreeze } from "../models/json";
import { StageDescriptor } from "../pipeline/pipeline-stage";
import { FallbackMode } from "../pipeline/stage-result";
import { GenerationParams } from "../provider/text-provider";
import { RetryPolicy } from "../provider/provider-gateway";
import { ConfigDocument, StageSettings } from "./config-schema";

/** Marks a setting a layer does not define. Distinct from 0, false, "" and null. */
export const UNSET: unique symbol = Symbol("unset");
export type Unset = typeof UNSET;

export type SettingSource = "stage" | "defaults" | "builtin";

export interface EffectiveStageConfig {
  readonly stage: string;
  readonly provider: string;
  readonly generation: Readonly<GenerationParams>;
  readonly retryCount: number;
  readonly timeoutSeconds: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
  readonly required: boolean;
  readonly fallbackMode: FallbackMode;
  readonly defaultValue: string;
  readonly options: Readonly<JsonObject>;
}

export type SettingName =
  | "provider"
  | "model"
  | "temperature"
  | "maxTokens"
  | "retryCount"
  | "timeoutSeconds"
  | "backoffBaseMs"
  | "backoffMaxMs"
  | "required"
  | "fallbackMode"
  | "defaultValue";

export const BUILTIN_SETTINGS = {
  provider: "gemini",
  model: null,
  temperature: 0.7,
  maxTokens: 8192,
  retryCount: 2,
  timeoutSeconds: 120,
  backoffBaseMs: 1000,
  backoffMaxMs: 30_000,
  required: true,
  defaultValue: "[unavailable]",
} as const;

/**
 * Built-in fallback mode depends on `required`: a required stage halts, an
 * optional one is skipped.
 */
export function builtinFallbackMode(required: boolean): FallbackMode {
  return required ? "halt-pipeline" : "skip";
}

interface Resolved<T> {
  value: T;
  source: SettingSource;
}

function layerValue<T>(value: T | undefined): T | Unset {
  return value === undefined ? UNSET : value;
}

/**
 * Resolve one setting through the three layers.
 */
export function resolveSetting<T>(
  stageValue: T | Unset,
  defaultsValue: T | Unset,
  builtin: T
): Resolved<T> {
  if (stageValue !== UNSET) return { value: stageValue, source: "stage" };
  if (defaultsValue !== UNSET) return { value: defaultsValue, source: "defaults" };
  return { value: builtin, source: "builtin" };
}

export interface ConfigResolverOptions {
  /** Registered stages, in registration order */
  stages: StageDescriptor[];
  /** Whether the provider gateway recognizes an identifier */
  isKnownProvider: (providerId: string) => boolean;
}

export interface ResolvedPipeline {
  order: string[];
  configs: Map<string, EffectiveStageConfig>;
}

export class ConfigResolver {
  private readonly stages: StageDescriptor[];
  private readonly registered: Set<string>;
  private readonly isKnownProvider: (providerId: string) => boolean;
  private readonly cache = new Map<string, EffectiveStageConfig>();

  constructor(
    private readonly document: ConfigDocument,
    options: ConfigResolverOptions
  ) {
    this.stages = [...options.stages];
    this.registered = new Set(this.stages.map((s) => s.name));
    this.isKnownProvider = options.isKnownProvider;
  }

  /**
   * Stage names in execution order.
   *
   * @throws ConfigError if the explicit order names an unregistered stage
   */
  resolutionOrder(): string[] {
    const explicit = this.document.stageExecutionOrder;
    if (explicit) {
      const unknown = explicit.filter((name) => !this.registered.has(name));
      if (unknown.length > 0) {
        throw new ConfigError(
          "stageExecutionOrder references unregistered stages",
          unknown.map((name) => `unknown stage "${name}"`)
        );
      }
      const seen = new Set<string>();
      const order: string[] = [];
      for (const name of explicit) {
        if (seen.has(name)) {
          console.warn(`[ConfigResolver] Ignoring duplicate "${name}" in stageExecutionOrder`);
          continue;
        }
        seen.add(name);
        order.push(name);
      }
      return order;
    }

    // Array.prototype.sort is stable: ties keep registration order
    return this.stages
      .map((stage, index) => ({ stage, index }))
      .sort((a, b) => {
        const byHint = (a.stage.order ?? Infinity) - (b.stage.order ?? Infinity);
        if (byHint !== 0 && !Number.isNaN(byHint)) return byHint;
        return a.index - b.index;
      })
      .map(({ stage }) => stage.name);
  }

  /**
   * Effective configuration for one stage. Computed once, then frozen.
   *
   * @throws ConfigError for unregistered stages and unknown providers
   */
  resolve(stageName: string): EffectiveStageConfig {
    const cached = this.cache.get(stageName);
    if (cached) return cached;

    if (!this.registered.has(stageName)) {
      throw new ConfigError(`Stage "${stageName}" is not registered`);
    }

    const resolved = this.resolveLayers(stageName);
    const provider = resolved.provider.value;
    if (!this.isKnownProvider(provider)) {
      throw new ConfigError(
        `Stage "${stageName}" references unknown provider "${provider}" (from ${resolved.provider.source})`
      );
    }

    const config: EffectiveStageConfig = deepFreeze({
      stage: stageName,
      provider,
      generation: {
        model: resolved.model.value,
        temperature: resolved.temperature.value,
        maxTokens: resolved.maxTokens.value,
      },
      retryCount: resolved.retryCount.value,
      timeoutSeconds: resolved.timeoutSeconds.value,
      backoffBaseMs: resolved.backoffBaseMs.value,
      backoffMaxMs: resolved.backoffMaxMs.value,
      required: resolved.required.value,
      fallbackMode: resolved.fallbackMode.value,
      defaultValue: resolved.defaultValue.value,
      options: {
        ...(this.document.defaults?.options ?? {}),
        ...(this.stageLayer(stageName)?.options ?? {}),
      },
    });

    this.cache.set(stageName, config);
    return config;
  }

  /**
   * Resolve the order and every ordered stage up front, collecting all
   * problems into a single ConfigError.
   */
  resolveAll(): ResolvedPipeline {
    const order = this.resolutionOrder();
    const configs = new Map<string, EffectiveStageConfig>();
    const issues: string[] = [];

    for (const name of order) {
      try {
        configs.set(name, this.resolve(name));
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        issues.push(err.message);
      }
    }
    if (issues.length > 0) {
      throw new ConfigError("Configuration is invalid", issues);
    }

    for (const name of Object.keys(this.document.stages ?? {})) {
      if (!this.registered.has(name)) {
        console.warn(`[ConfigResolver] Overrides for unregistered stage "${name}" are ignored`);
      }
    }

    return { order, configs };
  }

  /**
   * Which layer each setting of a stage came from.
   */
  explain(stageName: string): Record<SettingName, SettingSource> {
    const resolved = this.resolveLayers(stageName);
    return {
      provider: resolved.provider.source,
      model: resolved.model.source,
      temperature: resolved.temperature.source,
      maxTokens: resolved.maxTokens.source,
      retryCount: resolved.retryCount.source,
      timeoutSeconds: resolved.timeoutSeconds.source,
      backoffBaseMs: resolved.backoffBaseMs.source,
      backoffMaxMs: resolved.backoffMaxMs.source,
      required: resolved.required.source,
      fallbackMode: resolved.fallbackMode.source,
      defaultValue: resolved.defaultValue.source,
    };
  }

  private stageLayer(stageName: string): StageSettings | undefined {
    return this.document.stages?.[stageName];
  }

  private resolveLayers(stageName: string) {
    const stage: StageSettings = this.stageLayer(stageName) ?? {};
    const defaults: StageSettings = this.document.defaults ?? {};

    const required = resolveSetting(
      layerValue(stage.required),
      layerValue(defaults.required),
      BUILTIN_SETTINGS.required
    );

    return {
      provider: resolveSetting(layerValue(stage.provider), layerValue(defaults.provider), BUILTIN_SETTINGS.provider),
      model: resolveSetting<string | null>(
        layerValue(stage.model),
        layerValue(defaults.model),
        BUILTIN_SETTINGS.model
      ),
      temperature: resolveSetting(layerValue(stage.temperature), layerValue(defaults.temperature), BUILTIN_SETTINGS.temperature),
      maxTokens: resolveSetting(layerValue(stage.maxTokens), layerValue(defaults.maxTokens), BUILTIN_SETTINGS.maxTokens),
      retryCount: resolveSetting(layerValue(stage.retryCount), layerValue(defaults.retryCount), BUILTIN_SETTINGS.retryCount),
      timeoutSeconds: resolveSetting(
        layerValue(stage.timeoutSeconds),
        layerValue(defaults.timeoutSeconds),
        BUILTIN_SETTINGS.timeoutSeconds
      ),
      backoffBaseMs: resolveSetting(
        layerValue(stage.backoffBaseMs),
        layerValue(defaults.backoffBaseMs),
        BUILTIN_SETTINGS.backoffBaseMs
      ),
      backoffMaxMs: resolveSetting(
        layerValue(stage.backoffMaxMs),
        layerValue(defaults.backoffMaxMs),
        BUILTIN_SETTINGS.backoffMaxMs
      ),
      required,
      fallbackMode: resolveSetting<FallbackMode>(
        layerValue(stage.fallbackMode),
        layerValue(defaults.fallbackMode),
        builtinFallbackMode(required.value)
      ),
      defaultValue: resolveSetting(
        layerValue(stage.defaultValue),
        layerValue(defaults.defaultValue),
        BUILTIN_SETTINGS.defaultValue
      ),
    };
  }
}

/**
 * Plain JSON form of an effective config, used as cache-key material.
 */
export function effectiveConfigToJson(config: EffectiveStageConfig): JsonObject {
  return {
    stage: config.stage,
    provider: config.provider,
    generation: {
      model: config.generation.model,
      temperature: config.generation.temperature,
      maxTokens: config.generation.maxTokens,
    },
    retryCount: config.retryCount,
    timeoutSeconds: config.timeoutSeconds,
    backoffBaseMs: config.backoffBaseMs,
    backoffMaxMs: config.backoffMaxMs,
    required: config.required,
    fallbackMode: config.fallbackMode,
    defaultValue: config.defaultValue,
    options: { ...config.options },
  };
}

/**
 * Retry policy the gateway applies for a stage.
 */
export function toRetryPolicy(config: EffectiveStageConfig): RetryPolicy {
  return {
    timeoutMs: config.timeoutSeconds * 1000,
    retryCount: config.retryCount,
    baseDelayMs: config.backoffBaseMs,
    maxDelayMs: config.backoffMaxMs,
  };
}
