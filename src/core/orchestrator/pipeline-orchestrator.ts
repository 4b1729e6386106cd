/**
 * PipelineOrchestrator - runs registered stages in resolved order over a
 * shared context.
 *
 * ## Per-stage flow
 * ```
 * pending
 *   → cache_hit → succeeded
 *   → invoking  → succeeded
 *               → failed_recovered   (fallback applied, run continues)
 *               → failed_halted      (required + halt-pipeline, run stops)
 * ```
 *
 * Stages only read a snapshot and return raw output; every context write and
 * cache write happens here, one atomic commit per stage.
 */

import { v4 as uuidv4 } from "uuid";
import { ConfigResolver, EffectiveStageConfig, toRetryPolicy } from "../config/config-resolver";
import {
  ConfigError,
  PipelineCancelledError,
  PipelineHaltedError,
  StageFailureKind,
  StageOutputInvalidError,
  errorMessage,
} from "../errors/pipeline-errors";
import { EventBus, PipelineEventType } from "../events/event-bus";
import { JsonValue } from "../models/json";
import { PipelineStage } from "../pipeline/pipeline-stage";
import { StageRegistry } from "../pipeline/stage-registry";
import {
  AppliedFallback,
  DegradationRecord,
  ExecutionResult,
  FailedExecutionResult,
  StageReport,
  StageState,
} from "../pipeline/stage-result";
import { classifyFailure } from "../provider/failure-classifier";
import { ProviderGateway } from "../provider/provider-gateway";
import { ProviderValidation } from "../provider/text-provider";
import { CacheEntry, StageCache } from "../store/stage-cache";
import { ContextSnapshot, ContextStore, INPUT_KEY, PIPELINE_PRODUCER } from "../store/context-store";
import { sanitizeForLogging } from "../utils/log-sanitizer";

export interface PipelineOrchestratorOptions {
  registry: StageRegistry;
  resolver: ConfigResolver;
  gateway: ProviderGateway;
  cache: StageCache;
  eventBus?: EventBus;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Defaults to a fresh UUID */
  runId?: string;
}

export interface PipelineRunResult {
  runId: string;
  context: ContextStore;
  stages: StageReport[];
  degraded: DegradationRecord[];
}

export interface StageValidation {
  stageName: string;
  ok: boolean;
  provider?: string;
  error?: string;
}

export interface ValidationReport {
  ok: boolean;
  order: string[];
  stages: StageValidation[];
  providers: ProviderValidation[];
  /** Problems not tied to a single stage */
  errors: string[];
}

interface StageRun {
  runId: string;
  stage: PipelineStage;
  config: EffectiveStageConfig;
  context: ContextStore;
  signal: AbortSignal;
  startedAt: number;
}

export class PipelineOrchestrator {
  readonly eventBus: EventBus;
  private readonly registry: StageRegistry;
  private readonly resolver: ConfigResolver;
  private readonly gateway: ProviderGateway;
  private readonly cache: StageCache;

  constructor(options: PipelineOrchestratorOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.gateway = options.gateway;
    this.cache = options.cache;
    this.eventBus = options.eventBus ?? new EventBus();
  }

  /**
   * Execute the pipeline once.
   *
   * @throws ConfigError before any provider call when configuration is invalid
   * @throws PipelineHaltedError when a required halt-pipeline stage fails
   * @throws PipelineCancelledError when the signal aborts
   */
  async run(initialInput: JsonValue, options: RunOptions = {}): Promise<PipelineRunResult> {
    const runId = options.runId ?? uuidv4();
    const signal = options.signal ?? new AbortController().signal;

    const { order, configs } = this.resolver.resolveAll();
    const conflicts = this.outputKeyConflicts(order);
    if (conflicts.length > 0) {
      throw new ConfigError("Stages write overlapping context keys", conflicts);
    }
    const context = new ContextStore();
    context.declareOwner(INPUT_KEY, PIPELINE_PRODUCER);
    const stages = order.map((name) => this.requireStage(name));
    for (const stage of stages) {
      for (const key of stage.descriptor.outputKeys) {
        context.declareOwner(key, stage.descriptor.name);
      }
    }
    context.set(INPUT_KEY, initialInput, PIPELINE_PRODUCER);

    console.log(`[PipelineOrchestrator] Run ${runId} starting: ${order.join(" → ") || "(no stages)"}`);
    this.eventBus.emit({ type: PipelineEventType.RUN_STARTED, runId, stageOrder: order, timestamp: new Date() });

    const reports: StageReport[] = [];
    const degraded: DegradationRecord[] = [];

    try {
      for (const stage of stages) {
        if (signal.aborted) {
          throw new PipelineCancelledError(`Run cancelled before stage "${stage.descriptor.name}"`);
        }
        const config = this.configFor(configs, stage.descriptor.name);
        const report = await this.runStage({
          runId,
          stage,
          config,
          context,
          signal,
          startedAt: Date.now(),
        });
        reports.push(report);
        if (report.degradation) {
          degraded.push(report.degradation);
        }
      }
    } catch (err) {
      if (err instanceof PipelineCancelledError) {
        err.context = context;
        console.warn(`[PipelineOrchestrator] Run ${runId} cancelled: ${err.message}`);
        this.eventBus.emit({
          type: PipelineEventType.RUN_CANCELLED,
          runId,
          stageOrder: order,
          reason: err.message,
          timestamp: new Date(),
        });
      } else if (err instanceof PipelineHaltedError) {
        console.error(`[PipelineOrchestrator] Run ${runId} halted at "${err.stageName}" (${err.failureKind})`);
        this.eventBus.emit({
          type: PipelineEventType.RUN_HALTED,
          runId,
          stageOrder: order,
          stageName: err.stageName,
          reason: err.reason,
          timestamp: new Date(),
        });
      }
      throw err;
    }

    console.log(
      `[PipelineOrchestrator] Run ${runId} completed: ${reports.length} stages, ${degraded.length} degraded`
    );
    this.eventBus.emit({ type: PipelineEventType.RUN_COMPLETED, runId, stageOrder: order, timestamp: new Date() });

    return { runId, context, stages: reports, degraded };
  }

  /**
   * Check order, per-stage configuration and every distinct provider without
   * executing any stage.
   */
  async validate(): Promise<ValidationReport> {
    const errors: string[] = [];
    let order: string[];
    try {
      order = this.resolver.resolutionOrder();
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      return { ok: false, order: [], stages: [], providers: [], errors: [err.message] };
    }

    const stages: StageValidation[] = [];
    const providerIds: string[] = [];
    for (const name of order) {
      try {
        const config = this.resolver.resolve(name);
        stages.push({ stageName: name, ok: true, provider: config.provider });
        if (!providerIds.includes(config.provider)) {
          providerIds.push(config.provider);
        }
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        stages.push({ stageName: name, ok: false, error: err.message });
      }
    }

    errors.push(...this.outputKeyConflicts(order));

    const providers: ProviderValidation[] = [];
    for (const providerId of providerIds) {
      providers.push(await this.gateway.validateProvider(providerId));
    }
    for (const stage of stages) {
      const provider = providers.find((p) => p.providerId === stage.provider);
      if (stage.ok && provider && !provider.ok) {
        stage.ok = false;
        stage.error = `Provider "${provider.providerId}" failed validation: ${provider.detail}`;
      }
    }

    return {
      ok: errors.length === 0 && stages.every((s) => s.ok) && providers.every((p) => p.ok),
      order,
      stages,
      providers,
      errors,
    };
  }

  private async runStage(run: StageRun): Promise<StageReport> {
    const { stage, config, context } = run;
    const name = stage.descriptor.name;

    this.transition(run, "pending");
    const snapshot = context.snapshot();
    const cacheKey = stage.cacheKey(snapshot, config);

    const cached = await this.lookupCache(cacheKey);
    if (cached) {
      this.transition(run, "cache_hit", { cacheKey });
      const writtenKeys = this.commitOutput(stage, config, context, cached.output);
      if (writtenKeys) {
        this.transition(run, "succeeded", { cacheKey, attempts: 0 });
        return this.report(run, "succeeded", { cacheKey, cacheHit: true, attempts: 0, writtenKeys });
      }
      console.warn(`[PipelineOrchestrator] Cached output for "${name}" no longer projects, invoking provider`);
    }

    this.transition(run, "invoking", { cacheKey });
    const result = await this.executeStage(run, snapshot);

    if (result.type === "success") {
      try {
        const writes = stage.project(result.output, config);
        const writtenKeys = context.commit(name, writes);
        await this.storeCache(cacheKey, name, result.output);
        this.transition(run, "succeeded", { cacheKey, attempts: result.attempts });
        return this.report(run, "succeeded", { cacheKey, cacheHit: false, attempts: result.attempts, writtenKeys });
      } catch (err) {
        if (!(err instanceof StageOutputInvalidError)) throw err;
        return this.recover(run, cacheKey, {
          type: "terminal_failure",
          kind: "stage_output_invalid",
          reason: err.message,
          attempts: result.attempts,
        });
      }
    }

    return this.recover(run, cacheKey, result);
  }

  /**
   * Run the stage body. A stage that throws instead of returning a failure is
   * treated as a terminal failure of the classified kind.
   */
  private async executeStage(run: StageRun, snapshot: ContextSnapshot): Promise<ExecutionResult> {
    const { stage, config, signal } = run;
    try {
      return await stage.execute({
        runId: run.runId,
        context: snapshot,
        config,
        signal,
        generate: (request) =>
          this.gateway.execute(config.provider, request, config.generation, toRetryPolicy(config), signal),
      });
    } catch (err) {
      if (err instanceof PipelineCancelledError) throw err;
      if (signal.aborted) {
        throw new PipelineCancelledError(`Run cancelled during stage "${stage.descriptor.name}"`, { cause: err });
      }
      const failure = classifyFailure(err);
      return ExecutionResult.TerminalFailure(failure.kind, failure.reason, 1);
    }
  }

  /**
   * Apply the stage's fallback policy to a failure.
   */
  private async recover(run: StageRun, cacheKey: string, failure: FailedExecutionResult): Promise<StageReport> {
    const { stage, config, context } = run;
    const name = stage.descriptor.name;

    if (config.required && config.fallbackMode === "halt-pipeline") {
      this.transition(run, "failed_halted", {
        cacheKey,
        attempts: failure.attempts,
        failureKind: failure.kind,
        reason: failure.reason,
      });
      console.error(`[PipelineOrchestrator] Required stage "${name}" failed (${failure.kind}): ${sanitizeForLogging(failure.reason)}`);
      throw new PipelineHaltedError(name, failure.kind, failure.reason, context);
    }

    let applied: AppliedFallback = "skip";
    let writtenKeys: string[] = [];

    switch (config.fallbackMode) {
      case "use-cache": {
        const previous = await this.latestCached(name);
        const committed = previous ? this.commitOutput(stage, config, context, previous.output) : null;
        if (committed) {
          applied = "use-cache";
          writtenKeys = committed;
        }
        break;
      }
      case "use-default-value": {
        const writes: Record<string, JsonValue> = {};
        for (const key of stage.descriptor.outputKeys) {
          writes[key] = config.defaultValue;
        }
        writtenKeys = context.commit(name, writes);
        applied = "use-default-value";
        break;
      }
      case "skip":
      case "halt-pipeline":
        // an optional stage configured to halt degrades as skip
        break;
    }

    const degradation: DegradationRecord = {
      stageName: name,
      kind: failure.kind,
      reason: failure.reason,
      fallback: config.fallbackMode,
      appliedFallback: applied,
    };
    console.warn(
      `[PipelineOrchestrator] Stage "${name}" degraded (${failure.kind}, ${applied}): ${sanitizeForLogging(failure.reason)}`
    );
    this.transition(run, "failed_recovered", {
      cacheKey,
      attempts: failure.attempts,
      failureKind: failure.kind,
      reason: failure.reason,
      appliedFallback: applied,
    });

    return this.report(run, "failed_recovered", {
      cacheKey,
      cacheHit: false,
      attempts: failure.attempts,
      writtenKeys,
      degradation,
    });
  }

  /**
   * Project and commit raw output. Returns null when the output no longer
   * projects (e.g. a stale cache entry).
   */
  private commitOutput(
    stage: PipelineStage,
    config: EffectiveStageConfig,
    context: ContextStore,
    output: string
  ): string[] | null {
    let writes: Record<string, JsonValue>;
    try {
      writes = stage.project(output, config);
    } catch (err) {
      if (err instanceof StageOutputInvalidError) return null;
      throw err;
    }
    return context.commit(stage.descriptor.name, writes);
  }

  private async lookupCache(cacheKey: string): Promise<CacheEntry | undefined> {
    try {
      return await this.cache.lookup(cacheKey);
    } catch (err) {
      console.warn(`[PipelineOrchestrator] Cache lookup failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async latestCached(stageName: string): Promise<CacheEntry | undefined> {
    try {
      return await this.cache.latestFor(stageName);
    } catch (err) {
      console.warn(`[PipelineOrchestrator] Cache read for "${stageName}" failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async storeCache(cacheKey: string, stageName: string, output: string): Promise<void> {
    try {
      await this.cache.store(cacheKey, stageName, output);
    } catch (err) {
      console.warn(`[PipelineOrchestrator] Cache store for "${stageName}" failed: ${errorMessage(err)}`);
    }
  }

  private transition(
    run: StageRun,
    state: StageState,
    details: {
      cacheKey?: string;
      attempts?: number;
      failureKind?: StageFailureKind;
      reason?: string;
      appliedFallback?: AppliedFallback;
    } = {}
  ): void {
    this.eventBus.emit({
      type: PipelineEventType.STAGE_TRANSITION,
      runId: run.runId,
      stageName: run.stage.descriptor.name,
      state,
      elapsedMs: Date.now() - run.startedAt,
      ...details,
      timestamp: new Date(),
    });
  }

  private report(
    run: StageRun,
    state: StageState,
    fields: Omit<StageReport, "stageName" | "state" | "elapsedMs">
  ): StageReport {
    return {
      stageName: run.stage.descriptor.name,
      state,
      elapsedMs: Date.now() - run.startedAt,
      ...fields,
    };
  }

  private outputKeyConflicts(order: string[]): string[] {
    const conflicts: string[] = [];
    const owners = new Map<string, string>([[INPUT_KEY, PIPELINE_PRODUCER]]);
    for (const name of order) {
      for (const key of this.requireStage(name).descriptor.outputKeys) {
        const owner = owners.get(key);
        if (owner !== undefined && owner !== name) {
          conflicts.push(`Output key "${key}" is claimed by both "${owner}" and "${name}"`);
        } else {
          owners.set(key, name);
        }
      }
    }
    return conflicts;
  }

  private requireStage(name: string): PipelineStage {
    const stage = this.registry.get(name);
    if (!stage) {
      throw new ConfigError(`Stage "${name}" is not registered`);
    }
    return stage;
  }

  private configFor(configs: Map<string, EffectiveStageConfig>, name: string): EffectiveStageConfig {
    const config = configs.get(name);
    if (!config) {
      throw new ConfigError(`Stage "${name}" has no resolved configuration`);
    }
    return config;
  }
}
