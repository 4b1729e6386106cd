/**
 * PipelineSystem - wires configuration, stages, providers, cache and event
 * bus into a ready-to-run orchestrator.
 */

import * as path from "path";
import { loadConfig, LoadedConfig } from "./config/config-loader";
import { ConfigResolver } from "./config/config-resolver";
import { EventBus } from "./events/event-bus";
import { PipelineOrchestrator } from "./orchestrator/pipeline-orchestrator";
import { PipelineStage } from "./pipeline/pipeline-stage";
import { StageRegistry } from "./pipeline/stage-registry";
import { createDefaultProviders } from "./provider/provider-factory";
import { ProviderGateway, ProviderGatewayOptions } from "./provider/provider-gateway";
import { TextProvider } from "./provider/text-provider";
import { createRedisStageCache } from "./store/redis-stage-cache";
import { InMemoryStageCache, StageCache } from "./store/stage-cache";

export const DEFAULT_STAGE_DIRECTORIES = ["stages"];

export interface PipelineSystemOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Persist the stage cache in Redis instead of memory */
  redisUrl?: string;
  /** Let HTTP providers call their backend during validation */
  probe?: boolean;
  /** Replaces the default provider set */
  providers?: TextProvider[];
  /** Registered before any STAGE.md directory is scanned */
  stages?: PipelineStage[];
  /** Overrides `stageDirectories` from the configuration */
  stageDirectories?: string[];
  cache?: StageCache;
  gateway?: ProviderGatewayOptions;
}

export interface PipelineSystem {
  config: LoadedConfig;
  registry: StageRegistry;
  resolver: ConfigResolver;
  gateway: ProviderGateway;
  cache: StageCache;
  eventBus: EventBus;
  orchestrator: PipelineOrchestrator;
  close(): Promise<void>;
}

export function createPipelineSystem(options: PipelineSystemOptions = {}): PipelineSystem {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const config = loadConfig({ configPath: options.configPath, env, cwd });

  const providers = options.providers ?? createDefaultProviders({ env, cwd, probe: options.probe });
  const gateway = new ProviderGateway(providers, options.gateway);

  const registry = new StageRegistry(options.stages ?? []);
  const directories = (options.stageDirectories ?? config.document.stageDirectories ?? DEFAULT_STAGE_DIRECTORIES).map(
    (dir) => path.resolve(options.stageDirectories ? cwd : config.baseDir, dir)
  );
  registry.registerFromDirectories(directories);
  console.log(`[PipelineSystem] ${registry.names().length} stages registered: ${registry.names().join(", ")}`);

  const resolver = new ConfigResolver(config.document, {
    stages: registry.descriptors(),
    isKnownProvider: (id) => gateway.has(id),
  });

  let close = async (): Promise<void> => undefined;
  let cache: StageCache;
  if (options.cache) {
    cache = options.cache;
  } else if (options.redisUrl) {
    const redisCache = createRedisStageCache(options.redisUrl);
    cache = redisCache;
    close = () => redisCache.close();
  } else {
    cache = new InMemoryStageCache();
  }

  const eventBus = new EventBus();
  const orchestrator = new PipelineOrchestrator({ registry, resolver, gateway, cache, eventBus });

  return { config, registry, resolver, gateway, cache, eventBus, orchestrator, close };
}
