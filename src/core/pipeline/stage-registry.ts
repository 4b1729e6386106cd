/**
 * StageRegistry - runtime registry of pipeline stages, in registration order.
 */

import { PipelineStage, StageDescriptor } from "./pipeline-stage";
import { PromptStage } from "./prompt-stage";
import { discoverStages, loadStageFile } from "./stage-loader";

export class StageRegistry {
  private stages = new Map<string, PipelineStage>();

  constructor(initialStages: PipelineStage[] = []) {
    for (const stage of initialStages) {
      this.register(stage);
    }
  }

  /**
   * Register a stage. Names are unique.
   */
  register(stage: PipelineStage): void {
    const name = stage.descriptor.name;
    if (this.stages.has(name)) {
      throw new Error(`Stage "${name}" is already registered`);
    }
    this.stages.set(name, stage);
  }

  get(name: string): PipelineStage | undefined {
    return this.stages.get(name);
  }

  has(name: string): boolean {
    return this.stages.has(name);
  }

  list(): PipelineStage[] {
    return Array.from(this.stages.values());
  }

  descriptors(): StageDescriptor[] {
    return this.list().map((s) => s.descriptor);
  }

  names(): string[] {
    return Array.from(this.stages.keys());
  }

  /**
   * Register every STAGE.md found in the directories. Names already
   * registered programmatically take precedence.
   */
  registerFromDirectories(directories: string[]): PipelineStage[] {
    const added: PipelineStage[] = [];
    for (const definition of discoverStages(directories)) {
      if (this.stages.has(definition.name)) {
        console.warn(`[StageRegistry] Keeping registered stage "${definition.name}", ignoring ${definition.source}`);
        continue;
      }
      const stage = new PromptStage(definition);
      this.register(stage);
      added.push(stage);
    }
    return added;
  }

  /**
   * Register a stage from a STAGE.md path
   */
  registerFromFile(filePath: string): PipelineStage | null {
    const definition = loadStageFile(filePath);
    if (!definition) return null;
    const stage = new PromptStage(definition);
    this.register(stage);
    return stage;
  }
}
