/**
 * PromptStage - a stage defined by a prompt template.
 *
 * `{{ key }}` placeholders are filled from the shared context and
 * `{{ options.name }}` placeholders from the stage's effective options.
 */

import { createHash } from "crypto";
import { EffectiveStageConfig } from "../config/config-resolver";
import { StageOutputInvalidError } from "../errors/pipeline-errors";
import { JsonObject, JsonValue, canonicalJson, jsonValueSchema } from "../models/json";
import { ContextReader } from "../store/context-store";
import { sanitizeForLogging } from "../utils/log-sanitizer";
import { computeCacheKey } from "./cache-key";
import { PipelineStage, StageDescriptor, StageExecutionContext } from "./pipeline-stage";
import { ExecutionResult } from "./stage-result";

export const MISSING_VALUE_TEXT = "No information available.";

const PLACEHOLDER_REGEX = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;
const OPTIONS_PREFIX = "options.";
const JSON_FENCE_REGEX = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/;

export type StageOutputFormat = "text" | "json";

export interface PromptStageDefinition {
  name: string;
  description: string;
  template: string;
  outputKeys: string[];
  /** Defaults to the context keys the template references */
  inputKeys?: string[];
  order?: number;
  outputFormat?: StageOutputFormat;
  /** File the definition was loaded from */
  source?: string;
}

/**
 * Context keys referenced by a template, in first-use order.
 */
export function templatePlaceholders(template: string): string[] {
  const keys: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_REGEX)) {
    const key = match[1];
    if (key.startsWith(OPTIONS_PREFIX) || keys.includes(key)) continue;
    keys.push(key);
  }
  return keys;
}

function formatValue(value: JsonValue | undefined): string {
  if (value === undefined) return MISSING_VALUE_TEXT;
  if (typeof value === "string") return value;
  return JSON.stringify(value, null, 2);
}

export function renderTemplate(
  template: string,
  context: ContextReader,
  options: Readonly<JsonObject> = {}
): string {
  return template.replace(PLACEHOLDER_REGEX, (_match, key: string) => {
    if (key.startsWith(OPTIONS_PREFIX)) {
      const optionName = key.slice(OPTIONS_PREFIX.length);
      return formatValue(Object.prototype.hasOwnProperty.call(options, optionName) ? options[optionName] : undefined);
    }
    return formatValue(context.get(key));
  });
}

export class PromptStage implements PipelineStage {
  readonly descriptor: StageDescriptor;
  readonly outputFormat: StageOutputFormat;
  /** Stage name plus a digest of everything that shapes the request and its projection */
  readonly identity: string;

  constructor(private readonly definition: PromptStageDefinition) {
    if (definition.outputKeys.length === 0) {
      throw new Error(`Stage "${definition.name}" declares no output keys`);
    }
    this.outputFormat = definition.outputFormat ?? "text";
    this.descriptor = {
      name: definition.name,
      description: definition.description,
      outputKeys: [...definition.outputKeys],
      inputKeys: definition.inputKeys
        ? [...definition.inputKeys]
        : templatePlaceholders(definition.template),
      order: definition.order,
    };
    const digest = createHash("sha256")
      .update(canonicalJson({ template: definition.template, outputFormat: this.outputFormat }))
      .digest("hex");
    this.identity = `${definition.name}@${digest}`;
  }

  get template(): string {
    return this.definition.template;
  }

  get source(): string | undefined {
    return this.definition.source;
  }

  cacheKey(context: ContextReader, config: EffectiveStageConfig): string {
    return computeCacheKey(this.identity, config, context, this.descriptor.inputKeys);
  }

  buildRequest(context: ContextReader, config: EffectiveStageConfig): string {
    return renderTemplate(this.definition.template, context, config.options);
  }

  async execute(ctx: StageExecutionContext): Promise<ExecutionResult> {
    const request = this.buildRequest(ctx.context, ctx.config);
    console.log(
      `[PromptStage] ${this.descriptor.name} request via ${ctx.config.provider}: ${sanitizeForLogging(request, 120)}`
    );
    return ctx.generate(request);
  }

  project(rawOutput: string, _config: EffectiveStageConfig): Record<string, JsonValue> {
    const trimmed = rawOutput.trim();
    if (trimmed.length === 0) {
      throw new StageOutputInvalidError(this.descriptor.name, "output is empty");
    }

    const value = this.outputFormat === "json" ? this.parseJson(trimmed) : trimmed;
    const writes: Record<string, JsonValue> = {};
    for (const key of this.descriptor.outputKeys) {
      writes[key] = value;
    }
    return writes;
  }

  private parseJson(text: string): JsonValue {
    const fenced = JSON_FENCE_REGEX.exec(text);
    const body = fenced ? fenced[1] : text;
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new StageOutputInvalidError(
        this.descriptor.name,
        `expected JSON output: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    const checked = jsonValueSchema.safeParse(parsed);
    if (!checked.success) {
      throw new StageOutputInvalidError(this.descriptor.name, "expected JSON output");
    }
    return checked.data;
  }
}
