/**
 * Cache-key construction for stages.
 */

import { createHash } from "crypto";
import { EffectiveStageConfig, effectiveConfigToJson } from "../config/config-resolver";
import { JsonObject, canonicalJson } from "../models/json";
import { ContextReader } from "../store/context-store";

/**
 * SHA-256 over the canonical JSON of the stage identity, its effective config
 * and the current values of its interesting input keys (null when absent).
 */
export function computeCacheKey(
  stageIdentity: string,
  config: EffectiveStageConfig,
  context: ContextReader,
  inputKeys: string[]
): string {
  const inputs: JsonObject = {};
  for (const key of inputKeys) {
    inputs[key] = context.get(key) ?? null;
  }
  const material: JsonObject = {
    stage: stageIdentity,
    config: effectiveConfigToJson(config),
    inputs,
  };
  return createHash("sha256").update(canonicalJson(material)).digest("hex");
}
