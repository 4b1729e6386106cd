/**
 * Shape of the configuration document.
 *
 * ```json
 * {
 *   "defaults": { "provider": "gemini", "retryCount": 2 },
 *   "stages": { "research": { "required": false, "fallbackMode": "skip" } },
 *   "stageExecutionOrder": ["analysis", "research", "assembly"],
 *   "stageDirectories": ["stages"]
 * }
 * ```
 */

import { z } from "zod";
import { jsonValueSchema } from "../models/json";

export const FALLBACK_MODES = ["use-cache", "use-default-value", "skip", "halt-pipeline"] as const;

/** Longest delay a Node timer honours; larger values fire after 1 ms */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Settings accepted both in `defaults` and in `stages[name]`. Every key is
 * optional: an absent key falls through to the next layer.
 */
export const stageSettingsSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1).nullable(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    retryCount: z.number().int().min(0),
    timeoutSeconds: z.number().positive().max(Math.floor(MAX_TIMER_MS / 1000)),
    backoffBaseMs: z.number().int().min(0).max(MAX_TIMER_MS),
    backoffMaxMs: z.number().int().min(0).max(MAX_TIMER_MS),
    required: z.boolean(),
    fallbackMode: z.enum(FALLBACK_MODES),
    defaultValue: z.string(),
    options: z.record(jsonValueSchema),
  })
  .partial()
  .strict();

export const configDocumentSchema = z.object({
  defaults: stageSettingsSchema.optional(),
  stages: z.record(stageSettingsSchema).optional(),
  stageExecutionOrder: z.array(z.string().min(1)).optional(),
  stageDirectories: z.array(z.string().min(1)).optional(),
});

export type StageSettings = z.infer<typeof stageSettingsSchema>;

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
