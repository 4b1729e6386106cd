/**
 * StageLoader - discovers and loads STAGE.md files.
 *
 * Layout: <directory>/<name>/STAGE.md
 *
 * Each STAGE.md has YAML frontmatter with:
 *   - name (required): lowercase alphanumeric with single hyphens, equal to the directory
 *   - description (required)
 *   - outputKeys (required): non-empty list of context keys the stage owns
 *   - inputKeys (optional): inferred from the template when absent
 *   - order (optional): ordering hint
 *   - outputFormat (optional): text | json
 *
 * The markdown body is the prompt template.
 */

import * as fs from "fs";
import * as path from "path";
import matter from "gray-matter";
import { z } from "zod";
import { formatIssues } from "../config/config-schema";
import { PromptStageDefinition } from "./prompt-stage";

export const STAGE_FILE = "STAGE.md";

const STAGE_NAME_REGEX = /^[a-z0-9]+(-[a-z0-9]+)*$/;

const frontmatterSchema = z.object({
  name: z.string().regex(STAGE_NAME_REGEX, "must be lowercase alphanumeric with single hyphens"),
  description: z.string().min(1).max(1024),
  outputKeys: z.array(z.string().min(1)).min(1),
  inputKeys: z.array(z.string().min(1)).optional(),
  order: z.number().optional(),
  outputFormat: z.enum(["text", "json"]).optional(),
});

/**
 * Discover stages from directories in list order. Within a directory stage
 * folders are visited by sorted name; the first definition of a name wins.
 */
export function discoverStages(directories: string[]): PromptStageDefinition[] {
  const stages: PromptStageDefinition[] = [];
  const seen = new Set<string>();

  for (const dir of directories) {
    for (const stage of loadStagesFromDir(dir)) {
      if (seen.has(stage.name)) {
        console.warn(`[StageLoader] Stage "${stage.name}" in ${stage.source} is shadowed by an earlier definition`);
        continue;
      }
      seen.add(stage.name);
      stages.push(stage);
    }
  }

  return stages;
}

function loadStagesFromDir(dir: string): PromptStageDefinition[] {
  const stages: PromptStageDefinition[] = [];

  if (!fs.existsSync(dir)) {
    return stages;
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    console.warn(`[StageLoader] Cannot read ${dir}:`, err);
    return stages;
  }

  const names = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const name of names) {
    const stagePath = path.join(dir, name, STAGE_FILE);
    if (!fs.existsSync(stagePath)) continue;

    try {
      const stage = loadStageFile(stagePath, name);
      if (stage) {
        stages.push(stage);
      }
    } catch (err) {
      console.warn(`[StageLoader] Failed to load ${stagePath}:`, err);
    }
  }

  return stages;
}

/**
 * Load and parse a single STAGE.md file. Returns null when the frontmatter is
 * invalid or the name does not match the expected directory name.
 */
export function loadStageFile(
  filePath: string,
  expectedName?: string
): PromptStageDefinition | null {
  const raw = fs.readFileSync(filePath, "utf-8");
  const { data, content } = matter(raw);

  const parsed = frontmatterSchema.safeParse(data);
  if (!parsed.success) {
    console.warn(`[StageLoader] Invalid frontmatter in ${filePath}: ${formatIssues(parsed.error).join("; ")}`);
    return null;
  }
  const frontmatter = parsed.data;

  if (expectedName && frontmatter.name !== expectedName) {
    console.warn(
      `[StageLoader] Stage name "${frontmatter.name}" doesn't match directory "${expectedName}" in ${filePath}`
    );
    return null;
  }

  const template = content.trim();
  if (template.length === 0) {
    console.warn(`[StageLoader] Empty template in ${filePath}`);
    return null;
  }

  return {
    name: frontmatter.name,
    description: frontmatter.description,
    template,
    outputKeys: frontmatter.outputKeys,
    inputKeys: frontmatter.inputKeys,
    order: frontmatter.order,
    outputFormat: frontmatter.outputFormat,
    source: filePath,
  };
}
