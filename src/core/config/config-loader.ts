/**
 * Configuration loading.
 *
 * Candidate paths, first existing wins: explicit path > STAGELINE_CONFIG >
 * ./stageline.config.json. With no file at all every setting falls through to
 * the built-in layer.
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "../errors/pipeline-errors";
import { ConfigDocument, configDocumentSchema, formatIssues } from "./config-schema";

export const DEFAULT_CONFIG_FILE = "stageline.config.json";

export interface LoadedConfig {
  document: ConfigDocument;
  /** File the document came from, or null when built-ins only */
  source: string | null;
  /** Directory relative paths in the document resolve against */
  baseDir: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.configPath) {
    const explicit = path.resolve(cwd, options.configPath);
    if (!fs.existsSync(explicit)) {
      throw new ConfigError(`Configuration file not found: ${explicit}`);
    }
    return readConfigFile(explicit);
  }

  const candidates = [env.STAGELINE_CONFIG, DEFAULT_CONFIG_FILE]
    .filter((p): p is string => typeof p === "string" && p.length > 0)
    .map((p) => path.resolve(cwd, p));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return readConfigFile(candidate);
    }
  }

  console.log("[ConfigLoader] No configuration file found, using built-in settings");
  return { document: {}, source: null, baseDir: cwd };
}

export function readConfigFile(filePath: string): LoadedConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file: ${filePath}`, [], { cause: err });
  }
  return {
    document: parseConfigDocument(raw, filePath),
    source: filePath,
    baseDir: path.dirname(filePath),
  };
}

/**
 * Parse and validate a configuration document.
 */
export function parseConfigDocument(raw: string, source: string = "<inline>"): ConfigDocument {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Malformed JSON in configuration file ${source}: ${err instanceof Error ? err.message : String(err)}`,
      [],
      { cause: err }
    );
  }

  const parsed = configDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}
