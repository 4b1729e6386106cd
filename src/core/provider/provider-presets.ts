/**
 * Provider Presets
 *
 * Well-known text-generation backends with the environment entries that carry
 * their credentials and, for command-line backends, how to invoke them.
 */

export type ProviderKind = "http" | "command" | "dry-run";

export interface ProviderPreset {
  /** Identifier referenced from the configuration document */
  id: string;
  /** Human-readable display name */
  name: string;
  kind: ProviderKind;
  description: string;
  /** Environment entry holding the API key (http providers) */
  credentialEnv?: string;
  /** Prefix a well-formed key starts with */
  credentialPrefix?: string;
  /** Model used when the stage config leaves `model` null */
  defaultModel?: string;
  /** CLI command to execute (command providers) */
  command?: string;
  /** Command-line arguments; the prompt is written to stdin */
  args?: readonly string[];
  /** Flag used to pass a non-default model to the CLI */
  modelFlag?: string;
  /** Environment variable overriding the binary path */
  envBinOverride?: string;
}

export const PROVIDER_PRESETS: readonly ProviderPreset[] = [
  {
    id: "gemini",
    name: "Google Gemini",
    kind: "http",
    description: "Gemini generateContent API",
    credentialEnv: "GEMINI_API_KEY",
    defaultModel: "gemini-2.0-flash",
  },
  {
    id: "anthropic",
    name: "Anthropic",
    kind: "http",
    description: "Anthropic Messages API",
    credentialEnv: "ANTHROPIC_API_KEY",
    credentialPrefix: "sk-ant-",
    defaultModel: "claude-3-5-sonnet-latest",
  },
  {
    id: "openai",
    name: "OpenAI",
    kind: "http",
    description: "OpenAI Chat Completions API",
    credentialEnv: "OPENAI_API_KEY",
    credentialPrefix: "sk-",
    defaultModel: "gpt-4o-mini",
  },
  {
    id: "gemini-cli",
    name: "Gemini CLI",
    kind: "command",
    description: "Google Gemini CLI, prompt piped on stdin",
    command: "gemini",
    args: [],
    modelFlag: "--model",
    envBinOverride: "GEMINI_BIN",
  },
  {
    id: "claude-cli",
    name: "Claude Code CLI",
    kind: "command",
    description: "Anthropic Claude Code in print mode, prompt piped on stdin",
    command: "claude",
    args: ["-p"],
    modelFlag: "--model",
    envBinOverride: "CLAUDE_BIN",
  },
  {
    id: "dry-run",
    name: "Dry Run",
    kind: "dry-run",
    description: "Returns the formatted request without calling any backend",
  },
];

export function getPresetById(id: string): ProviderPreset | undefined {
  return PROVIDER_PRESETS.find((p) => p.id === id);
}

/**
 * Resolve the binary for a command preset.
 * Checks the environment variable override first, then falls back to the default command.
 */
export function resolveCommand(
  preset: ProviderPreset,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (preset.envBinOverride) {
    const envValue = env[preset.envBinOverride];
    if (envValue) return envValue;
  }
  return preset.command ?? preset.id;
}
