/**
 * Build one TextProvider per known preset.
 */

import { CommandTextProvider } from "./command-text-provider";
import { DryRunProvider } from "./dry-run-provider";
import {
  AnthropicTextProvider,
  GeminiTextProvider,
  OpenAiTextProvider,
} from "./http-text-provider";
import { PROVIDER_PRESETS } from "./provider-presets";
import { TextProvider } from "./text-provider";

export interface ProviderFactoryOptions {
  env?: NodeJS.ProcessEnv;
  /** Working directory for command providers */
  cwd?: string;
  /** Probe HTTP backends during validation */
  probe?: boolean;
}

export function createDefaultProviders(options: ProviderFactoryOptions = {}): TextProvider[] {
  const http = { env: options.env, probe: options.probe };
  const providers: TextProvider[] = [
    new GeminiTextProvider(http),
    new AnthropicTextProvider(http),
    new OpenAiTextProvider(http),
    new DryRunProvider(),
  ];

  for (const preset of PROVIDER_PRESETS) {
    if (preset.kind === "command") {
      providers.push(new CommandTextProvider(preset, { env: options.env, cwd: options.cwd }));
    }
  }
  return providers;
}
