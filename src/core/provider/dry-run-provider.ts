/**
 * DryRunProvider - echoes the formatted request back as the completion.
 *
 * Lets a configuration be exercised end to end without credentials.
 */

import { ProviderRequest, ProviderValidation, TextProvider } from "./text-provider";

export class DryRunProvider implements TextProvider {
  readonly id = "dry-run";

  async generate(request: ProviderRequest): Promise<string> {
    return `[dry-run] ${request.prompt}`;
  }

  async validate(): Promise<ProviderValidation> {
    return {
      providerId: this.id,
      ok: true,
      credential: "not-required",
      reachable: true,
      detail: "No backend is called",
    };
  }
}
