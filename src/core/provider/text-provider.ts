/**
 * TextProvider - base interface for all text-generation backends.
 *
 * Providers are modeled uniformly regardless of backend: each accepts a text
 * request plus generation parameters and returns raw text or throws. The
 * gateway never interprets the returned text.
 */

export interface GenerationParams {
  /** Model name, or null for the provider's default model */
  model: string | null;
  temperature: number;
  maxTokens: number;
}

export interface ProviderRequest {
  prompt: string;
  params: GenerationParams;
  /** Aborted when the attempt times out or the run is cancelled */
  signal: AbortSignal;
}

export type CredentialStatus = "present" | "missing" | "malformed" | "not-required";

/**
 * Result of a cheap reachability/credential check. Never carries the
 * credential itself.
 */
export interface ProviderValidation {
  providerId: string;
  ok: boolean;
  credential: CredentialStatus;
  /** Name of the environment entry the credential is read from */
  credentialEnv?: string;
  reachable: boolean;
  detail: string;
}

export interface TextProvider {
  /** Identifier referenced by the configuration document */
  readonly id: string;

  /**
   * Generate text for a request.
   *
   * Throws ProviderUnavailableError / ProviderTransientError / ProviderHttpError
   * so the gateway can classify the failure.
   */
  generate(request: ProviderRequest): Promise<string>;

  /**
   * Check credential presence and backend reachability without a generation call.
   */
  validate(): Promise<ProviderValidation>;
}

/**
 * Check that a credential looks plausible: long enough, no whitespace, and
 * carrying the expected prefix when the backend has one.
 */
export function inspectCredential(
  value: string | undefined,
  expectedPrefix?: string
): CredentialStatus {
  if (value === undefined || value.length === 0) return "missing";
  if (value.length < 16 || /\s/.test(value)) return "malformed";
  if (expectedPrefix && !value.startsWith(expectedPrefix)) return "malformed";
  return "present";
}
