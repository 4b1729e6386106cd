/**
 * HttpTextProvider - thin HTTP wrappers over hosted text-generation APIs.
 *
 * Uses Node 20's native fetch; no vendor SDKs. Supports Gemini, Anthropic and
 * OpenAI. Each provider reads its key from the environment entry named by its
 * preset.
 */

import { z } from "zod";
import {
  ProviderHttpError,
  ProviderTransientError,
  ProviderUnavailableError,
} from "../errors/pipeline-errors";
import { sanitizeForLogging } from "../utils/log-sanitizer";
import { ProviderPreset, getPresetById } from "./provider-presets";
import {
  GenerationParams,
  ProviderRequest,
  ProviderValidation,
  TextProvider,
  inspectCredential,
} from "./text-provider";

export interface HttpProviderOptions {
  /** Environment to read credentials from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Override the API base URL */
  baseUrl?: string;
  /** Hit the backend's model listing endpoint during validate() */
  probe?: boolean;
  /** Timeout for the validation probe */
  probeTimeoutMs?: number;
}

interface HttpCall {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export abstract class HttpTextProvider implements TextProvider {
  readonly id: string;
  protected readonly env: NodeJS.ProcessEnv;
  protected readonly baseUrl: string;

  constructor(
    protected readonly preset: ProviderPreset,
    defaultBaseUrl: string,
    protected readonly options: HttpProviderOptions = {}
  ) {
    this.id = preset.id;
    this.env = options.env ?? process.env;
    this.baseUrl = options.baseUrl ?? defaultBaseUrl;
  }

  async generate(request: ProviderRequest): Promise<string> {
    const apiKey = this.requireCredential();
    const model = request.params.model ?? this.preset.defaultModel ?? "";
    const call = this.buildCall(apiKey, model, request.prompt, request.params);

    const resp = await fetch(call.url, {
      method: "POST",
      headers: { "content-type": "application/json", ...call.headers },
      body: JSON.stringify(call.body),
      signal: request.signal,
    });

    if (!resp.ok) {
      throw new ProviderHttpError(this.id, resp.status, sanitizeForLogging(await resp.text()));
    }

    const text = this.extractText(await resp.json());
    if (text.trim().length === 0) {
      throw new ProviderTransientError(this.id, "Provider returned an empty completion");
    }
    return text;
  }

  async validate(): Promise<ProviderValidation> {
    const credentialEnv = this.preset.credentialEnv;
    const credential = inspectCredential(
      credentialEnv ? this.env[credentialEnv] : undefined,
      this.preset.credentialPrefix
    );
    const base = { providerId: this.id, credential, credentialEnv };

    if (credential !== "present") {
      return {
        ...base,
        ok: false,
        reachable: false,
        detail: `Credential ${credentialEnv} is ${credential}`,
      };
    }
    if (!this.options.probe) {
      return { ...base, ok: true, reachable: true, detail: "Credential present (not probed)" };
    }

    const apiKey = this.requireCredential();
    const probe = this.buildProbe(apiKey);
    try {
      const resp = await fetch(probe.url, {
        method: "GET",
        headers: probe.headers,
        signal: AbortSignal.timeout(this.options.probeTimeoutMs ?? 10_000),
      });
      return {
        ...base,
        ok: resp.ok,
        reachable: true,
        detail: resp.ok ? "Model listing succeeded" : `Model listing returned HTTP ${resp.status}`,
      };
    } catch (error) {
      return {
        ...base,
        ok: false,
        reachable: false,
        detail: `Backend unreachable: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  protected requireCredential(): string {
    const credentialEnv = this.preset.credentialEnv;
    const value = credentialEnv ? this.env[credentialEnv] : undefined;
    const status = inspectCredential(value, this.preset.credentialPrefix);
    if (status !== "present" || value === undefined) {
      throw new ProviderUnavailableError(this.id, `Credential ${credentialEnv} is ${status}`);
    }
    return value;
  }

  protected abstract buildCall(
    apiKey: string,
    model: string,
    prompt: string,
    params: GenerationParams
  ): HttpCall;

  protected abstract buildProbe(apiKey: string): { url: string; headers: Record<string, string> };

  protected abstract extractText(body: unknown): string;

  protected parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(
        this.id,
        `Unexpected response shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`
      );
    }
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// Gemini generateContent API
// ---------------------------------------------------------------------------

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
});

export class GeminiTextProvider extends HttpTextProvider {
  constructor(options?: HttpProviderOptions) {
    super(requirePreset("gemini"), "https://generativelanguage.googleapis.com/v1beta", options);
  }

  protected buildCall(apiKey: string, model: string, prompt: string, params: GenerationParams): HttpCall {
    return {
      url: `${this.baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
      headers: { "x-goog-api-key": apiKey },
      body: {
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: params.temperature,
          maxOutputTokens: params.maxTokens,
        },
      },
    };
  }

  protected buildProbe(apiKey: string) {
    return { url: `${this.baseUrl}/models`, headers: { "x-goog-api-key": apiKey } };
  }

  protected extractText(body: unknown): string {
    const data = this.parseBody(geminiResponseSchema, body);
    const parts = data.candidates?.[0]?.content?.parts ?? [];
    return parts.map((p) => p.text ?? "").join("");
  }
}

// ---------------------------------------------------------------------------
// Anthropic Messages API
// ---------------------------------------------------------------------------

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export class AnthropicTextProvider extends HttpTextProvider {
  constructor(options?: HttpProviderOptions) {
    super(requirePreset("anthropic"), "https://api.anthropic.com/v1", options);
  }

  protected buildCall(apiKey: string, model: string, prompt: string, params: GenerationParams): HttpCall {
    return {
      url: `${this.baseUrl}/messages`,
      headers: { "x-api-key": apiKey, "anthropic-version": "2023-06-01" },
      body: {
        model,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        messages: [{ role: "user", content: prompt }],
      },
    };
  }

  protected buildProbe(apiKey: string) {
    return {
      url: `${this.baseUrl}/models`,
      headers: { "x-api-key": apiKey, "anthropic-version": "2023-06-01" },
    };
  }

  protected extractText(body: unknown): string {
    const data = this.parseBody(anthropicResponseSchema, body);
    return data.content
      .filter((c) => c.type === "text")
      .map((c) => c.text ?? "")
      .join("");
  }
}

// ---------------------------------------------------------------------------
// OpenAI Chat Completions API
// ---------------------------------------------------------------------------

const openAiResponseSchema = z.object({
  choices: z.array(
    z.object({ message: z.object({ content: z.string().nullable().optional() }) })
  ),
});

export class OpenAiTextProvider extends HttpTextProvider {
  constructor(options?: HttpProviderOptions) {
    super(requirePreset("openai"), "https://api.openai.com/v1", options);
  }

  protected buildCall(apiKey: string, model: string, prompt: string, params: GenerationParams): HttpCall {
    return {
      url: `${this.baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${apiKey}` },
      body: {
        model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: params.maxTokens,
        temperature: params.temperature,
      },
    };
  }

  protected buildProbe(apiKey: string) {
    return { url: `${this.baseUrl}/models`, headers: { Authorization: `Bearer ${apiKey}` } };
  }

  protected extractText(body: unknown): string {
    const data = this.parseBody(openAiResponseSchema, body);
    return data.choices[0]?.message.content ?? "";
  }
}

function requirePreset(id: string): ProviderPreset {
  const preset = getPresetById(id);
  if (!preset) {
    throw new Error(`Unknown provider preset: ${id}`);
  }
  return preset;
}
