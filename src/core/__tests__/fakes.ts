/**
 * In-process stand-ins shared by the test suites.
 */

import { SleepFn } from "../provider/provider-gateway";
import { ProviderRequest, ProviderValidation, TextProvider } from "../provider/text-provider";

export type Reply = string | Error | ((request: ProviderRequest) => Promise<string>);

/**
 * Replies are consumed in order; the last one repeats forever.
 */
export class ScriptedProvider implements TextProvider {
  readonly requests: ProviderRequest[] = [];
  private readonly replies: Reply[];

  constructor(
    readonly id: string,
    replies: Reply | Reply[],
    private readonly validation: Partial<ProviderValidation> = {}
  ) {
    this.replies = Array.isArray(replies) ? [...replies] : [replies];
  }

  get callCount(): number {
    return this.requests.length;
  }

  get prompts(): string[] {
    return this.requests.map((r) => r.prompt);
  }

  async generate(request: ProviderRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error(`No reply scripted for ${this.id}`);
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(request);
    return reply;
  }

  async validate(): Promise<ProviderValidation> {
    return {
      providerId: this.id,
      ok: true,
      credential: "not-required",
      reachable: true,
      detail: "scripted",
      ...this.validation,
    };
  }
}

/**
 * Sleep that resolves immediately and records the requested delays.
 */
export function recordingSleep(): { sleep: SleepFn; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

/**
 * A generate() that settles only when its signal aborts.
 */
export function hangUntilAborted(request: ProviderRequest): Promise<string> {
  return new Promise<string>((_, reject) => {
    request.signal.addEventListener("abort", () => reject(request.signal.reason), { once: true });
  });
}
