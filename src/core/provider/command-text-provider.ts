/**
 * CommandTextProvider - runs a locally installed CLI as a text provider.
 *
 * The prompt is piped on stdin and stdout is the completion. The process is
 * killed when the attempt's signal aborts (timeout or run cancellation).
 */

import { spawn } from "child_process";
import {
  ProviderTransientError,
  ProviderUnavailableError,
} from "../errors/pipeline-errors";
import { sanitizeForLogging } from "../utils/log-sanitizer";
import { which } from "../utils/which";
import { ProviderPreset, resolveCommand } from "./provider-presets";
import { ProviderRequest, ProviderValidation, TextProvider } from "./text-provider";

const TRANSIENT_STDERR = /rate.?limit|\b429\b|quota|timed? ?out|overloaded|temporarily unavailable/i;

export interface CommandProviderOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export class CommandTextProvider implements TextProvider {
  readonly id: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly preset: ProviderPreset,
    private readonly options: CommandProviderOptions = {}
  ) {
    this.id = preset.id;
    this.env = options.env ?? process.env;
  }

  get command(): string {
    return resolveCommand(this.preset, this.env);
  }

  generate(request: ProviderRequest): Promise<string> {
    const command = this.command;
    const args = [...(this.preset.args ?? [])];
    if (request.params.model && this.preset.modelFlag) {
      args.push(this.preset.modelFlag, request.params.model);
    }

    return new Promise<string>((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ["pipe", "pipe", "pipe"],
        cwd: this.options.cwd,
        env: { ...this.env, NODE_NO_READLINE: "1" },
      });

      let stdout = "";
      let stderr = "";
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        request.signal.removeEventListener("abort", onAbort);
        fn();
      };

      const onAbort = () => {
        child.kill("SIGTERM");
        settle(() => reject(request.signal.reason));
      };
      if (request.signal.aborted) {
        onAbort();
        return;
      }
      request.signal.addEventListener("abort", onAbort, { once: true });

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (err: NodeJS.ErrnoException) => {
        settle(() => {
          if (err.code === "ENOENT" || err.code === "EACCES") {
            reject(
              new ProviderUnavailableError(this.id, `Command "${command}" is not installed or not executable`, {
                cause: err,
              })
            );
          } else {
            reject(err);
          }
        });
      });

      child.on("close", (code) => {
        settle(() => {
          if (code === 0) {
            if (stdout.trim().length === 0) {
              reject(new ProviderTransientError(this.id, "Command produced no output"));
            } else {
              resolve(stdout);
            }
            return;
          }
          const detail = `"${command}" exited with code ${code}: ${sanitizeForLogging(stderr.trim())}`;
          reject(
            TRANSIENT_STDERR.test(stderr)
              ? new ProviderTransientError(this.id, detail)
              : new ProviderUnavailableError(this.id, detail)
          );
        });
      });

      // EPIPE when the CLI exits before reading stdin surfaces via "close"
      child.stdin.on("error", () => undefined);
      child.stdin.end(request.prompt);
    });
  }

  async validate(): Promise<ProviderValidation> {
    const command = this.command;
    const found = await which(command, this.env);
    return {
      providerId: this.id,
      ok: found !== null,
      credential: "not-required",
      reachable: found !== null,
      detail: found ? `Found ${found}` : `Command "${command}" not found on PATH`,
    };
  }
}
