/**
 * `stageline run` - executes the pipeline or validates its configuration.
 */

import * as fs from "fs";
import * as path from "path";
import chalk from "chalk";
import { Command } from "commander";
import {
  ConfigError,
  PipelineCancelledError,
  PipelineHaltedError,
} from "../core/errors/pipeline-errors";
import { PipelineSystem, PipelineSystemOptions, createPipelineSystem } from "../core/pipeline-system";
import { formatDegradations, formatEvent, formatValidation } from "./format";

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_HALTED = 2;
export const EXIT_CANCELLED = 130;

export interface CliIO {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export interface RunCommandOptions {
  config?: string;
  validate?: boolean;
  output?: string;
  redisUrl?: string;
}

export interface RunCommandContext {
  io: CliIO;
  cwd?: string;
  createSystem?: (options: PipelineSystemOptions) => PipelineSystem;
  /** Aborts the run, e.g. on SIGINT */
  signal?: AbortSignal;
  setExitCode(code: number): void;
}

export function registerRunCommand(program: Command, ctx: RunCommandContext): void {
  program
    .command("run")
    .description("Run the analysis pipeline over a description")
    .argument("<description>", "input written to the context under \"input\"")
    .option("-c, --config <path>", "configuration file")
    .option("--validate", "check configuration and providers without running any stage")
    .option("-o, --output <file>", "write the final context JSON to a file")
    .option("--redis-url <url>", "persist the stage cache in Redis")
    .action(async (description: string, options: RunCommandOptions) => {
      ctx.setExitCode(await executeRun(description, options, ctx));
    });
}

export async function executeRun(
  description: string,
  options: RunCommandOptions,
  ctx: RunCommandContext
): Promise<number> {
  const cwd = ctx.cwd ?? process.cwd();
  const create = ctx.createSystem ?? createPipelineSystem;
  const line = (text: string) => ctx.io.writeOut(`${text}\n`);
  const errorLine = (text: string) => ctx.io.writeErr(`${text}\n`);

  let system: PipelineSystem;
  try {
    system = create({ configPath: options.config, cwd, redisUrl: options.redisUrl });
  } catch (err) {
    if (err instanceof ConfigError) {
      errorLine(chalk.red(err.message));
      return EXIT_INVALID;
    }
    throw err;
  }

  try {
    if (options.validate) {
      const report = await system.orchestrator.validate();
      formatValidation(report).forEach(line);
      return report.ok ? EXIT_OK : EXIT_INVALID;
    }

    const unsubscribe = system.eventBus.subscribe((event) => {
      const text = formatEvent(event);
      if (text !== null) line(text);
    });
    try {
      const result = await system.orchestrator.run(description, { signal: ctx.signal });
      formatDegradations(result.degraded).forEach(line);

      const json = JSON.stringify(result.context.toJSON(), null, 2);
      if (options.output) {
        const target = path.resolve(cwd, options.output);
        fs.writeFileSync(target, `${json}\n`, "utf-8");
        line(`Context written to ${target}`);
      } else {
        line(json);
      }
      return EXIT_OK;
    } finally {
      unsubscribe();
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      errorLine(chalk.red(err.message));
      return EXIT_INVALID;
    }
    if (err instanceof PipelineHaltedError) {
      errorLine(chalk.red(`Pipeline halted at stage "${err.stageName}" (${err.failureKind}): ${err.reason}`));
      return EXIT_HALTED;
    }
    if (err instanceof PipelineCancelledError) {
      errorLine(chalk.yellow(err.message));
      return EXIT_CANCELLED;
    }
    throw err;
  } finally {
    await system.close();
  }
}
