import { Command } from "commander";
import { RunCommandContext, registerRunCommand } from "./run-command";

export const CLI_VERSION = "0.1.0";

export function createCliProgram(ctx: RunCommandContext): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (str) => ctx.io.writeOut(str),
    writeErr: (str) => ctx.io.writeErr(str),
  });

  program
    .name("stageline")
    .description("Run a configurable chain of LLM analysis stages over a shared context")
    .version(CLI_VERSION);

  registerRunCommand(program, ctx);
  return program;
}
