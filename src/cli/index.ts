#!/usr/bin/env node
import chalk from "chalk";
import { createCliProgram } from "./program";

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    process.stderr.write(chalk.yellow("\nInterrupted, cancelling run...\n"));
    controller.abort(new Error("Interrupted"));
  });

  const program = createCliProgram({
    io: {
      writeOut: (text) => process.stdout.write(text),
      writeErr: (text) => process.stderr.write(text),
    },
    signal: controller.signal,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(chalk.red("✗"), err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
