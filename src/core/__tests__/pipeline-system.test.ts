/**
 * End-to-end wiring: configuration file + STAGE.md directory + dry-run provider
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createPipelineSystem } from "../pipeline-system";
import { ConfigError } from "../errors/pipeline-errors";
import { ScriptedProvider } from "./fakes";

describe("createPipelineSystem", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stageline-system-"));
    fs.mkdirSync(path.join(dir, "stages", "echo"), { recursive: true });
    fs.writeFileSync(
      path.join(dir, "stages", "echo", "STAGE.md"),
      "---\nname: echo\ndescription: Echoes the input\noutputKeys: [echo]\n---\nEcho {{ input }}\n"
    );
    fs.mkdirSync(path.join(dir, "extra", "shout"), { recursive: true });
    fs.writeFileSync(
      path.join(dir, "extra", "shout", "STAGE.md"),
      "---\nname: shout\ndescription: Shouts\noutputKeys: [shout]\n---\nSHOUT {{ input }}\n"
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): void {
    fs.writeFileSync(path.join(dir, "stageline.config.json"), JSON.stringify(content));
  }

  it("loads stages from the configured directories and runs them", async () => {
    writeConfig({ defaults: { provider: "dry-run" } });
    const system = createPipelineSystem({ cwd: dir, env: {} });

    const result = await system.orchestrator.run("hello");
    await system.close();

    expect(system.registry.names()).toEqual(["echo"]);
    expect(system.config.source).toBe(path.join(dir, "stageline.config.json"));
    expect(result.context.get("echo")).toBe("[dry-run] Echo hello");
  });

  it("registers the default provider set", () => {
    writeConfig({});
    const system = createPipelineSystem({ cwd: dir, env: {} });

    expect(system.gateway.listProviders()).toEqual([
      "gemini",
      "anthropic",
      "openai",
      "dry-run",
      "gemini-cli",
      "claude-cli",
    ]);
  });

  it("accepts injected providers and stage directories", async () => {
    writeConfig({ defaults: { provider: "fake" }, stageDirectories: ["missing"] });
    const fake = new ScriptedProvider("fake", "LOUD");
    const system = createPipelineSystem({ cwd: dir, env: {}, providers: [fake], stageDirectories: ["extra"] });

    const result = await system.orchestrator.run("hello");

    expect(system.registry.names()).toEqual(["shout"]);
    expect(fake.prompts).toEqual(["SHOUT hello"]);
    expect(result.context.get("shout")).toBe("LOUD");
  });

  it("surfaces configuration errors from the file", () => {
    fs.writeFileSync(path.join(dir, "stageline.config.json"), "{ broken");

    expect(() => createPipelineSystem({ cwd: dir, env: {} })).toThrow(ConfigError);
  });
});
