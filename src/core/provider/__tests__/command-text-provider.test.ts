import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CommandTextProvider } from "../command-text-provider";
import { ProviderPreset, getPresetById, resolveCommand } from "../provider-presets";
import { ProviderUnavailableError } from "../../errors/pipeline-errors";

function preset(id: string): ProviderPreset {
  const found = getPresetById(id);
  if (!found) throw new Error(`missing preset ${id}`);
  return found;
}

describe("CommandTextProvider", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stageline-bin-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("resolves the binary from its override variable", () => {
    expect(resolveCommand(preset("claude-cli"), {})).toBe("claude");
    expect(resolveCommand(preset("claude-cli"), { CLAUDE_BIN: "/opt/claude" })).toBe("/opt/claude");
  });

  it("reports a command missing from PATH", async () => {
    const provider = new CommandTextProvider(preset("gemini-cli"), { env: { PATH: dir } });

    await expect(provider.validate()).resolves.toEqual({
      providerId: "gemini-cli",
      ok: false,
      credential: "not-required",
      reachable: false,
      detail: 'Command "gemini" not found on PATH',
    });
  });

  it("finds an executable given by the override", async () => {
    const bin = path.join(dir, "gemini-wrapper");
    fs.writeFileSync(bin, "#!/bin/sh\n", { mode: 0o755 });
    const provider = new CommandTextProvider(preset("gemini-cli"), { env: { PATH: "", GEMINI_BIN: bin } });

    const report = await provider.validate();

    expect(report.ok).toBe(true);
    expect(report.detail).toBe(`Found ${bin}`);
  });

  it("fails as unavailable when the binary does not exist", async () => {
    const missing = path.join(dir, "no-such-cli");
    const provider = new CommandTextProvider(preset("gemini-cli"), { env: { GEMINI_BIN: missing } });

    const attempt = provider.generate({
      prompt: "hello",
      params: { model: null, temperature: 0.7, maxTokens: 100 },
      signal: new AbortController().signal,
    });

    await expect(attempt).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(attempt).rejects.toThrow(`[gemini-cli] Command "${missing}" is not installed or not executable`);
  });
});
