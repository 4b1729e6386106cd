/**
 * Locate an executable on PATH.
 */

import { promises as fs, constants } from "fs";
import * as path from "path";

export async function which(
  command: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  if (command.includes("/") || command.includes("\\")) {
    return (await isExecutable(command)) ? command : null;
  }

  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const extensions =
    process.platform === "win32"
      ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").concat([""])
      : [""];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, command + ext);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return false;
    await fs.access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
