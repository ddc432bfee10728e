import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { delimiter, join } from "node:path";

import { EnvironmentError } from "./errors.js";

export interface Tools {
  llc: string;
  cc: string;
}

/** C compilers tried in order */
export const compilers = ["gcc", "cc", "clang"] as const;

/**
 * Find an executable on `PATH`, like `which`
 */
export async function which(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | undefined> {
  const directories = (env.PATH ?? "").split(delimiter).filter(Boolean);
  const extensions =
    platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")]
      : [""];

  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = join(directory, name + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate `llc` and a C compiler, failing on the first one missing
 */
export async function locateTools(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<Tools> {
  const llc = await which("llc", env, platform);
  if (!llc) {
    throw new EnvironmentError("llc");
  }

  for (const compiler of compilers) {
    const cc = await which(compiler, env, platform);
    if (cc) {
      return { llc, cc };
    }
  }
  throw new EnvironmentError(compilers[0]);
}
