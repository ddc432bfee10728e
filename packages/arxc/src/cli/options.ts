import { delimiter, resolve } from "node:path";

import type { OptionConfig } from "./cli-base.js";

export const emitTargets = ["ir", "llvm", "exe"] as const;

export type Emit = (typeof emitTargets)[number];

export const isEmit = (value: unknown): value is Emit =>
  emitTargets.some((target) => target === value);

/** Environment variable listing extra descriptor directories */
export const MAP_PATH_VARIABLE = "ARXC_MAP_PATH";

export const compileOptions: Record<string, OptionConfig> = {
  emit: {
    type: "string",
    default: "llvm",
    placeholder: "ir|llvm|exe",
    description: "What to produce",
  },
  output: {
    type: "string",
    short: "o",
    placeholder: "file",
    description: "Write IR to a file instead of stdout",
  },
  "lib-path": {
    type: "string",
    short: "L",
    multiple: true,
    placeholder: "dir",
    description: "Directory of extern descriptors (repeatable)",
  },
  "c-lib": {
    type: "string",
    placeholder: "dir",
    description: "Directory of extern C sources (default: ./c_lib)",
  },
  "build-dir": {
    type: "string",
    placeholder: "dir",
    description: "Directory for intermediate files (default: ./build)",
  },
  "out-dir": {
    type: "string",
    placeholder: "dir",
    description: "Directory for the executable (default: ./out)",
  },
  target: {
    type: "string",
    placeholder: "triple",
    description: "Target triple",
  },
};

export function parseEmit(value: string | undefined): Emit {
  const emit = value ?? "llvm";
  if (!isEmit(emit)) {
    throw new Error(
      `Invalid --emit value "${emit}"; expected one of ${emitTargets.join(", ")}`,
    );
  }
  return emit;
}

/**
 * Descriptor directories: `--lib-path` values (or `<cwd>/c_map`), then
 * every entry of `ARXC_MAP_PATH`
 */
export function resolveSearchPaths(options: {
  libPaths: readonly string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}): string[] {
  const { libPaths, cwd, env } = options;
  const explicit =
    libPaths.length > 0
      ? libPaths.map((path) => resolve(cwd, path))
      : [resolve(cwd, "c_map")];
  const fromEnv = (env[MAP_PATH_VARIABLE] ?? "")
    .split(delimiter)
    .filter(Boolean)
    .map((path) => resolve(cwd, path));

  return [...new Set([...explicit, ...fromEnv])];
}
