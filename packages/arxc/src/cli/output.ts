import { writeFile } from "node:fs/promises";

import type { ArxcError } from "#errors";

import { formatError, formatWarning } from "./error-formatter.js";

export function displayErrors(errors: readonly ArxcError[]): void {
  for (const error of errors) {
    console.error(formatError(error));
  }
}

export function displayWarnings(warnings: readonly ArxcError[]): void {
  for (const warning of warnings) {
    console.warn(formatWarning(warning));
  }
}

/**
 * Write to a file when one is given, otherwise to stdout
 */
export async function writeOutput(text: string, path?: string): Promise<void> {
  if (path) {
    await writeFile(path, text, "utf8");
  } else {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  }
}

export function exitWithError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}
