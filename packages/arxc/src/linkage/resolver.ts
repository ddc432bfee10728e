import { readFile } from "node:fs/promises";

import { glob } from "glob";

import { Result } from "#result";

import { type Descriptor, parseDescriptor } from "./descriptor.js";
import { Error as LinkageError, ErrorCode } from "./errors.js";
import { Table } from "./table.js";

export interface LoadOptions {
  /** Directories searched for `*.map` descriptors, in order */
  searchPaths: readonly string[];
  /** Requested extern modules; `core` is always loaded */
  modules: readonly string[];
}

/**
 * Build the extern overload table from every relevant descriptor found on
 * the search paths. Any descriptor error fails the whole load.
 */
export async function loadExterns(
  options: LoadOptions,
): Promise<Result<Table, LinkageError>> {
  const wanted = new Set(["core", ...options.modules]);
  let table = Table.empty;
  const warnings: LinkageError[] = [];

  try {
    for (const directory of options.searchPaths) {
      for (const file of await discover(directory)) {
        const descriptor = await readDescriptor(file);
        if (!wanted.has(descriptor.module)) {
          continue;
        }
        const merged = Table.merge(table, descriptor);
        table = merged.table;
        warnings.push(...merged.warnings);
      }
    }
  } catch (error) {
    if (error instanceof LinkageError) {
      return Result.err(error);
    }
    throw error;
  }

  return Result.okWith(table, warnings);
}

/**
 * Descriptor files directly inside a directory, sorted by path
 */
async function discover(directory: string): Promise<string[]> {
  const files = await glob("*.map", {
    cwd: directory,
    absolute: true,
    nodir: true,
  });
  return files.sort();
}

async function readDescriptor(file: string): Promise<Descriptor> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LinkageError(ErrorCode.UNREADABLE_FILE, file, reason);
  }
  return parseDescriptor(text, file);
}
