import type { Descriptor } from "./descriptor.js";
import { Error as LinkageError, ErrorCode } from "./errors.js";
import { Severity } from "#result";
import type { Tag } from "./tags.js";

/**
 * Extern overload table: qualified `module.function` names to their
 * overloads, keyed by argument tags joined with `,`
 */
export interface Table {
  /** Modules whose descriptors were loaded, in load order */
  readonly modules: readonly string[];
  readonly functions: ReadonlyMap<string, ReadonlyMap<string, Table.Overload>>;
}

export namespace Table {
  export interface Overload {
    symbol: string;
    arguments: Tag[];
    returns: Tag;
  }

  export type Resolution =
    | { kind: "found"; overload: Overload }
    | { kind: "not-found" }
    | { kind: "no-match"; candidates: string[] };

  export const empty: Table = { modules: [], functions: new Map() };

  export const key = (tags: readonly Tag[]): string => tags.join(",");

  export const qualify = (module: string, name: string): string =>
    `${module}.${name}`;

  /**
   * Add a descriptor's entries to a table. Entries replace earlier ones
   * with the same qualified name and argument tags; each replacement is
   * reported as a warning.
   */
  export function merge(
    table: Table,
    descriptor: Descriptor,
  ): { table: Table; warnings: LinkageError[] } {
    const functions = new Map(table.functions);
    const warnings: LinkageError[] = [];

    for (const entry of descriptor.entries) {
      const name = qualify(descriptor.module, entry.name);
      const overloads = new Map(functions.get(name) ?? []);
      const signature = key(entry.arguments);

      const previous = overloads.get(signature);
      if (previous) {
        warnings.push(
          new LinkageError(
            ErrorCode.OVERLOAD_REPLACED,
            descriptor.file,
            `${name}(${signature}) now maps to ${entry.symbol} instead of ${previous.symbol}`,
            entry.line,
            Severity.Warning,
          ),
        );
      }

      overloads.set(signature, {
        symbol: entry.symbol,
        arguments: entry.arguments,
        returns: entry.returns,
      });
      functions.set(name, overloads);
    }

    const modules = table.modules.includes(descriptor.module)
      ? table.modules
      : [...table.modules, descriptor.module];

    return { table: { modules, functions }, warnings };
  }

  /**
   * Find the overload of a qualified name for the given argument tags
   */
  export function resolve(
    table: Table,
    name: string,
    tags: readonly Tag[],
  ): Resolution {
    const overloads = table.functions.get(name);
    if (!overloads) {
      return { kind: "not-found" };
    }
    const overload = overloads.get(key(tags));
    if (!overload) {
      return { kind: "no-match", candidates: [...overloads.keys()] };
    }
    return { kind: "found", overload };
  }
}
