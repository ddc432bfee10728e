/**
 * Parser for extern descriptor (`.map`) files
 *
 *     ; comment
 *     [meta]
 *     name = io
 *
 *     [functions]
 *     print:str = io_print_str > void
 *     read_line = io_read_line > str
 *
 * A function entry is `name[:tag,tag,...] = symbol > returnTag`; entries
 * sharing a name with different argument tags are overloads.
 */

import { Error as LinkageError, ErrorCode } from "./errors.js";
import { type Tag, parseTag } from "./tags.js";

export interface Descriptor {
  /** Path the descriptor was read from */
  file: string;
  /** Module name from the `meta` section */
  module: string;
  entries: Descriptor.Entry[];
}

export namespace Descriptor {
  export interface Entry {
    /** Unqualified function name */
    name: string;
    /** Argument tags, in order */
    arguments: Tag[];
    /** Target symbol in the module's C library */
    symbol: string;
    returns: Tag;
    line: number;
  }
}

type Section = "meta" | "functions";

const isSection = (name: string): name is Section =>
  name === "meta" || name === "functions";

/**
 * Parse descriptor text. Throws a linkage error on the first problem.
 */
export function parseDescriptor(text: string, file: string): Descriptor {
  let section: Section | undefined;
  let module: string | undefined;
  let sawMeta = false;
  const entries: Descriptor.Entry[] = [];

  const lines = text.split(/\r?\n/);
  for (const [index, raw] of lines.entries()) {
    const lineNumber = index + 1;
    const line = raw.trim();

    if (line === "" || line.startsWith(";") || line.startsWith("#")) {
      continue;
    }

    const header = /^\[(.*)\]$/.exec(line);
    if (header) {
      const name = header[1].trim();
      if (!isSection(name)) {
        throw new LinkageError(
          ErrorCode.UNKNOWN_SECTION,
          file,
          `[${name}]`,
          lineNumber,
        );
      }
      section = name;
      sawMeta ||= name === "meta";
      continue;
    }

    const equals = line.indexOf("=");
    if (equals === -1 || section === undefined) {
      throw new LinkageError(
        ErrorCode.MALFORMED_ENTRY,
        file,
        section === undefined
          ? `entry outside of a section: ${line}`
          : `expected key = value: ${line}`,
        lineNumber,
      );
    }

    const key = line.slice(0, equals).trim();
    const value = line.slice(equals + 1).trim();

    if (section === "meta") {
      if (key === "name") {
        module = value;
      }
      continue;
    }

    entries.push(parseEntry(key, value, file, lineNumber));
  }

  if (!sawMeta || !module) {
    throw new LinkageError(
      ErrorCode.MISSING_METADATA,
      file,
      sawMeta ? "no name in [meta]" : "no [meta] section",
    );
  }

  return { file, module, entries };
}

function parseEntry(
  key: string,
  value: string,
  file: string,
  line: number,
): Descriptor.Entry {
  const malformed = (message: string) =>
    new LinkageError(ErrorCode.MALFORMED_ENTRY, file, message, line);

  const colon = key.indexOf(":");
  const name = (colon === -1 ? key : key.slice(0, colon)).trim();
  if (name === "") {
    throw malformed("missing function name");
  }

  const argumentList = colon === -1 ? "" : key.slice(colon + 1).trim();
  const args =
    argumentList === "" ? [] : argumentList.split(",").map(parseTag);

  const arrow = value.indexOf(">");
  if (arrow === -1) {
    throw malformed(`no return type in "${value}"`);
  }

  const symbol = value.slice(0, arrow).trim();
  if (symbol === "") {
    throw malformed(`no target symbol for ${name}`);
  }

  return {
    name,
    arguments: args,
    symbol,
    returns: parseTag(value.slice(arrow + 1)),
    line,
  };
}
