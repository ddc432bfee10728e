import type { Program } from "#ast";
import type { Pass } from "#compiler";

import type { Error } from "./errors.js";
import { loadExterns } from "./resolver.js";
import type { Table } from "./table.js";

/**
 * Linkage pass - loads the overload table for `core` and every module the
 * program requests
 */
const pass: Pass<{
  needs: {
    ast: Program;
    searchPaths: readonly string[];
  };
  adds: {
    externs: Table;
  };
  error: Error;
}> = {
  name: "linkage",
  async run({ ast, searchPaths }) {
    const result = await loadExterns({ searchPaths, modules: ast.modules });
    if (!result.success) {
      return result;
    }
    return { ...result, value: { externs: result.value } };
  },
};

export default pass;
