import type { Program } from "#ast";
import type * as Ir from "#ir";
import type { Table } from "#linkage";
import { Result } from "#result";
import type { Pass } from "#compiler";

import type { Error } from "./errors.js";
import { generateModule } from "./generator.js";

/**
 * IR generation pass - lowers the AST to basic-block IR, resolving
 * qualified calls through the extern table
 */
const pass: Pass<{
  needs: {
    ast: Program;
    externs: Table;
    target?: string;
  };
  adds: {
    ir: Ir.Module;
  };
  error: Error;
}> = {
  name: "irgen",
  async run({ ast, externs, target }) {
    const result = generateModule(ast, { externs, target });
    return Result.map(result, (ir) => ({ ir }));
  },
};

export default pass;
