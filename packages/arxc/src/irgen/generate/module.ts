import type * as Ast from "#ast";
import * as Runtime from "#runtime";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { fromAstType, slotType } from "#irgen/type";

import { Process } from "./process.js";
import { buildFunction } from "./function.js";

/**
 * Build a module from a program.
 *
 * Every signature is registered before any body is lowered, so functions
 * may call each other regardless of their order in the program.
 */
export function* buildModule(program: Ast.Program): Process<void> {
  yield* Process.Modules.addType(Runtime.List);

  for (const decl of program.functions) {
    if (yield* Process.Modules.signature(decl.name)) {
      throw new IrgenError(
        ErrorCode.DUPLICATE_FUNCTION,
        decl.name,
        decl.loc ?? undefined,
      );
    }
    yield* Process.Modules.addSignature(decl.name, {
      parameters: decl.parameters.map((param) => slotType(param.type)),
      returnType: fromAstType(decl.returnType),
    });
  }

  for (const decl of program.functions) {
    const func = yield* buildFunction(decl);
    yield* Process.Modules.addFunction(func);
  }
}
