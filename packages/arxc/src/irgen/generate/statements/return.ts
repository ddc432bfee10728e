import type * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe } from "#irgen/type";

import { buildExpression } from "../expressions/index.js";
import { Process } from "../process.js";

/**
 * Build `return value` or a bare `return`
 */
export function* buildReturnStatement(
  stmt: Ast.Statement.Return,
): Process<void> {
  const { name, returnType } = yield* Process.Functions.current();
  const loc = stmt.loc ?? undefined;

  if (!stmt.value) {
    if (returnType.kind !== "void") {
      throw new IrgenError(
        ErrorCode.INVALID_RETURN,
        `${name} must return ${describe(returnType)}`,
        loc,
      );
    }
    return yield* Process.Blocks.ret(undefined, stmt.loc);
  }

  if (returnType.kind === "void") {
    throw new IrgenError(
      ErrorCode.INVALID_RETURN,
      `void function ${name} cannot return a value`,
      loc,
    );
  }

  const value = yield* buildExpression(stmt.value);
  if (!Ir.Type.equals(value.type, returnType)) {
    throw new IrgenError(
      ErrorCode.TYPE_MISMATCH,
      `${name} returns ${describe(returnType)}, found ${describe(value.type)}`,
      loc,
    );
  }

  yield* Process.Blocks.ret(value, stmt.loc);
}
