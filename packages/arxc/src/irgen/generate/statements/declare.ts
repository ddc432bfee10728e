import * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe, fromAstType, slotType } from "#irgen/type";

import { buildExpression, buildList } from "../expressions/index.js";
import { Process } from "../process.js";

/**
 * Build a typed declaration. The initializer is lowered before the name is
 * bound, so it still sees any earlier binding of the same name.
 */
export function* buildDeclarationStatement(
  stmt: Ast.Statement.Declare,
): Process<void> {
  const type = slotType(stmt.declaredType);

  const value =
    Ast.Type.isList(stmt.declaredType) &&
    stmt.initializer.type === "ListExpression"
      ? yield* buildList(
          stmt.initializer,
          fromAstType(stmt.declaredType.element),
        )
      : yield* buildExpression(stmt.initializer);

  if (!Ir.Type.equals(value.type, type)) {
    throw new IrgenError(
      ErrorCode.TYPE_MISMATCH,
      `cannot initialize ${describe(type)} ${stmt.name} with ${describe(value.type)}`,
      stmt.loc ?? undefined,
    );
  }

  const variable = yield* Process.Variables.declare(stmt.name, type, stmt.loc);
  yield* Process.Variables.store(variable, value, stmt.loc);
}
