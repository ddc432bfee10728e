import type * as Ast from "#ast";
import * as Runtime from "#runtime";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe, slotType } from "#irgen/type";

import { buildExpression, buildList } from "../expressions/index.js";
import { Process } from "../process.js";

/**
 * Build a list declaration. A literal initializer is allocated with the
 * declared element type; any other initializer is bound with its own
 * type, which must be a list.
 */
export function* buildListDeclarationStatement(
  stmt: Ast.Statement.DeclareList,
): Process<void> {
  const value =
    stmt.initializer.type === "ListExpression"
      ? yield* buildList(stmt.initializer, slotType(stmt.elementType))
      : yield* buildExpression(stmt.initializer);

  if (!Runtime.isList(value.type)) {
    throw new IrgenError(
      ErrorCode.TYPE_MISMATCH,
      `cannot initialize list ${stmt.name} with ${describe(value.type)}`,
      stmt.loc ?? undefined,
    );
  }

  const variable = yield* Process.Variables.declare(
    stmt.name,
    value.type,
    stmt.loc,
  );
  yield* Process.Variables.store(variable, value, stmt.loc);
}
