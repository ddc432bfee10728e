import type * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe } from "#irgen/type";

import { buildExpression } from "../expressions/index.js";
import { Process } from "../process.js";

/**
 * Build an assignment to an existing binding; types must match exactly
 */
export function* buildAssignmentStatement(
  stmt: Ast.Statement.Assign,
): Process<void> {
  const variable = yield* Process.Variables.resolve(stmt.name, stmt.loc);
  const value = yield* buildExpression(stmt.value);

  if (!Ir.Type.equals(value.type, variable.type)) {
    throw new IrgenError(
      ErrorCode.TYPE_MISMATCH,
      `cannot assign ${describe(value.type)} to ${stmt.name} of type ${describe(variable.type)}`,
      stmt.loc ?? undefined,
    );
  }

  yield* Process.Variables.store(variable, value, stmt.loc);
}
