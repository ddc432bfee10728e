import type * as Ast from "#ast";
import type * as Ir from "#ir";

import { Process } from "../process.js";

/**
 * Build an identifier expression by loading its slot
 */
export function* buildIdentifier(
  expr: Ast.Expression.Identifier,
): Process<Ir.Value> {
  const variable = yield* Process.Variables.resolve(expr.name, expr.loc);
  return yield* Process.Variables.load(variable, expr.loc);
}
