import type * as Ast from "#ast";

import { buildExpression } from "../expressions/index.js";
import type { Process } from "../process.js";

/**
 * Build an expression statement; its value is discarded
 */
export function* buildExpressionStatement(
  stmt: Ast.Statement.Express,
): Process<void> {
  yield* buildExpression(stmt.expression);
}
