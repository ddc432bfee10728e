import type * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode, assertExhausted } from "#irgen/errors";

import { Process } from "../process.js";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Build a literal expression as an immediate constant; strings become
 * module globals
 */
export function* buildLiteral(
  expr: Ast.Expression.Literal,
): Process<Ir.Value> {
  switch (expr.kind) {
    case "int":
      if (expr.value < INT32_MIN || expr.value > INT32_MAX) {
        throw new IrgenError(
          ErrorCode.TYPE_MISMATCH,
          `integer literal ${expr.value} does not fit in int`,
          expr.loc ?? undefined,
        );
      }
      return Ir.Value.constant(BigInt(expr.value), Ir.Type.int32);
    case "float":
      return Ir.Value.constant(expr.value, Ir.Type.float64);
    case "bool":
      return Ir.Value.constant(expr.value, Ir.Type.bool);
    case "string":
      return yield* Process.Modules.internString(expr.value);
    default:
      assertExhausted(expr);
  }
}
