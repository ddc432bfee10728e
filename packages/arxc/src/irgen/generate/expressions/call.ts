import type * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe } from "#irgen/type";

import { Process } from "../process.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Lower call arguments left to right; a void value cannot be passed
 */
export function* buildArguments(
  args: Ast.Expression[],
  buildExpression: (expr: Ast.Expression) => Process<Ir.Value>,
): Process<Ir.Value[]> {
  const values: Ir.Value[] = [];
  for (const arg of args) {
    const value = yield* buildExpression(arg);
    if (value.type.kind === "void") {
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        "a void value cannot be used as an argument",
        arg.loc ?? undefined,
      );
    }
    values.push(value);
  }
  return values;
}

/**
 * Build a call by bare name.
 *
 * Functions defined by the program are called with their own signature.
 * Any other name is declared external on first use, with parameters taken
 * from that call's arguments and an `int` return.
 */
export const makeBuildCall = (
  buildExpression: (expr: Ast.Expression) => Process<Ir.Value>,
) =>
  function* buildCall(expr: Ast.Expression.Call): Process<Ir.Value> {
    if (!IDENTIFIER.test(expr.callee)) {
      throw new IrgenError(
        ErrorCode.UNKNOWN_FUNCTION,
        `'${expr.callee}' is not a function name`,
        expr.loc ?? undefined,
      );
    }

    const args = yield* buildArguments(expr.arguments, buildExpression);

    const signature = yield* Process.Modules.signature(expr.callee);
    if (signature) {
      checkArguments(expr, signature.parameters, args);
      return yield* Process.Calls.emit(
        expr.callee,
        args,
        signature.returnType,
        expr.loc,
      );
    }

    const declared = yield* Process.Modules.declaration(expr.callee);
    if (declared) {
      return yield* Process.Calls.emit(
        expr.callee,
        args,
        declared.returnType,
        expr.loc,
      );
    }

    yield* Process.Modules.declare({
      symbol: expr.callee,
      parameters: args.map(({ type }) => type),
      returnType: Ir.Type.int32,
    });
    return yield* Process.Calls.emit(
      expr.callee,
      args,
      Ir.Type.int32,
      expr.loc,
    );
  };

function checkArguments(
  expr: Ast.Expression.Call,
  parameters: readonly Ir.Type[],
  args: Ir.Value[],
): void {
  if (parameters.length !== args.length) {
    throw new IrgenError(
      ErrorCode.TYPE_MISMATCH,
      `${expr.callee} takes ${parameters.length} arguments but ${args.length} were given`,
      expr.loc ?? undefined,
    );
  }
  parameters.forEach((type, index) => {
    const arg = args[index];
    if (!Ir.Type.equals(type, arg.type)) {
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        `argument ${index + 1} of ${expr.callee} expects ${describe(type)}, found ${describe(arg.type)}`,
        expr.arguments[index].loc ?? undefined,
      );
    }
  });
}
