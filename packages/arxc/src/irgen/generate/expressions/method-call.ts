import type * as Ast from "#ast";
import type * as Ir from "#ir";
import { Table, tagOf, typeOf } from "#linkage";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";

import { Process } from "../process.js";
import { buildArguments } from "./call.js";

/**
 * Build a qualified `module.function(...)` call through the extern
 * overload table
 */
export const makeBuildMethodCall = (
  buildExpression: (expr: Ast.Expression) => Process<Ir.Value>,
) =>
  function* buildMethodCall(
    expr: Ast.Expression.MethodCall,
  ): Process<Ir.Value> {
    const args = yield* buildArguments(expr.arguments, buildExpression);
    const name = Table.qualify(expr.object, expr.method);
    const tags = args.map(({ type }) => tagOf(type));

    const table = yield* Process.Externs.table();
    const resolution = Table.resolve(table, name, tags);

    switch (resolution.kind) {
      case "not-found":
        throw new IrgenError(
          ErrorCode.EXTERN_NOT_FOUND,
          name,
          expr.loc ?? undefined,
        );
      case "no-match": {
        const candidates = resolution.candidates
          .map((key) => `(${key.split(",").join(", ")})`)
          .join(", ");
        throw new IrgenError(
          ErrorCode.NO_MATCHING_OVERLOAD,
          `${name}(${tags.join(", ")}); candidates are ${candidates}`,
          expr.loc ?? undefined,
        );
      }
      case "found": {
        const { overload } = resolution;
        const returnType = typeOf(overload.returns);
        yield* Process.Modules.declare({
          symbol: overload.symbol,
          parameters: overload.arguments.map(typeOf),
          returnType,
        });
        return yield* Process.Calls.emit(
          overload.symbol,
          args,
          returnType,
          expr.loc,
        );
      }
    }
  };
