import type * as Ast from "#ast";
import * as Ir from "#ir";
import * as Runtime from "#runtime";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe } from "#irgen/type";

import { Process } from "../process.js";

/**
 * Build a list literal: allocate `N * size(T)` bytes, write each element
 * at its byte offset, then wrap the data in a list record.
 *
 * Without an expected element type, the first element's type is used (an
 * empty literal defaults to `int`).
 */
export const makeBuildList = (
  buildExpression: (expr: Ast.Expression) => Process<Ir.Value>,
) =>
  function* buildList(
    expr: Ast.Expression.List,
    elementType?: Ir.Type,
  ): Process<Ir.Value> {
    const values: Ir.Value[] = [];
    for (const element of expr.elements) {
      values.push(yield* buildExpression(element));
    }

    const type = elementType ?? values.at(0)?.type ?? Ir.Type.int32;
    if (type.kind === "void") {
      throw new IrgenError(
        ErrorCode.UNSUPPORTED_TYPE,
        "list elements cannot be void",
        expr.loc ?? undefined,
      );
    }

    const size = Runtime.sizeOf(type);
    const debug = Ir.Instruction.debugAt(expr.loc);

    const data = yield* Process.Calls.runtime(
      Runtime.Helper.Alloc,
      [Ir.Value.constant(BigInt(values.length * size), Ir.Type.int64)],
      expr.loc,
    );

    for (const [index, value] of values.entries()) {
      const element = yield* coerceElement(
        value,
        type,
        index,
        expr.elements[index].loc,
      );

      const dest = yield* Process.Variables.newTemp();
      yield* Process.Instructions.emit(
        Ir.Instruction.computeOffset(
          data,
          Ir.Value.constant(BigInt(index * size), Ir.Type.int64),
          dest,
          debug,
        ),
      );
      yield* Process.Instructions.emit(
        Ir.Instruction.Write.memory(
          Ir.Value.temp(dest, Ir.Type.pointer(type)),
          element,
          debug,
        ),
      );
    }

    return yield* Process.Calls.runtime(
      Runtime.Helper.ListCreate,
      [
        data,
        Ir.Value.constant(BigInt(values.length), Ir.Type.int32),
        Ir.Value.constant(BigInt(size), Ir.Type.int32),
        Ir.Value.constant(Runtime.isPointerShaped(type), Ir.Type.bool),
      ],
      expr.loc,
    );
  };

/**
 * An element must be a `T`, or a pointer to a `T` that is loaded first
 */
function* coerceElement(
  value: Ir.Value,
  type: Ir.Type,
  index: number,
  loc: Ast.SourceLocation | null,
): Process<Ir.Value> {
  if (Ir.Type.equals(value.type, type)) {
    return value;
  }

  if (Ir.Type.isPointer(value.type) && Ir.Type.equals(value.type.target, type)) {
    const dest = yield* Process.Variables.newTemp();
    yield* Process.Instructions.emit(
      Ir.Instruction.Read.memory(value, type, dest, Ir.Instruction.debugAt(loc)),
    );
    return Ir.Value.temp(dest, type);
  }

  throw new IrgenError(
    ErrorCode.TYPE_MISMATCH,
    `list element ${index + 1} is ${describe(value.type)}, expected ${describe(type)}`,
    loc ?? undefined,
  );
}
