import type * as Ast from "#ast";
import * as Ir from "#ir";
import * as Runtime from "#runtime";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe } from "#irgen/type";

import { Process } from "../process.js";

const operators = new Map<string, Ir.Instruction.BinaryOp.Operator>([
  ["+", "add"],
  ["-", "sub"],
  ["*", "mul"],
  ["/", "div"],
  ["%", "mod"],
  ["==", "eq"],
  ["!=", "ne"],
  ["<", "lt"],
  ["<=", "le"],
  [">", "gt"],
  [">=", "ge"],
]);

/**
 * Build a binary operator expression. Operands are lowered left to right;
 * string `==`, `!=` and `+` go through the runtime.
 */
export const makeBuildOperator = (
  buildExpression: (expr: Ast.Expression) => Process<Ir.Value>,
) =>
  function* buildOperator(expr: Ast.Expression.Operator): Process<Ir.Value> {
    const left = yield* buildExpression(expr.left);
    const right = yield* buildExpression(expr.right);

    const op = operators.get(expr.operator);
    if (!op) {
      throw new IrgenError(
        ErrorCode.UNIMPLEMENTED_OPERATOR,
        `'${expr.operator}'`,
        expr.loc ?? undefined,
      );
    }

    const isString = (value: Ir.Value) =>
      Ir.Type.equals(value.type, Ir.Type.string);
    if (isString(left) && isString(right)) {
      return yield* buildStringOperator(expr, op, left, right);
    }

    if (!Ir.Type.equals(left.type, right.type)) {
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        `cannot apply '${expr.operator}' to ${describe(left.type)} and ${describe(right.type)}`,
        expr.loc ?? undefined,
      );
    }

    if (!supports(left.type, op)) {
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        `'${expr.operator}' is not defined for ${describe(left.type)}`,
        expr.loc ?? undefined,
      );
    }

    return yield* emitBinary(op, left, right, expr.loc);
  };

function supports(
  type: Ir.Type,
  op: Ir.Instruction.BinaryOp.Operator,
): boolean {
  switch (type.kind) {
    case "int":
    case "float":
      return true;
    case "bool":
      return op === "eq" || op === "ne";
    default:
      return false;
  }
}

function* buildStringOperator(
  expr: Ast.Expression.Operator,
  op: Ir.Instruction.BinaryOp.Operator,
  left: Ir.Value,
  right: Ir.Value,
): Process<Ir.Value> {
  switch (op) {
    case "add":
      return yield* Process.Calls.runtime(
        Runtime.Helper.StringConcat,
        [left, right],
        expr.loc,
      );
    case "eq":
      return yield* Process.Calls.runtime(
        Runtime.Helper.StringEqual,
        [left, right],
        expr.loc,
      );
    case "ne": {
      const equal = yield* Process.Calls.runtime(
        Runtime.Helper.StringEqual,
        [left, right],
        expr.loc,
      );
      return yield* emitBinary(
        "eq",
        equal,
        Ir.Value.constant(false, Ir.Type.bool),
        expr.loc,
      );
    }
    default:
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        `'${expr.operator}' is not defined for string`,
        expr.loc ?? undefined,
      );
  }
}

function* emitBinary(
  op: Ir.Instruction.BinaryOp.Operator,
  left: Ir.Value,
  right: Ir.Value,
  loc: Ast.SourceLocation | null,
): Process<Ir.Value> {
  const type = Ir.Instruction.BinaryOp.isComparison(op)
    ? Ir.Type.bool
    : left.type;
  const dest = yield* Process.Variables.newTemp();
  yield* Process.Instructions.emit({
    kind: "binary",
    op,
    left,
    right,
    dest,
    type,
    debug: Ir.Instruction.debugAt(loc),
  });
  return Ir.Value.temp(dest, type);
}
