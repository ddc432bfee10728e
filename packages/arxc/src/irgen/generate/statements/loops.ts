import type * as Ast from "#ast";
import * as Ir from "#ir";
import * as Runtime from "#runtime";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe, slotType } from "#irgen/type";

import { buildExpression } from "../expressions/index.js";
import { Process } from "../process.js";

type BuildBlock = (statements: readonly Ast.Statement[]) => Process<void>;

/**
 * Build a `for name in list` loop over a list value.
 *
 *     preheader: index = 0            -> cond
 *     cond:      index < len(list)    ? body : end
 *     body:      name = list[index]   -> continue
 *     continue:  index = index + 1    -> cond
 *
 * The iterable is evaluated once, in the preheader.
 */
export const makeBuildForIn = (buildBlock: BuildBlock) =>
  function* buildForIn(stmt: Ast.Statement.ForIn): Process<void> {
    const elementType = slotType(stmt.elementType);
    const debug = Ir.Instruction.debugAt(stmt.loc);

    const list = yield* buildExpression(stmt.iterable);
    if (!Runtime.isList(list.type)) {
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        `cannot iterate over ${describe(list.type)}`,
        stmt.iterable.loc ?? undefined,
      );
    }

    const index = yield* Process.Variables.allocate(
      `${stmt.name}_index`,
      Ir.Type.int32,
      stmt.loc,
    );
    yield* Process.Variables.store(
      index,
      Ir.Value.constant(0n, Ir.Type.int32),
      stmt.loc,
    );

    const condBlock = yield* Process.Blocks.create("for_cond");
    const bodyBlock = yield* Process.Blocks.create("for_body");
    const continueBlock = yield* Process.Blocks.create("for_continue");
    const endBlock = yield* Process.Blocks.create("for_end");

    yield* Process.Blocks.jump(condBlock, stmt.loc);

    // Condition
    yield* Process.Blocks.switchTo(condBlock);
    const current = yield* Process.Variables.load(index, stmt.loc);
    const length = yield* Process.Calls.runtime(
      Runtime.Helper.ListLen,
      [list],
      stmt.loc,
    );
    const inBounds = yield* Process.Variables.newTemp();
    yield* Process.Instructions.emit({
      kind: "binary",
      op: "lt",
      left: current,
      right: length,
      dest: inBounds,
      type: Ir.Type.bool,
      debug,
    });
    yield* Process.Blocks.branch(
      Ir.Value.temp(inBounds, Ir.Type.bool),
      bodyBlock,
      endBlock,
      stmt.loc,
    );

    // Body
    yield* Process.Blocks.switchTo(bodyBlock);
    const position = yield* Process.Variables.load(index, stmt.loc);
    const pointer = yield* Process.Calls.runtime(
      Runtime.Helper.ListGet,
      [list, position],
      stmt.loc,
    );
    const element = yield* elementAt(pointer, elementType, debug);
    const variable = yield* Process.Variables.declare(
      stmt.name,
      elementType,
      stmt.loc,
    );
    yield* Process.Variables.store(variable, element, stmt.loc);

    yield* Process.ControlFlow.enterLoop({
      continueTarget: continueBlock,
      breakTarget: endBlock,
    });
    yield* buildBlock(stmt.body);
    yield* Process.ControlFlow.exitLoop();

    if (!(yield* Process.Blocks.isTerminated())) {
      yield* Process.Blocks.jump(continueBlock);
    }

    // Continue
    yield* Process.Blocks.switchTo(continueBlock);
    const last = yield* Process.Variables.load(index, stmt.loc);
    const next = yield* Process.Variables.newTemp();
    yield* Process.Instructions.emit({
      kind: "binary",
      op: "add",
      left: last,
      right: Ir.Value.constant(1n, Ir.Type.int32),
      dest: next,
      type: Ir.Type.int32,
      debug,
    });
    yield* Process.Variables.store(
      index,
      Ir.Value.temp(next, Ir.Type.int32),
      stmt.loc,
    );
    yield* Process.Blocks.jump(condBlock);

    yield* Process.Blocks.switchTo(endBlock);
  };

/**
 * Scalars are loaded through the element pointer; strings and lists are
 * stored as pointers, so the pointer itself is the element
 */
function* elementAt(
  pointer: Ir.Value,
  elementType: Ir.Type,
  debug: Ir.Instruction.Debug,
): Process<Ir.Value> {
  if (pointer.kind !== "temp") {
    throw new globalThis.Error("List access must produce a temporary");
  }
  if (Runtime.isPointerShaped(elementType)) {
    return Ir.Value.temp(pointer.id, elementType);
  }

  const dest = yield* Process.Variables.newTemp();
  yield* Process.Instructions.emit(
    Ir.Instruction.Read.memory(pointer, elementType, dest, debug),
  );
  return Ir.Value.temp(dest, elementType);
}

/**
 * Build a `while` loop; the condition is re-evaluated on every iteration
 */
export const makeBuildWhile = (buildBlock: BuildBlock) =>
  function* buildWhile(stmt: Ast.Statement.While): Process<void> {
    const condBlock = yield* Process.Blocks.create("while_cond");
    const bodyBlock = yield* Process.Blocks.create("while_body");
    const continueBlock = yield* Process.Blocks.create("while_continue");
    const endBlock = yield* Process.Blocks.create("while_end");

    yield* Process.Blocks.jump(condBlock, stmt.loc);

    yield* Process.Blocks.switchTo(condBlock);
    const condition = yield* buildExpression(stmt.condition);
    if (!Ir.Type.equals(condition.type, Ir.Type.bool)) {
      throw new IrgenError(
        ErrorCode.TYPE_MISMATCH,
        `condition must be bool, found ${describe(condition.type)}`,
        stmt.condition.loc ?? undefined,
      );
    }
    yield* Process.Blocks.branch(condition, bodyBlock, endBlock, stmt.loc);

    yield* Process.Blocks.switchTo(bodyBlock);
    yield* Process.ControlFlow.enterLoop({
      continueTarget: continueBlock,
      breakTarget: endBlock,
    });
    yield* buildBlock(stmt.body);
    yield* Process.ControlFlow.exitLoop();

    if (!(yield* Process.Blocks.isTerminated())) {
      yield* Process.Blocks.jump(continueBlock);
    }

    yield* Process.Blocks.switchTo(continueBlock);
    yield* Process.Blocks.jump(condBlock);

    yield* Process.Blocks.switchTo(endBlock);
  };

/**
 * Build `break` / `continue` as a jump to the innermost loop's target
 */
export function* buildLoopControl(
  stmt: Ast.Statement.Break | Ast.Statement.Continue,
): Process<void> {
  const loop = yield* Process.ControlFlow.currentLoop();
  const keyword = stmt.type === "BreakStatement" ? "break" : "continue";
  if (!loop) {
    throw new IrgenError(
      ErrorCode.OUTSIDE_LOOP,
      `'${keyword}'`,
      stmt.loc ?? undefined,
    );
  }

  yield* Process.Blocks.jump(
    keyword === "break" ? loop.breakTarget : loop.continueTarget,
    stmt.loc,
  );
}
