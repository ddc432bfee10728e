import type * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { describe } from "#irgen/type";

import { buildExpression } from "../expressions/index.js";
import { Process } from "../process.js";

/**
 * Build an if / else-if / else chain.
 *
 * Branches share one end block. Lowering continues in the end block only
 * when something reaches it: a branch body that falls through, or the
 * false edge of a final conditional branch. Otherwise the end block is
 * never materialized.
 */
export const makeBuildIfChain = (
  buildBlock: (statements: readonly Ast.Statement[]) => Process<void>,
) =>
  function* buildIfChain(stmt: Ast.Statement.IfChain): Process<void> {
    const endBlock = yield* Process.Blocks.create("if_end");
    let reachesEnd = false;

    for (const [index, branch] of stmt.branches.entries()) {
      const isLast = index === stmt.branches.length - 1;
      const thenBlock = yield* Process.Blocks.create("if_then");
      const nextBlock = isLast
        ? endBlock
        : yield* Process.Blocks.create("if_next");

      if (branch.condition) {
        const condition = yield* buildExpression(branch.condition);
        if (!Ir.Type.equals(condition.type, Ir.Type.bool)) {
          throw new IrgenError(
            ErrorCode.TYPE_MISMATCH,
            `condition must be bool, found ${describe(condition.type)}`,
            branch.condition.loc ?? undefined,
          );
        }
        yield* Process.Blocks.branch(
          condition,
          thenBlock,
          nextBlock,
          branch.condition.loc,
        );
        reachesEnd ||= isLast;
      } else {
        yield* Process.Blocks.jump(thenBlock, stmt.loc);
      }

      yield* Process.Blocks.switchTo(thenBlock);
      yield* buildBlock(branch.body);

      if (!(yield* Process.Blocks.isTerminated())) {
        yield* Process.Blocks.jump(endBlock);
        reachesEnd = true;
      }

      if (branch.condition && !isLast) {
        yield* Process.Blocks.switchTo(nextBlock);
      }
    }

    if (reachesEnd) {
      yield* Process.Blocks.switchTo(endBlock);
    }
  };
