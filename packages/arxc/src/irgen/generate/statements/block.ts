import type * as Ast from "#ast";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { Severity } from "#result";

import { Process } from "../process.js";

/**
 * Build a statement list in order. A statement that follows a terminator
 * is unreachable; it is lowered into a fresh block with no predecessors,
 * reported once per list.
 */
export const makeBuildBlock = (
  buildStatement: (stmt: Ast.Statement) => Process<void>,
) =>
  function* buildBlock(statements: readonly Ast.Statement[]): Process<void> {
    let reported = false;

    for (const stmt of statements) {
      if (yield* Process.Blocks.isTerminated()) {
        if (!reported) {
          yield* Process.Warnings.report(
            new IrgenError(
              ErrorCode.UNREACHABLE_CODE,
              undefined,
              stmt.loc ?? undefined,
              Severity.Warning,
            ),
          );
          reported = true;
        }
        const dead = yield* Process.Blocks.create("dead");
        yield* Process.Blocks.switchTo(dead);
      }

      yield* buildStatement(stmt);
    }
  };
