import * as Ast from "#ast";
import * as Ir from "#ir";

import { Error as IrgenError, ErrorCode } from "#irgen/errors";
import { fromAstType, slotType } from "#irgen/type";

import type { State } from "./state.js";
import { Process } from "./process.js";
import { buildBlock } from "./statements/index.js";

/**
 * Build a function.
 *
 * Each parameter arrives as an SSA temp and is stored into its own slot
 * on entry, so the body reads and reassigns parameters like any other
 * variable.
 */
export function* buildFunction(
  decl: Ast.Declaration.Function,
): Process<Ir.Function> {
  const parameters = yield* Process.Functions.initialize(
    decl.name,
    decl.parameters.map((param) => ({
      name: param.name,
      type: slotType(param.type),
      ...(param.loc ? { loc: param.loc } : {}),
    })),
    fromAstType(decl.returnType),
  );

  for (const [index, param] of parameters.entries()) {
    const loc = decl.parameters[index].loc;
    const variable = yield* Process.Variables.declare(
      param.name,
      param.type,
      loc,
    );
    yield* Process.Variables.store(
      variable,
      Ir.Value.temp(param.tempId, param.type),
      loc,
    );
  }

  yield* buildBlock(decl.body);

  const live = yield* Process.Blocks.currentId();
  yield* Process.Blocks.syncCurrent();
  const func = yield* Process.Functions.current();
  return finalize(func, live, decl);
}

/**
 * Close a lowered function: check that every reachable block ends in a
 * terminator, drop the blocks control never reaches and record
 * predecessors
 */
function finalize(
  func: State.Function,
  live: string,
  decl: Ast.Declaration.Function,
): Ir.Function {
  const reachable = reachableFrom("entry", func.blocks);

  for (const id of reachable) {
    if (!func.blocks.has(id)) {
      throw new IrgenError(
        ErrorCode.UNTERMINATED_BLOCK,
        `'${id}' in ${decl.name} is never filled in`,
        decl.loc ?? undefined,
      );
    }
  }

  const blocks = new Map<string, Ir.Block>();
  for (const id of orderBlocks(func.blocks)) {
    if (!reachable.has(id)) {
      continue;
    }

    const block = func.blocks.get(id);
    if (!block?.terminator) {
      throw id === live
        ? new IrgenError(
            ErrorCode.MISSING_RETURN,
            `${decl.name} returning ${Ast.Type.format(decl.returnType)}`,
            decl.loc ?? undefined,
          )
        : new IrgenError(
            ErrorCode.UNTERMINATED_BLOCK,
            `'${id}' in ${decl.name}`,
            decl.loc ?? undefined,
          );
    }

    blocks.set(id, {
      id,
      instructions: [...block.instructions],
      terminator: block.terminator,
      predecessors: new Set(),
    });
  }

  for (const block of blocks.values()) {
    for (const successor of Ir.Block.successors(block.terminator)) {
      blocks.get(successor)?.predecessors.add(block.id);
    }
  }

  return {
    name: func.name,
    parameters: [...func.parameters],
    returnType: func.returnType,
    locals: [...func.locals],
    entry: "entry",
    blocks,
  };
}

/**
 * Entry first, then blocks in the order they were stored
 */
function orderBlocks(blocks: ReadonlyMap<string, State.Block>): string[] {
  return ["entry", ...[...blocks.keys()].filter((id) => id !== "entry")];
}

function reachableFrom(
  entry: string,
  blocks: ReadonlyMap<string, State.Block>,
): Set<string> {
  const reachable = new Set<string>();
  const worklist = [entry];

  for (let id = worklist.pop(); id !== undefined; id = worklist.pop()) {
    if (reachable.has(id)) continue;
    reachable.add(id);

    const terminator = blocks.get(id)?.terminator;
    if (terminator) {
      worklist.push(...Ir.Block.successors(terminator));
    }
  }

  return reachable;
}
