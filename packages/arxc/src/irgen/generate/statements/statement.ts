import type * as Ast from "#ast";
import { assertExhausted } from "#irgen/errors";

import type { Process } from "../process.js";

import { makeBuildBlock } from "./block.js";
import { buildExpressionStatement } from "./express.js";
import { buildReturnStatement } from "./return.js";
import { buildDeclarationStatement } from "./declare.js";
import { buildAssignmentStatement } from "./assign.js";
import { buildListDeclarationStatement } from "./declare-list.js";
import { makeBuildIfChain } from "./if-chain.js";
import {
  buildLoopControl,
  makeBuildForIn,
  makeBuildWhile,
} from "./loops.js";

export const buildBlock = makeBuildBlock(buildStatement);

const buildIfChain = makeBuildIfChain(buildBlock);
const buildForIn = makeBuildForIn(buildBlock);
const buildWhile = makeBuildWhile(buildBlock);

/**
 * Build a statement
 */
export function* buildStatement(stmt: Ast.Statement): Process<void> {
  switch (stmt.type) {
    case "ExpressionStatement":
      return yield* buildExpressionStatement(stmt);
    case "ReturnStatement":
      return yield* buildReturnStatement(stmt);
    case "DeclarationStatement":
      return yield* buildDeclarationStatement(stmt);
    case "AssignmentStatement":
      return yield* buildAssignmentStatement(stmt);
    case "IfChainStatement":
      return yield* buildIfChain(stmt);
    case "ForInStatement":
      return yield* buildForIn(stmt);
    case "WhileStatement":
      return yield* buildWhile(stmt);
    case "BreakStatement":
    case "ContinueStatement":
      return yield* buildLoopControl(stmt);
    case "ListDeclarationStatement":
      return yield* buildListDeclarationStatement(stmt);
    default:
      assertExhausted(stmt);
  }
}
