import type * as Ast from "#ast";
import type * as Ir from "#ir";

import { assertExhausted } from "#irgen/errors";
import { type Process } from "../process.js";

import { buildIdentifier } from "./identifier.js";
import { buildLiteral } from "./literal.js";
import { makeBuildOperator } from "./operator.js";
import { makeBuildCall } from "./call.js";
import { makeBuildMethodCall } from "./method-call.js";
import { makeBuildList } from "./list.js";

const buildOperator = makeBuildOperator(buildExpression);
const buildCall = makeBuildCall(buildExpression);
const buildMethodCall = makeBuildMethodCall(buildExpression);

export const buildList = makeBuildList(buildExpression);

/**
 * Build an expression and return the resulting IR value
 */
export function* buildExpression(expr: Ast.Expression): Process<Ir.Value> {
  switch (expr.type) {
    case "IdentifierExpression":
      return yield* buildIdentifier(expr);
    case "LiteralExpression":
      return yield* buildLiteral(expr);
    case "OperatorExpression":
      return yield* buildOperator(expr);
    case "CallExpression":
      return yield* buildCall(expr);
    case "MethodCallExpression":
      return yield* buildMethodCall(expr);
    case "ListExpression":
      return yield* buildList(expr);
    default:
      assertExhausted(expr);
  }
}
