/**
 * Decoding of AST documents produced by the front end
 *
 * The compiler receives its AST as JSON. Decoding validates the document
 * node by node and rebuilds it through the factories in `spec.ts`, reporting
 * the JSON path of the first node that does not fit.
 */

import { InputError } from "#errors";
import { Result } from "#result";

import {
  type Program,
  type SourceLocation,
  Declaration,
  Expression,
  Statement,
  Type,
  isSourceLocation,
  program,
} from "./spec.js";

type Json = Record<string, unknown>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const isRecord = (value: unknown): value is Json =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Decode an untrusted JSON value into a typed program
 */
export function decode(json: unknown): Result<Program, InputError> {
  try {
    return Result.ok(decodeProgram(json, "$"));
  } catch (error) {
    if (error instanceof InputError) {
      return Result.err(error);
    }
    throw error;
  }
}

function decodeProgram(value: unknown, path: string): Program {
  const node = record(value, path, "Program");
  const modules = array(node.modules ?? [], `${path}.modules`).map(
    (module, index) => identifier(module, `${path}.modules[${index}]`),
  );
  const functions = array(node.functions, `${path}.functions`).map(
    (fn, index) => decodeFunction(fn, `${path}.functions[${index}]`),
  );
  return program(
    str(node.name, `${path}.name`),
    functions,
    modules,
    location(node),
  );
}

function decodeFunction(value: unknown, path: string): Declaration.Function {
  const node = record(value, path, "Declaration");
  const parameters = array(node.parameters, `${path}.parameters`).map(
    (param, index) => {
      const paramPath = `${path}.parameters[${index}]`;
      const raw = record(param, paramPath);
      return Declaration.parameter(
        identifier(raw.name, `${paramPath}.name`),
        decodeType(raw.type, `${paramPath}.type`),
        location(raw),
      );
    },
  );
  return Declaration.function_(
    identifier(node.name, `${path}.name`),
    parameters,
    decodeType(node.returnType, `${path}.returnType`),
    statements(node.body, `${path}.body`),
    location(node),
  );
}

function decodeType(value: unknown, path: string): Type {
  // Bare names are accepted as shorthand for elementary types
  if (typeof value === "string") {
    return elementaryKind(value, path);
  }

  const node = record(value, path);
  switch (node.type) {
    case "ElementaryType": {
      const kind = elementaryKind(node.kind, `${path}.kind`);
      return Type.elementary(kind.kind, location(node));
    }
    case "ListType":
      return Type.list(
        decodeType(node.element, `${path}.element`),
        location(node),
      );
    default:
      throw new InputError(`Unknown type node ${describe(node.type)}`, path);
  }
}

function elementaryKind(value: unknown, path: string): Type.Elementary {
  // The front end spells strings both ways
  const kind = value === "str" ? "string" : value;
  if (!Type.Elementary.isKind(kind)) {
    throw new InputError(`Unsupported type ${describe(value)}`, path);
  }
  return Type.elementary(kind);
}

function statements(value: unknown, path: string): Statement[] {
  return array(value, path).map((stmt, index) =>
    decodeStatement(stmt, `${path}[${index}]`),
  );
}

function decodeStatement(value: unknown, path: string): Statement {
  const node = record(value, path);
  const loc = location(node);

  switch (node.type) {
    case "ExpressionStatement":
      return Statement.express(
        decodeExpression(node.expression, `${path}.expression`),
        loc,
      );
    case "ReturnStatement":
      return Statement.return_(
        node.value === undefined || node.value === null
          ? undefined
          : decodeExpression(node.value, `${path}.value`),
        loc,
      );
    case "DeclarationStatement":
      return Statement.declare(
        decodeType(node.declaredType, `${path}.declaredType`),
        identifier(node.name, `${path}.name`),
        decodeExpression(node.initializer, `${path}.initializer`),
        loc,
      );
    case "AssignmentStatement":
      return Statement.assign(
        identifier(node.name, `${path}.name`),
        decodeExpression(node.value, `${path}.value`),
        loc,
      );
    case "IfChainStatement": {
      const branches = array(node.branches, `${path}.branches`).map(
        (branch, index) => {
          const branchPath = `${path}.branches[${index}]`;
          const raw = record(branch, branchPath);
          const condition =
            raw.condition === undefined || raw.condition === null
              ? undefined
              : decodeExpression(raw.condition, `${branchPath}.condition`);
          return Statement.branch(
            condition,
            statements(raw.body, `${branchPath}.body`),
          );
        },
      );
      if (branches.length === 0) {
        throw new InputError("If chain has no branches", path);
      }
      const unconditional = branches.findIndex((b) => !b.condition);
      if (unconditional !== -1 && unconditional !== branches.length - 1) {
        throw new InputError(
          "Only the last branch of an if chain may omit its condition",
          `${path}.branches[${unconditional}]`,
        );
      }
      return Statement.ifChain(branches, loc);
    }
    case "ForInStatement":
      return Statement.forIn(
        decodeType(node.elementType, `${path}.elementType`),
        identifier(node.name, `${path}.name`),
        decodeExpression(node.iterable, `${path}.iterable`),
        statements(node.body, `${path}.body`),
        loc,
      );
    case "WhileStatement":
      return Statement.while_(
        decodeExpression(node.condition, `${path}.condition`),
        statements(node.body, `${path}.body`),
        loc,
      );
    case "BreakStatement":
      return Statement.break_(loc);
    case "ContinueStatement":
      return Statement.continue_(loc);
    case "ListDeclarationStatement":
      return Statement.declareList(
        decodeType(node.elementType, `${path}.elementType`),
        identifier(node.name, `${path}.name`),
        decodeExpression(node.initializer, `${path}.initializer`),
        loc,
      );
    default:
      throw new InputError(
        `Unknown statement type ${describe(node.type)}`,
        path,
      );
  }
}

function decodeExpression(value: unknown, path: string): Expression {
  const node = record(value, path);
  const loc = location(node);

  switch (node.type) {
    case "LiteralExpression":
      return decodeLiteral(node, path, loc);
    case "IdentifierExpression":
      return Expression.identifier(identifier(node.name, `${path}.name`), loc);
    case "OperatorExpression":
      return Expression.operator(
        str(node.operator, `${path}.operator`),
        decodeExpression(node.left, `${path}.left`),
        decodeExpression(node.right, `${path}.right`),
        loc,
      );
    case "CallExpression":
      return Expression.call(
        str(node.callee, `${path}.callee`),
        expressions(node.arguments, `${path}.arguments`),
        loc,
      );
    case "MethodCallExpression":
      return Expression.methodCall(
        identifier(node.object, `${path}.object`),
        identifier(node.method, `${path}.method`),
        expressions(node.arguments, `${path}.arguments`),
        loc,
      );
    case "ListExpression":
      return Expression.list(
        expressions(node.elements, `${path}.elements`),
        loc,
      );
    default:
      throw new InputError(
        `Unknown expression type ${describe(node.type)}`,
        path,
      );
  }
}

function decodeLiteral(
  node: Json,
  path: string,
  loc: SourceLocation | undefined,
): Expression.Literal {
  const { kind, value } = node;
  switch (kind) {
    case "int":
      if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new InputError("Expected an integer value", `${path}.value`);
      }
      return Expression.int(value, loc);
    case "float":
      if (typeof value !== "number") {
        throw new InputError("Expected a numeric value", `${path}.value`);
      }
      return Expression.float(value, loc);
    case "bool":
      if (typeof value !== "boolean") {
        throw new InputError("Expected a boolean value", `${path}.value`);
      }
      return Expression.bool(value, loc);
    case "string":
      return Expression.string(str(value, `${path}.value`), loc);
    default:
      throw new InputError(
        `Unknown literal kind ${describe(kind)}`,
        `${path}.kind`,
      );
  }
}

function expressions(value: unknown, path: string): Expression[] {
  return array(value, path).map((expr, index) =>
    decodeExpression(expr, `${path}[${index}]`),
  );
}

function record(value: unknown, path: string, type?: string): Json {
  if (!isRecord(value)) {
    throw new InputError("Expected an object", path);
  }
  if (type !== undefined && value.type !== type) {
    throw new InputError(
      `Expected node type "${type}" but found ${describe(value.type)}`,
      path,
    );
  }
  return value;
}

function array(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new InputError("Expected an array", path);
  }
  return value;
}

function str(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new InputError("Expected a string", path);
  }
  return value;
}

/**
 * A name bound or looked up by the program; bare call targets are checked
 * during lowering instead
 */
function identifier(value: unknown, path: string): string {
  const name = str(value, path);
  if (!IDENTIFIER.test(name)) {
    throw new InputError(`Invalid identifier ${describe(name)}`, path);
  }
  return name;
}

function location(node: Json): SourceLocation | undefined {
  return isSourceLocation(node.loc) ? node.loc : undefined;
}

function describe(value: unknown): string {
  return value === undefined ? "nothing" : JSON.stringify(value);
}
