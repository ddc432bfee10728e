/**
 * Typed AST node definitions for the Arx language
 *
 * The AST is produced by an external front end and arrives as JSON (see
 * `decode.ts`). Nodes are closed discriminated unions on `type`, so every
 * lowering switch can be checked for exhaustiveness.
 */

export interface SourceLocation {
  offset: number;
  length: number;
}

export const isSourceLocation = (loc: unknown): loc is SourceLocation =>
  typeof loc === "object" &&
  !!loc &&
  "offset" in loc &&
  typeof loc.offset === "number" &&
  loc.offset >= 0 &&
  "length" in loc &&
  typeof loc.length === "number" &&
  loc.length >= 0;

export type Node = Program | Declaration | Type | Statement | Expression;

export namespace Node {
  export interface Base {
    type: string;
    loc: SourceLocation | null;
  }
}

// Program structure

export interface Program extends Node.Base {
  type: "Program";
  name: string;
  /** Extern modules requested by the program (`core` is implicit) */
  modules: string[];
  functions: Declaration.Function[];
}

export function program(
  name: string,
  functions: Declaration.Function[],
  modules: string[] = [],
  loc?: SourceLocation,
): Program {
  return { type: "Program", name, modules, functions, loc: loc ?? null };
}

export type Declaration = Declaration.Function;

export namespace Declaration {
  export interface Function extends Node.Base {
    type: "Declaration";
    kind: "function";
    name: string;
    parameters: Parameter[];
    returnType: Type;
    body: Statement[];
  }

  export interface Parameter {
    name: string;
    type: Type;
    loc: SourceLocation | null;
  }

  export function function_(
    name: string,
    parameters: Parameter[],
    returnType: Type,
    body: Statement[],
    loc?: SourceLocation,
  ): Declaration.Function {
    return {
      type: "Declaration",
      kind: "function",
      name,
      parameters,
      returnType,
      body,
      loc: loc ?? null,
    };
  }

  export function parameter(
    name: string,
    type: Type,
    loc?: SourceLocation,
  ): Parameter {
    return { name, type, loc: loc ?? null };
  }
}

// Types

export type Type = Type.Elementary | Type.List;

export namespace Type {
  export interface Elementary extends Node.Base {
    type: "ElementaryType";
    kind: Elementary.Kind;
  }

  export namespace Elementary {
    export type Kind = "int" | "bool" | "float" | "string" | "void";

    export const kinds: readonly Kind[] = [
      "int",
      "bool",
      "float",
      "string",
      "void",
    ];

    export const isKind = (kind: unknown): kind is Kind =>
      kinds.some((known) => known === kind);
  }

  export interface List extends Node.Base {
    type: "ListType";
    element: Type;
  }

  export function elementary(
    kind: Elementary.Kind,
    loc?: SourceLocation,
  ): Type.Elementary {
    return { type: "ElementaryType", kind, loc: loc ?? null };
  }

  export function list(element: Type, loc?: SourceLocation): Type.List {
    return { type: "ListType", element, loc: loc ?? null };
  }

  export const int = (): Type.Elementary => elementary("int");
  export const bool = (): Type.Elementary => elementary("bool");
  export const float = (): Type.Elementary => elementary("float");
  export const string = (): Type.Elementary => elementary("string");
  export const void_ = (): Type.Elementary => elementary("void");

  export const isElementary = (type: Type): type is Type.Elementary =>
    type.type === "ElementaryType";

  export const isList = (type: Type): type is Type.List =>
    type.type === "ListType";

  export const isVoid = (type: Type): boolean =>
    isElementary(type) && type.kind === "void";

  /**
   * Render a type the way source code spells it (`int`, `list[str]`)
   */
  export function format(type: Type): string {
    switch (type.type) {
      case "ElementaryType":
        return type.kind;
      case "ListType":
        return `list[${format(type.element)}]`;
    }
  }
}

// Statements

export type Statement =
  | Statement.Express
  | Statement.Return
  | Statement.Declare
  | Statement.Assign
  | Statement.IfChain
  | Statement.ForIn
  | Statement.While
  | Statement.Break
  | Statement.Continue
  | Statement.DeclareList;

export namespace Statement {
  export interface Express extends Node.Base {
    type: "ExpressionStatement";
    expression: Expression;
  }

  export function express(
    expression: Expression,
    loc?: SourceLocation,
  ): Statement.Express {
    return { type: "ExpressionStatement", expression, loc: loc ?? null };
  }

  /**
   * `return value` or, without a value, `return` from a void function
   */
  export interface Return extends Node.Base {
    type: "ReturnStatement";
    value?: Expression;
  }

  export function return_(
    value?: Expression,
    loc?: SourceLocation,
  ): Statement.Return {
    return { type: "ReturnStatement", value, loc: loc ?? null };
  }

  export interface Declare extends Node.Base {
    type: "DeclarationStatement";
    declaredType: Type;
    name: string;
    initializer: Expression;
  }

  export function declare(
    declaredType: Type,
    name: string,
    initializer: Expression,
    loc?: SourceLocation,
  ): Statement.Declare {
    return {
      type: "DeclarationStatement",
      declaredType,
      name,
      initializer,
      loc: loc ?? null,
    };
  }

  export interface Assign extends Node.Base {
    type: "AssignmentStatement";
    name: string;
    value: Expression;
  }

  export function assign(
    name: string,
    value: Expression,
    loc?: SourceLocation,
  ): Statement.Assign {
    return { type: "AssignmentStatement", name, value, loc: loc ?? null };
  }

  /**
   * `if` / `else if` / `else` chain; only the last branch may omit its
   * condition
   */
  export interface IfChain extends Node.Base {
    type: "IfChainStatement";
    branches: Branch[];
  }

  export interface Branch {
    condition?: Expression;
    body: Statement[];
  }

  export function ifChain(
    branches: Branch[],
    loc?: SourceLocation,
  ): Statement.IfChain {
    return { type: "IfChainStatement", branches, loc: loc ?? null };
  }

  export function branch(
    condition: Expression | undefined,
    body: Statement[],
  ): Branch {
    return { condition, body };
  }

  export interface ForIn extends Node.Base {
    type: "ForInStatement";
    elementType: Type;
    name: string;
    iterable: Expression;
    body: Statement[];
  }

  export function forIn(
    elementType: Type,
    name: string,
    iterable: Expression,
    body: Statement[],
    loc?: SourceLocation,
  ): Statement.ForIn {
    return {
      type: "ForInStatement",
      elementType,
      name,
      iterable,
      body,
      loc: loc ?? null,
    };
  }

  export interface While extends Node.Base {
    type: "WhileStatement";
    condition: Expression;
    body: Statement[];
  }

  export function while_(
    condition: Expression,
    body: Statement[],
    loc?: SourceLocation,
  ): Statement.While {
    return { type: "WhileStatement", condition, body, loc: loc ?? null };
  }

  export interface Break extends Node.Base {
    type: "BreakStatement";
  }

  export function break_(loc?: SourceLocation): Statement.Break {
    return { type: "BreakStatement", loc: loc ?? null };
  }

  export interface Continue extends Node.Base {
    type: "ContinueStatement";
  }

  export function continue_(loc?: SourceLocation): Statement.Continue {
    return { type: "ContinueStatement", loc: loc ?? null };
  }

  export interface DeclareList extends Node.Base {
    type: "ListDeclarationStatement";
    elementType: Type;
    name: string;
    initializer: Expression;
  }

  export function declareList(
    elementType: Type,
    name: string,
    initializer: Expression,
    loc?: SourceLocation,
  ): Statement.DeclareList {
    return {
      type: "ListDeclarationStatement",
      elementType,
      name,
      initializer,
      loc: loc ?? null,
    };
  }
}

// Expressions

export type Expression =
  | Expression.Literal
  | Expression.Identifier
  | Expression.Operator
  | Expression.Call
  | Expression.MethodCall
  | Expression.List;

export namespace Expression {
  export type Literal =
    | Literal.Int
    | Literal.Float
    | Literal.Bool
    | Literal.String;

  export namespace Literal {
    interface Base extends Node.Base {
      type: "LiteralExpression";
    }

    export interface Int extends Base {
      kind: "int";
      value: number;
    }

    export interface Float extends Base {
      kind: "float";
      value: number;
    }

    export interface Bool extends Base {
      kind: "bool";
      value: boolean;
    }

    export interface String extends Base {
      kind: "string";
      value: string;
    }
  }

  export function int(value: number, loc?: SourceLocation): Literal.Int {
    return { type: "LiteralExpression", kind: "int", value, loc: loc ?? null };
  }

  export function float(value: number, loc?: SourceLocation): Literal.Float {
    return {
      type: "LiteralExpression",
      kind: "float",
      value,
      loc: loc ?? null,
    };
  }

  export function bool(value: boolean, loc?: SourceLocation): Literal.Bool {
    return {
      type: "LiteralExpression",
      kind: "bool",
      value,
      loc: loc ?? null,
    };
  }

  export function string(value: string, loc?: SourceLocation): Literal.String {
    return {
      type: "LiteralExpression",
      kind: "string",
      value,
      loc: loc ?? null,
    };
  }

  export interface Identifier extends Node.Base {
    type: "IdentifierExpression";
    name: string;
  }

  export function identifier(
    name: string,
    loc?: SourceLocation,
  ): Expression.Identifier {
    return { type: "IdentifierExpression", name, loc: loc ?? null };
  }

  /**
   * Binary operator application (`a + b`, `x == y`, ...)
   */
  export interface Operator extends Node.Base {
    type: "OperatorExpression";
    operator: string;
    left: Expression;
    right: Expression;
  }

  export function operator(
    operator: string,
    left: Expression,
    right: Expression,
    loc?: SourceLocation,
  ): Expression.Operator {
    return {
      type: "OperatorExpression",
      operator,
      left,
      right,
      loc: loc ?? null,
    };
  }

  /**
   * Call by bare function name
   */
  export interface Call extends Node.Base {
    type: "CallExpression";
    callee: string;
    arguments: Expression[];
  }

  export function call(
    callee: string,
    args: Expression[],
    loc?: SourceLocation,
  ): Expression.Call {
    return {
      type: "CallExpression",
      callee,
      arguments: args,
      loc: loc ?? null,
    };
  }

  /**
   * Qualified `module.function(...)` call into an extern module
   */
  export interface MethodCall extends Node.Base {
    type: "MethodCallExpression";
    object: string;
    method: string;
    arguments: Expression[];
  }

  export function methodCall(
    object: string,
    method: string,
    args: Expression[],
    loc?: SourceLocation,
  ): Expression.MethodCall {
    return {
      type: "MethodCallExpression",
      object,
      method,
      arguments: args,
      loc: loc ?? null,
    };
  }

  export interface List extends Node.Base {
    type: "ListExpression";
    elements: Expression[];
  }

  export function list(
    elements: Expression[],
    loc?: SourceLocation,
  ): Expression.List {
    return { type: "ListExpression", elements, loc: loc ?? null };
  }
}
