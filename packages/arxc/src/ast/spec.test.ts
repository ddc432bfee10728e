import { describe, it, expect } from "vitest";

import * as Ast from "./spec.js";

describe("Ast", () => {
  describe("Factory Functions", () => {
    it("should create program nodes", () => {
      const program = Ast.program("hello", []);
      expect(program.type).toBe("Program");
      expect(program.name).toBe("hello");
      expect(program.modules).toEqual([]);
      expect(program.functions).toEqual([]);
      expect(program.loc).toBeNull();
    });

    it("should create function declarations with parameters", () => {
      const fn = Ast.Declaration.function_(
        "add",
        [
          Ast.Declaration.parameter("a", Ast.Type.int()),
          Ast.Declaration.parameter("b", Ast.Type.int()),
        ],
        Ast.Type.int(),
        [],
        { offset: 0, length: 30 },
      );
      expect(fn.kind).toBe("function");
      expect(fn.parameters.map(({ name }) => name)).toEqual(["a", "b"]);
      expect(fn.loc).toEqual({ offset: 0, length: 30 });
    });

    it("should create if chains whose last branch has no condition", () => {
      const chain = Ast.Statement.ifChain([
        Ast.Statement.branch(Ast.Expression.bool(true), []),
        Ast.Statement.branch(undefined, []),
      ]);
      expect(chain.branches[0].condition).toEqual(Ast.Expression.bool(true));
      expect(chain.branches[1].condition).toBeUndefined();
    });

    it("should keep call arguments in order", () => {
      const call = Ast.Expression.methodCall("io", "print", [
        Ast.Expression.string("a"),
        Ast.Expression.int(1),
      ]);
      expect(call.object).toBe("io");
      expect(call.arguments.map((arg) => arg.type)).toEqual([
        "LiteralExpression",
        "LiteralExpression",
      ]);
    });
  });

  describe("Types", () => {
    it("should format types the way source spells them", () => {
      expect(Ast.Type.format(Ast.Type.float())).toBe("float");
      expect(
        Ast.Type.format(Ast.Type.list(Ast.Type.list(Ast.Type.string()))),
      ).toBe("list[list[string]]");
    });

    it("should recognize void and list types", () => {
      expect(Ast.Type.isVoid(Ast.Type.void_())).toBe(true);
      expect(Ast.Type.isVoid(Ast.Type.int())).toBe(false);
      expect(Ast.Type.isList(Ast.Type.list(Ast.Type.int()))).toBe(true);
    });

    it("should know the elementary kinds", () => {
      expect(Ast.Type.Elementary.isKind("bool")).toBe(true);
      expect(Ast.Type.Elementary.isKind("uint256")).toBe(false);
    });
  });

  describe("Source locations", () => {
    it("should accept non-negative offsets and lengths", () => {
      expect(Ast.isSourceLocation({ offset: 0, length: 4 })).toBe(true);
      expect(Ast.isSourceLocation({ offset: -1, length: 4 })).toBe(false);
      expect(Ast.isSourceLocation({ offset: 2 })).toBe(false);
      expect(Ast.isSourceLocation(null)).toBe(false);
    });
  });
});
