import { describe, it, expect } from "vitest";

import {
  Declaration,
  Expression as E,
  type Program,
  Statement as S,
  Type as T,
  program,
} from "#ast";
import { Result, Severity } from "#result";

import { generateModule } from "./generator.js";
import { expectFailure, expectSuccess, mainProgram } from "../../test/helpers.js";

const failure = (ast: Program) => expectFailure(generateModule(ast));

describe("lowering errors", () => {
  it("reports undefined variables at their use", () => {
    const error = failure(
      mainProgram([S.return_(E.identifier("y", { offset: 7, length: 1 }))]),
    );
    expect(error.code).toBe("IR001");
    expect(error.message).toBe("Undefined variable: y");
    expect(error.location).toEqual({ offset: 7, length: 1 });
  });

  it("reports functions that fall off the end", () => {
    const error = failure(mainProgram([S.declare(T.int(), "x", E.int(1))]));
    expect(error.code).toBe("IR008");
    expect(error.message).toBe(
      "Function falls off the end without returning: main returning int",
    );
  });

  it("requires void functions to return explicitly", () => {
    const error = failure(mainProgram([], T.void_()));
    expect(error.message).toBe(
      "Function falls off the end without returning: main returning void",
    );
  });

  it("rejects a bare return from a function with a result", () => {
    const error = failure(mainProgram([S.return_()]));
    expect(error.code).toBe("IR007");
    expect(error.message).toBe("Invalid return: main must return int");
  });

  it("rejects a value returned from a void function", () => {
    const error = failure(mainProgram([S.return_(E.int(1))], T.void_()));
    expect(error.message).toBe(
      "Invalid return: void function main cannot return a value",
    );
  });

  it("rejects a return value of the wrong type", () => {
    const error = failure(mainProgram([S.return_(E.bool(true))]));
    expect(error.code).toBe("IR005");
    expect(error.message).toBe("Type mismatch: main returns int, found bool");
  });

  it("rejects initializers of the wrong type", () => {
    const error = failure(
      mainProgram([S.declare(T.int(), "x", E.bool(true)), S.return_(E.int(0))]),
    );
    expect(error.message).toBe(
      "Type mismatch: cannot initialize int x with bool",
    );
  });

  it("rejects assignments of the wrong type", () => {
    const error = failure(
      mainProgram([
        S.declare(T.int(), "x", E.int(0)),
        S.assign("x", E.float(1.5)),
        S.return_(E.int(0)),
      ]),
    );
    expect(error.message).toBe(
      "Type mismatch: cannot assign float to x of type int",
    );
  });

  it("rejects void locals", () => {
    const error = failure(
      mainProgram([S.declare(T.void_(), "x", E.int(0)), S.return_(E.int(0))]),
    );
    expect(error.code).toBe("IR006");
    expect(error.message).toBe(
      "Unsupported type: cannot declare a local of type void",
    );
  });

  it("rejects operands of different types", () => {
    const error = failure(
      mainProgram([S.return_(E.operator("+", E.int(1), E.float(2)))]),
    );
    expect(error.message).toBe(
      "Type mismatch: cannot apply '+' to int and float",
    );
  });

  it("rejects arithmetic on bools", () => {
    const error = failure(
      mainProgram([
        S.declare(T.bool(), "b", E.operator("<", E.bool(true), E.bool(false))),
        S.return_(E.int(0)),
      ]),
    );
    expect(error.message).toBe("Type mismatch: '<' is not defined for bool");
  });

  it("rejects unknown operators", () => {
    const error = failure(
      mainProgram([S.return_(E.operator("**", E.int(2), E.int(3)))]),
    );
    expect(error.code).toBe("IR011");
    expect(error.message).toBe("Unimplemented operator: '**'");
  });

  it("rejects integer literals outside of int", () => {
    const error = failure(mainProgram([S.return_(E.int(2 ** 31))]));
    expect(error.message).toBe(
      "Type mismatch: integer literal 2147483648 does not fit in int",
    );
  });

  it("rejects non-bool if conditions", () => {
    const error = failure(
      mainProgram([
        S.ifChain([S.branch(E.int(1), [S.return_(E.int(1))])]),
        S.return_(E.int(0)),
      ]),
    );
    expect(error.message).toBe(
      "Type mismatch: condition must be bool, found int",
    );
  });

  it("rejects functions defined twice", () => {
    const error = failure(
      program("test", [
        Declaration.function_("main", [], T.int(), [S.return_(E.int(0))]),
        Declaration.function_("main", [], T.int(), [S.return_(E.int(1))]),
      ]),
    );
    expect(error.code).toBe("IR012");
    expect(error.message).toBe("Function defined more than once: main");
  });
});

describe("unreachable code", () => {
  it("warns once and drops the statements after a return", () => {
    const result = generateModule(
      mainProgram([
        S.return_(E.int(0)),
        S.express(E.call("puts", [E.string("never")]), {
          offset: 12,
          length: 14,
        }),
        S.return_(E.int(1)),
      ]),
    );

    const module = expectSuccess(result);
    expect([...(module.functions.get("main")?.blocks.keys() ?? [])]).toEqual([
      "entry",
    ]);

    const warnings = Result.warnings(result);
    expect(warnings.map(({ code, message, severity, location }) => ({
      code,
      message,
      severity,
      location,
    }))).toEqual([
      {
        code: "IR100",
        message: "Unreachable code",
        severity: Severity.Warning,
        location: { offset: 12, length: 14 },
      },
    ]);
  });
});
