import { describe, it, expect } from "vitest";

import {
  Declaration,
  Expression as E,
  Statement as S,
  Type as T,
  program,
} from "#ast";
import * as Ir from "#ir";
import { Table, parseDescriptor } from "#linkage";

import { generateModule } from "./generator.js";
import { expectFailure, expectSuccess, mainProgram } from "../../test/helpers.js";

const entryOf = (module: Ir.Module, name = "main"): Ir.Block => {
  const entry = module.functions.get(name)?.blocks.get("entry");
  if (!entry) {
    throw new Error(`no entry block in ${name}`);
  }
  return entry;
};

const callsIn = (block: Ir.Block) =>
  block.instructions.flatMap((inst) => (inst.kind === "call" ? [inst] : []));

const double = Declaration.function_(
  "double",
  [Declaration.parameter("x", T.int())],
  T.int(),
  [S.return_(E.operator("*", E.identifier("x"), E.int(2)))],
);

const externs = Table.merge(
  Table.empty,
  parseDescriptor(
    [
      "[meta]",
      "name = m",
      "",
      "[functions]",
      "f:int,int = sym_ii > int",
      "f:str = sym_s > void",
    ].join("\n"),
    "m.map",
  ),
).table;

describe("calls", () => {
  it("calls a function defined later with its own signature", () => {
    const module = expectSuccess(
      generateModule(
        program("test", [
          Declaration.function_("main", [], T.int(), [
            S.return_(E.call("double", [E.int(21)])),
          ]),
          double,
        ]),
      ),
    );

    expect(entryOf(module).instructions).toEqual([
      {
        kind: "call",
        function: "double",
        arguments: [Ir.Value.constant(21n, Ir.Type.int32)],
        returnType: Ir.Type.int32,
        dest: "t0",
        debug: {},
      },
    ]);
    expect(module.declarations.size).toBe(0);
  });

  it("checks the argument count of program functions", () => {
    const error = expectFailure(
      generateModule(
        program("test", [
          double,
          Declaration.function_("main", [], T.int(), [
            S.return_(E.call("double", [E.int(1), E.int(2)])),
          ]),
        ]),
      ),
    );
    expect(error.message).toBe(
      "Type mismatch: double takes 1 arguments but 2 were given",
    );
  });

  it("checks the argument types of program functions", () => {
    const error = expectFailure(
      generateModule(
        program("test", [
          double,
          Declaration.function_("main", [], T.int(), [
            S.return_(E.call("double", [E.bool(true)])),
          ]),
        ]),
      ),
    );
    expect(error.message).toBe(
      "Type mismatch: argument 1 of double expects int, found bool",
    );
  });

  it("declares an unknown bare callee from its first call", () => {
    const module = expectSuccess(
      generateModule(
        mainProgram([
          S.express(E.call("puts", [E.string("hi")])),
          S.express(E.call("puts", [E.string("hi")])),
          S.return_(E.int(0)),
        ]),
      ),
    );

    expect(module.declarations.get("puts")).toEqual({
      symbol: "puts",
      parameters: [Ir.Type.string],
      returnType: Ir.Type.int32,
    });
    expect([...module.globals.values()]).toEqual([
      {
        name: ".str.0",
        type: Ir.Type.array(Ir.Type.int8, 3),
        bytes: Uint8Array.from([104, 105, 0]),
      },
      {
        name: ".str.1",
        type: Ir.Type.array(Ir.Type.int8, 3),
        bytes: Uint8Array.from([104, 105, 0]),
      },
    ]);
    expect(callsIn(entryOf(module)).map((call) => call.arguments)).toEqual([
      [Ir.Value.global(".str.0", Ir.Type.string)],
      [Ir.Value.global(".str.1", Ir.Type.string)],
    ]);
  });

  it("rejects a callee that is not a function name", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([S.express(E.call("1bad", [])), S.return_(E.int(0))]),
      ),
    );
    expect(error.code).toBe("IR002");
    expect(error.message).toBe("Unknown function: '1bad' is not a function name");
  });

  it("rejects void values as arguments", () => {
    const error = expectFailure(
      generateModule(
        program("test", [
          Declaration.function_("log", [], T.void_(), [S.return_()]),
          Declaration.function_("main", [], T.int(), [
            S.express(E.call("puts", [E.call("log", [])])),
            S.return_(E.int(0)),
          ]),
        ]),
      ),
    );
    expect(error.message).toBe(
      "Type mismatch: a void value cannot be used as an argument",
    );
  });

  it("emits void calls without a destination", () => {
    const module = expectSuccess(
      generateModule(
        program("test", [
          Declaration.function_("log", [], T.void_(), [S.return_()]),
          Declaration.function_("main", [], T.int(), [
            S.express(E.call("log", [])),
            S.return_(E.int(0)),
          ]),
        ]),
      ),
    );
    const [call] = callsIn(entryOf(module));
    expect(call.dest).toBeUndefined();
    expect(call.returnType).toEqual(Ir.Type.void_);
  });
});

describe("extern calls", () => {
  it("selects overloads by argument tags and declares each symbol once", () => {
    const module = expectSuccess(
      generateModule(
        mainProgram([
          S.express(E.methodCall("m", "f", [E.int(1), E.int(2)])),
          S.express(E.methodCall("m", "f", [E.string("x")])),
          S.express(E.methodCall("m", "f", [E.int(3), E.int(4)])),
          S.return_(E.int(0)),
        ]),
        { externs },
      ),
    );

    expect([...module.declarations.values()]).toEqual([
      {
        symbol: "sym_ii",
        parameters: [Ir.Type.int32, Ir.Type.int32],
        returnType: Ir.Type.int32,
      },
      { symbol: "sym_s", parameters: [Ir.Type.string], returnType: Ir.Type.void_ },
    ]);
    expect(
      callsIn(entryOf(module)).map((call) => [call.function, call.dest]),
    ).toEqual([
      ["sym_ii", "t0"],
      ["sym_s", undefined],
      ["sym_ii", "t1"],
    ]);
  });

  it("lists the candidates when no overload matches", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.express(E.methodCall("m", "f", [E.int(1), E.string("x")])),
          S.return_(E.int(0)),
        ]),
        { externs },
      ),
    );
    expect(error.code).toBe("IR004");
    expect(error.message).toBe(
      "No matching overload: m.f(int, str); candidates are (int, int), (str)",
    );
  });

  it("reports unknown extern functions", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.express(E.methodCall("m", "g", [])),
          S.return_(E.int(0)),
        ]),
        { externs },
      ),
    );
    expect(error.code).toBe("IR003");
    expect(error.message).toBe("Extern function not found: m.g");
  });
});

describe("string operators", () => {
  it("lowers comparisons and concatenation to runtime calls", () => {
    const module = expectSuccess(
      generateModule(
        mainProgram([
          S.declare(T.bool(), "same", E.operator("==", E.string("a"), E.string("a"))),
          S.declare(T.bool(), "diff", E.operator("!=", E.string("a"), E.string("b"))),
          S.declare(T.string(), "both", E.operator("+", E.string("a"), E.string("b"))),
          S.return_(E.int(0)),
        ]),
      ),
    );

    expect([...module.globals.keys()]).toEqual([".str.0", ".str.1"]);
    expect([...module.declarations.keys()]).toEqual([
      "core_string_equal",
      "core_string_concat",
    ]);

    const entry = entryOf(module);
    expect(callsIn(entry).map((call) => call.function)).toEqual([
      "core_string_equal",
      "core_string_equal",
      "core_string_concat",
    ]);
    expect(
      entry.instructions.filter((inst) => inst.kind === "binary"),
    ).toEqual([
      {
        kind: "binary",
        op: "eq",
        left: Ir.Value.temp("t1", Ir.Type.bool),
        right: Ir.Value.constant(false, Ir.Type.bool),
        dest: "t2",
        type: Ir.Type.bool,
        debug: {},
      },
    ]);
  });

  it("rejects ordering of strings", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.declare(T.bool(), "lt", E.operator("<", E.string("a"), E.string("b"))),
          S.return_(E.int(0)),
        ]),
      ),
    );
    expect(error.message).toBe("Type mismatch: '<' is not defined for string");
  });
});
