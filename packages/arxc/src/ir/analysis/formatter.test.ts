import { describe, it, expect } from "vitest";

import * as Ir from "../spec/index.js";
import { Formatter } from "./formatter.js";

const block = (
  id: string,
  instructions: Ir.Instruction[],
  terminator: Ir.Block.Terminator,
  predecessors: string[] = [],
): Ir.Block => ({ id, instructions, terminator, predecessors: new Set(predecessors) });

describe("Formatter", () => {
  it("formats a module with globals, declarations and locals", () => {
    const module = Ir.Module.create("demo", "x86_64-pc-linux-gnu");
    module.globals.set(".str.0", {
      name: ".str.0",
      type: Ir.Type.array(Ir.Type.int8, 3),
      bytes: Uint8Array.from([104, 10, 0]),
    });
    module.declarations.set("puts", {
      symbol: "puts",
      parameters: [Ir.Type.string],
      returnType: Ir.Type.int32,
    });
    module.functions.set("main", {
      name: "main",
      parameters: [],
      returnType: Ir.Type.int32,
      locals: [{ id: "x.0", name: "x", type: Ir.Type.int32 }],
      entry: "entry",
      blocks: new Map([
        [
          "entry",
          block(
            "entry",
            [
              Ir.Instruction.Write.local(
                "x.0",
                Ir.Value.constant(1n, Ir.Type.int32),
                {},
              ),
              Ir.Instruction.Read.local("x.0", Ir.Type.int32, "t0", {}),
              {
                kind: "call",
                function: "puts",
                arguments: [Ir.Value.global(".str.0", Ir.Type.string)],
                returnType: Ir.Type.int32,
                dest: "t1",
                debug: {},
              },
            ],
            { kind: "jump", target: "exit", debug: {} },
          ),
        ],
        [
          "exit",
          block(
            "exit",
            [],
            {
              kind: "return",
              value: Ir.Value.temp("t0", Ir.Type.int32),
              debug: {},
            },
            ["entry"],
          ),
        ],
      ]),
    });

    expect(new Formatter().format(module).split("\n")).toEqual([
      "module demo (target x86_64-pc-linux-gnu) {",
      '  global .str.0: [3 x i8] = c"h\\0A\\00"',
      "  declare puts(i8*) -> i32",
      "  ",
      "  function main() -> i32 {",
      "    locals {",
      "      x.0: i32",
      "    }",
      "    entry:",
      '      write.local name="x.0", value=1',
      '      %t0: i32 = read.local name="x.0"',
      "      %t1: i32 = call puts(@.str.0)",
      "      jump exit",
      "    exit:",
      "      return %t0",
      "  }",
      "}",
    ]);
  });

  it("lists predecessors of merge points and prints whole floats", () => {
    const module = Ir.Module.create("demo");
    const two = Ir.Value.constant(2, Ir.Type.float64);
    module.functions.set("pick", {
      name: "pick",
      parameters: [{ name: "c", type: Ir.Type.bool, tempId: "t0" }],
      returnType: Ir.Type.float64,
      locals: [],
      entry: "entry",
      blocks: new Map([
        [
          "entry",
          block("entry", [], {
            kind: "branch",
            condition: Ir.Value.temp("t0", Ir.Type.bool),
            trueTarget: "a",
            falseTarget: "b",
            debug: {},
          }),
        ],
        ["a", block("a", [], { kind: "jump", target: "end", debug: {} }, ["entry"])],
        ["b", block("b", [], { kind: "jump", target: "end", debug: {} }, ["entry"])],
        [
          "end",
          block("end", [], { kind: "return", value: two, debug: {} }, ["b", "a"]),
        ],
      ]),
    });

    const lines = new Formatter().format(module).split("\n");
    expect(lines).toContain("  function pick(^t0: i1) -> double {");
    expect(lines).toContain("    entry:");
    expect(lines).toContain("      branch %t0 ? a : b");
    expect(lines).toContain("    end preds=[a, b]:");
    expect(lines).toContain("      return 2.0");
    expect(lines.filter((line) => line.endsWith(":"))).toEqual([
      "    entry:",
      "    b:",
      "    a:",
      "    end preds=[a, b]:",
    ]);
  });
});
