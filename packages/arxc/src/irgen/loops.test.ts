import { describe, it, expect } from "vitest";

import { Expression as E, Statement as S, Type as T } from "#ast";
import * as Ir from "#ir";

import { generateModule } from "./generator.js";
import { expectFailure, expectSuccess, mainProgram } from "../../test/helpers.js";

function lowerMain(statements: Parameters<typeof mainProgram>[0]) {
  const module = expectSuccess(generateModule(mainProgram(statements)));
  const func = module.functions.get("main");
  if (!func) {
    throw new Error("main was not generated");
  }
  const block = (id: string): Ir.Block => {
    const found = func.blocks.get(id);
    if (!found) {
      throw new Error(`no block ${id}`);
    }
    return found;
  };
  return { module, func, block };
}

describe("loops", () => {
  it("sends continue in a while loop through the continue block", () => {
    const { func, block } = lowerMain([
      S.declare(T.int(), "i", E.int(0)),
      S.while_(E.operator("<", E.identifier("i"), E.int(3)), [
        S.assign("i", E.operator("+", E.identifier("i"), E.int(1))),
        S.continue_(),
      ]),
      S.return_(E.identifier("i")),
    ]);

    expect([...func.blocks.keys()]).toEqual([
      "entry",
      "while_cond_1",
      "while_body_2",
      "while_continue_3",
      "while_end_4",
    ]);
    expect(block("while_body_2").terminator).toMatchObject({
      kind: "jump",
      target: "while_continue_3",
    });
    expect(block("while_continue_3").terminator).toMatchObject({
      kind: "jump",
      target: "while_cond_1",
    });
    expect([...block("while_cond_1").predecessors]).toEqual([
      "entry",
      "while_continue_3",
    ]);
  });

  it("advances the index of a for loop in its continue block", () => {
    const { block } = lowerMain([
      S.declareList(T.int(), "xs", E.list([E.int(1)])),
      S.forIn(T.int(), "x", E.identifier("xs"), [S.continue_()]),
      S.return_(E.int(0)),
    ]);

    expect(block("for_body_2").terminator).toMatchObject({
      kind: "jump",
      target: "for_continue_3",
    });
    expect(block("for_continue_3").instructions).toEqual([
      Ir.Instruction.Read.local("x_index.1", Ir.Type.int32, "t10", {}),
      {
        kind: "binary",
        op: "add",
        left: Ir.Value.temp("t10", Ir.Type.int32),
        right: Ir.Value.constant(1n, Ir.Type.int32),
        dest: "t11",
        type: Ir.Type.int32,
        debug: {},
      },
      Ir.Instruction.Write.local(
        "x_index.1",
        Ir.Value.temp("t11", Ir.Type.int32),
        {},
      ),
    ]);
    expect(block("for_continue_3").terminator).toMatchObject({
      kind: "jump",
      target: "for_cond_1",
    });
  });

  it("breaks out of the innermost loop only", () => {
    const { func, block } = lowerMain([
      S.declareList(T.int(), "xs", E.list([E.int(1)])),
      S.while_(E.bool(true), [
        S.forIn(T.int(), "x", E.identifier("xs"), [S.break_()]),
        S.break_(),
      ]),
      S.return_(E.int(0)),
    ]);

    // Both continue blocks are left without predecessors and dropped
    expect([...func.blocks.keys()]).toEqual([
      "entry",
      "while_cond_1",
      "while_body_2",
      "for_cond_5",
      "for_body_6",
      "for_end_8",
      "while_end_4",
    ]);
    expect(block("for_body_6").terminator).toMatchObject({
      kind: "jump",
      target: "for_end_8",
    });
    expect(block("for_end_8").terminator).toMatchObject({
      kind: "jump",
      target: "while_end_4",
    });
    expect([...block("while_end_4").predecessors]).toEqual([
      "while_cond_1",
      "for_end_8",
    ]);
  });

  it("evaluates the iterable once, before the loop", () => {
    const { block } = lowerMain([
      S.declareList(T.int(), "xs", E.list([E.int(1)])),
      S.forIn(T.int(), "x", E.identifier("xs"), []),
      S.return_(E.int(0)),
    ]);

    const reads = (id: string) =>
      block(id).instructions.flatMap((inst) =>
        inst.kind === "read" && inst.location === "local" ? [inst.name] : [],
      );
    expect(reads("entry")).toEqual(["xs.0"]);
    expect(reads("for_cond_1")).toEqual(["x_index.1"]);
    expect(reads("for_body_2")).toEqual(["x_index.1"]);
  });

  it("requires a bool while condition", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([S.while_(E.int(1), []), S.return_(E.int(0))]),
      ),
    );
    expect(error.code).toBe("IR005");
    expect(error.message).toBe(
      "Type mismatch: condition must be bool, found int",
    );
  });

  it("rejects break outside of a loop", () => {
    const error = expectFailure(
      generateModule(mainProgram([S.break_(), S.return_(E.int(0))])),
    );
    expect(error.code).toBe("IR009");
    expect(error.message).toBe("Loop control outside of a loop: 'break'");
  });

  it("rejects continue after its loop has ended", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.while_(E.bool(false), []),
          S.continue_({ offset: 40, length: 8 }),
          S.return_(E.int(0)),
        ]),
      ),
    );
    expect(error.message).toBe("Loop control outside of a loop: 'continue'");
    expect(error.location).toEqual({ offset: 40, length: 8 });
  });
});
