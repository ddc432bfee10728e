import { describe, it, expect } from "vitest";

import { Expression as E, Statement as S, Type as T } from "#ast";
import * as Ir from "#ir";
import * as Runtime from "#runtime";

import { generateModule } from "./generator.js";
import { expectFailure, expectSuccess, mainProgram } from "../../test/helpers.js";

function lower(statements: Parameters<typeof mainProgram>[0]) {
  const module = expectSuccess(generateModule(mainProgram(statements)));
  const main = module.functions.get("main");
  if (!main) {
    throw new Error("main was not generated");
  }
  const block = (id: string): Ir.Block => {
    const found = main.blocks.get(id);
    if (!found) {
      throw new Error(`no block ${id}`);
    }
    return found;
  };
  return { module, main, block };
}

const calls = (block: Ir.Block) =>
  block.instructions.flatMap((inst) => (inst.kind === "call" ? [inst] : []));

describe("list literals", () => {
  it("writes each element at its byte offset and wraps the data", () => {
    const { module, block } = lower([
      S.declare(
        T.list(T.int()),
        "xs",
        E.list([E.int(10), E.int(20), E.int(30)]),
      ),
      S.forIn(T.int(), "x", E.identifier("xs"), [
        S.express(E.call("print_int", [E.identifier("x")])),
      ]),
      S.return_(E.int(0)),
    ]);

    const entry = block("entry");
    const offsets = entry.instructions.flatMap((inst) =>
      inst.kind === "compute_offset" ? [inst.offset] : [],
    );
    expect(offsets).toEqual([
      Ir.Value.constant(0n, Ir.Type.int64),
      Ir.Value.constant(4n, Ir.Type.int64),
      Ir.Value.constant(8n, Ir.Type.int64),
    ]);

    const stored = entry.instructions.flatMap((inst) =>
      inst.kind === "write" && inst.location === "memory" ? [inst.value] : [],
    );
    expect(stored).toEqual([
      Ir.Value.constant(10n, Ir.Type.int32),
      Ir.Value.constant(20n, Ir.Type.int32),
      Ir.Value.constant(30n, Ir.Type.int32),
    ]);

    const [alloc, create] = calls(entry);
    expect(alloc.function).toBe("core_alloc");
    expect(alloc.arguments).toEqual([Ir.Value.constant(12n, Ir.Type.int64)]);
    expect(create.function).toBe("core_list_create");
    expect(create.arguments).toEqual([
      Ir.Value.temp("t0", Ir.Type.pointer(Ir.Type.int8)),
      Ir.Value.constant(3n, Ir.Type.int32),
      Ir.Value.constant(4n, Ir.Type.int32),
      Ir.Value.constant(false, Ir.Type.bool),
    ]);

    expect(calls(block("for_cond_1"))).toMatchObject([
      {
        function: "core_list_len",
        arguments: [Ir.Value.temp("t5", Runtime.listPointer)],
        dest: "t7",
      },
    ]);

    expect([...module.declarations.keys()]).toEqual([
      "core_alloc",
      "core_list_create",
      "core_list_len",
      "core_list_get",
      "print_int",
    ]);
  });

  it("loads scalar elements through the element pointer", () => {
    const { block } = lower([
      S.declare(T.list(T.int()), "xs", E.list([E.int(1)])),
      S.forIn(T.int(), "x", E.identifier("xs"), []),
      S.return_(E.int(0)),
    ]);

    // t0 data, t1 offset, t2 list, t3 xs, t4..t6 condition
    expect(block("for_body_2").instructions.slice(1)).toEqual([
      {
        kind: "call",
        function: "core_list_get",
        arguments: [
          Ir.Value.temp("t3", Runtime.listPointer),
          Ir.Value.temp("t7", Ir.Type.int32),
        ],
        returnType: Ir.Type.pointer(Ir.Type.int8),
        dest: "t8",
        debug: {},
      },
      Ir.Instruction.Read.memory(
        Ir.Value.temp("t8", Ir.Type.pointer(Ir.Type.int8)),
        Ir.Type.int32,
        "t9",
        {},
      ),
      Ir.Instruction.Write.local("x.2", Ir.Value.temp("t9", Ir.Type.int32), {}),
    ]);
  });

  it("uses string and list elements as the pointer itself", () => {
    const { block } = lower([
      S.declareList(
        T.string(),
        "words",
        E.list([E.string("a"), E.string("b")]),
      ),
      S.forIn(T.string(), "w", E.identifier("words"), []),
      S.return_(E.int(0)),
    ]);

    const [alloc, create] = calls(block("entry"));
    expect(alloc.arguments).toEqual([Ir.Value.constant(16n, Ir.Type.int64)]);
    expect(create.arguments.slice(1)).toEqual([
      Ir.Value.constant(2n, Ir.Type.int32),
      Ir.Value.constant(8n, Ir.Type.int32),
      Ir.Value.constant(true, Ir.Type.bool),
    ]);

    const body = block("for_body_2").instructions;
    expect(body.some((inst) => inst.kind === "read" && inst.location === "memory"))
      .toBe(false);
    expect(body.at(-1)).toEqual(
      Ir.Instruction.Write.local("w.2", Ir.Value.temp("t9", Ir.Type.string), {}),
    );
  });

  it("allocates nothing for an empty literal", () => {
    const { block } = lower([
      S.declareList(T.float(), "xs", E.list([])),
      S.return_(E.int(0)),
    ]);

    const [alloc, create] = calls(block("entry"));
    expect(alloc.arguments).toEqual([Ir.Value.constant(0n, Ir.Type.int64)]);
    expect(create.arguments.slice(1)).toEqual([
      Ir.Value.constant(0n, Ir.Type.int32),
      Ir.Value.constant(8n, Ir.Type.int32),
      Ir.Value.constant(false, Ir.Type.bool),
    ]);
  });

  it("binds a non-literal initializer with its own list type", () => {
    const { main } = lower([
      S.declareList(T.int(), "xs", E.list([E.int(1)])),
      S.declareList(T.int(), "ys", E.identifier("xs")),
      S.return_(E.int(0)),
    ]);

    expect(main.locals.map(({ id, type }) => [id, type])).toEqual([
      ["xs.0", Runtime.listPointer],
      ["ys.1", Runtime.listPointer],
    ]);
  });

  it("rejects elements of the wrong type", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.declareList(T.int(), "xs", E.list([E.int(1), E.bool(true)])),
          S.return_(E.int(0)),
        ]),
      ),
    );
    expect(error.code).toBe("IR005");
    expect(error.message).toBe(
      "Type mismatch: list element 2 is bool, expected int",
    );
  });

  it("rejects a list declaration from a scalar", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.declareList(T.int(), "xs", E.int(3)),
          S.return_(E.int(0)),
        ]),
      ),
    );
    expect(error.message).toBe(
      "Type mismatch: cannot initialize list xs with int",
    );
  });

  it("rejects iteration over a scalar", () => {
    const error = expectFailure(
      generateModule(
        mainProgram([
          S.forIn(T.int(), "x", E.int(3), []),
          S.return_(E.int(0)),
        ]),
      ),
    );
    expect(error.message).toBe("Type mismatch: cannot iterate over int");
  });
});
