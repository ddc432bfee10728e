import type * as Ast from "#ast";
import * as Ir from "#ir";
import * as Runtime from "#runtime";

import {
  Error as IrgenError,
  ErrorCode,
  assertExhausted,
} from "#irgen/errors";

import { State, type Modify, type Read } from "./state.js";

/**
 * Generator type for IR operations
 * - Yields Action commands
 * - Returns final value of type T
 * - Receives State back after peek operations
 */
export type Process<T> = Generator<Process.Action, T, State>;

export namespace Process {
  /**
   * Operation types that can be yielded from generators
   */
  export type Action =
    | { type: "modify"; fn: (state: State) => State }
    | { type: "peek" };

  export namespace Instructions {
    /**
     * Emit an instruction to the current block
     */
    export const emit = lift(State.Block.emit);
  }

  /**
   * Block operations for managing basic blocks in the IR
   */
  export namespace Blocks {
    /**
     * Set the terminator for the current block
     */
    export const terminate = lift(State.Block.setTerminator);

    export const currentTerminator = lift(State.Block.terminator);

    export function* isTerminated(): Process<boolean> {
      return (yield* currentTerminator()) !== undefined;
    }

    export function* currentId(): Process<string> {
      return (yield* lift(State.Block.current)()).id;
    }

    /**
     * Create a new block ID; the block exists once it is switched to
     */
    export function* create(prefix: string): Process<string> {
      const { block } = yield* lift(State.Counters.current)();
      yield* lift(State.Counters.consume)("block");
      return `${prefix}_${block}`;
    }

    /**
     * Switch to a different block, saving the current one to the function
     */
    export function* switchTo(blockId: string): Process<void> {
      yield* syncCurrent();

      const func = yield* lift(State.Function.current)();
      const existing = func.blocks.get(blockId);
      yield* lift(State.Block.replace)(
        existing ?? { id: blockId, instructions: [] },
      );
    }

    /**
     * Save the current block to the function, terminated or not
     */
    export function* syncCurrent(): Process<void> {
      const block = yield* lift(State.Block.current)();
      yield* lift(State.Function.storeBlock)(block);
    }

    export function* jump(
      target: string,
      loc: Ast.SourceLocation | null = null,
    ): Process<void> {
      yield* terminate({
        kind: "jump",
        target,
        debug: Ir.Instruction.debugAt(loc),
      });
    }

    export function* branch(
      condition: Ir.Value,
      trueTarget: string,
      falseTarget: string,
      loc: Ast.SourceLocation | null = null,
    ): Process<void> {
      yield* terminate({
        kind: "branch",
        condition,
        trueTarget,
        falseTarget,
        debug: Ir.Instruction.debugAt(loc),
      });
    }

    export function* ret(
      value: Ir.Value | undefined,
      loc: Ast.SourceLocation | null = null,
    ): Process<void> {
      yield* terminate({
        kind: "return",
        value,
        debug: Ir.Instruction.debugAt(loc),
      });
    }
  }

  /**
   * Variables live in stack slots; temporaries are SSA values
   */
  export namespace Variables {
    /**
     * Generate a new temporary variable ID
     */
    export function* newTemp(): Process<string> {
      const { temp } = yield* lift(State.Counters.current)();
      yield* lift(State.Counters.consume)("temp");
      return `t${temp}`;
    }

    /**
     * Allocate a fresh slot for a name without binding it
     */
    export function* allocate(
      name: string,
      type: Ir.Type,
      loc: Ast.SourceLocation | null = null,
    ): Process<State.Variable> {
      const { local } = yield* lift(State.Counters.current)();
      yield* lift(State.Counters.consume)("local");

      const slot = `${name}.${local}`;
      yield* lift(State.Function.addLocal)({
        id: slot,
        name,
        type,
        ...(loc ? { loc } : {}),
      });
      return { slot, type };
    }

    /**
     * Allocate a slot and bind the name to it, replacing any earlier
     * binding along with its type
     */
    export function* declare(
      name: string,
      type: Ir.Type,
      loc: Ast.SourceLocation | null = null,
    ): Process<State.Variable> {
      const variable = yield* allocate(name, type, loc);
      yield* lift(State.Variables.bind)(name, variable);
      return variable;
    }

    export const lookup = lift(State.Variables.lookup);

    /**
     * Look up a binding, failing when the name is not bound
     */
    export function* resolve(
      name: string,
      loc: Ast.SourceLocation | null,
    ): Process<State.Variable> {
      const variable = yield* lookup(name);
      if (!variable) {
        throw new IrgenError(
          ErrorCode.UNDEFINED_VARIABLE,
          name,
          loc ?? undefined,
        );
      }
      return variable;
    }

    export function* load(
      variable: State.Variable,
      loc: Ast.SourceLocation | null = null,
    ): Process<Ir.Value> {
      const dest = yield* newTemp();
      yield* Instructions.emit(
        Ir.Instruction.Read.local(
          variable.slot,
          variable.type,
          dest,
          Ir.Instruction.debugAt(loc),
        ),
      );
      return Ir.Value.temp(dest, variable.type);
    }

    export function* store(
      variable: State.Variable,
      value: Ir.Value,
      loc: Ast.SourceLocation | null = null,
    ): Process<void> {
      yield* Instructions.emit(
        Ir.Instruction.Write.local(
          variable.slot,
          value,
          Ir.Instruction.debugAt(loc),
        ),
      );
    }
  }

  /**
   * Control flow context management
   */
  export namespace ControlFlow {
    /**
     * Enter a loop context
     */
    export const enterLoop = lift(State.Loops.push);

    /**
     * Exit the current loop context
     */
    export const exitLoop = lift(State.Loops.pop);

    /**
     * Get the current loop context
     */
    export const currentLoop = lift(State.Loops.current);
  }

  /**
   * Calls, declarations and module-level data
   */
  export namespace Calls {
    /**
     * Emit a call; void calls produce a void constant that no other
     * operation accepts
     */
    export function* emit(
      symbol: string,
      args: Ir.Value[],
      returnType: Ir.Type,
      loc: Ast.SourceLocation | null = null,
    ): Process<Ir.Value> {
      const debug = Ir.Instruction.debugAt(loc);
      if (returnType.kind === "void") {
        yield* Instructions.emit({
          kind: "call",
          function: symbol,
          arguments: args,
          returnType,
          debug,
        });
        return Ir.Value.constant(0n, returnType);
      }

      const dest = yield* Variables.newTemp();
      yield* Instructions.emit({
        kind: "call",
        function: symbol,
        arguments: args,
        returnType,
        dest,
        debug,
      });
      return Ir.Value.temp(dest, returnType);
    }

    /**
     * Declare (once) and call a runtime helper
     */
    export function* runtime(
      helper: Runtime.Helper,
      args: Ir.Value[],
      loc: Ast.SourceLocation | null = null,
    ): Process<Ir.Value> {
      const declaration = Runtime.signatureOf(helper);
      yield* Modules.declare(declaration);
      return yield* emit(helper, args, declaration.returnType, loc);
    }
  }

  export namespace Modules {
    export const current = lift(State.Module.current);

    /**
     * Declare an external function, memoized by symbol
     */
    export const declare = lift(State.Module.declare);

    export const declaration = lift(State.Module.declaration);

    export const signature = lift(State.Module.signature);

    export const addSignature = lift(State.Module.addSignature);

    export const addType = lift(State.Module.addType);

    export const addFunction = lift(State.Module.addFunction);

    /**
     * A fresh NUL-terminated global for one string literal
     */
    export function* internString(text: string): Process<Ir.Value> {
      const { string: index } = yield* lift(State.Counters.current)();
      yield* lift(State.Counters.consume)("string");

      const encoded = new TextEncoder().encode(text);
      const bytes = new Uint8Array(encoded.length + 1);
      bytes.set(encoded);

      const name = `.str.${index}`;
      yield* lift(State.Module.addGlobal)({
        name,
        type: Ir.Type.array(Ir.Type.int8, bytes.length),
        bytes,
      });
      return Ir.Value.global(name, Ir.Type.string);
    }
  }

  export namespace Functions {
    /**
     * Start lowering a function: reset per-function state and bind
     * parameters as SSA temps `t0..tn`
     */
    export function* initialize(
      name: string,
      parameters: { name: string; type: Ir.Type; loc?: Ast.SourceLocation }[],
      returnType: Ir.Type,
    ): Process<Ir.Function.Parameter[]> {
      const irParameters = parameters.map(
        (param, index): Ir.Function.Parameter => ({
          ...param,
          tempId: `t${index}`,
        }),
      );

      yield* lift(State.Function.enter)({
        name,
        parameters: irParameters,
        returnType,
        locals: [],
        blocks: new Map(),
      });

      return irParameters;
    }

    export const current = lift(State.Function.current);
  }

  export namespace Externs {
    export const table = lift(State.Externs.table);
  }

  export namespace Warnings {
    export const report = lift(State.Warnings.append);
  }

  /**
   * Run a process with an initial state
   */
  export function run<T>(
    process: Process<T>,
    initialState: State,
  ): { state: State; value: T } {
    let state = initialState;
    let next = process.next(state);

    while (!next.done) {
      const action = next.value;

      switch (action.type) {
        case "modify": {
          state = action.fn(state);
          next = process.next(state);
          break;
        }
        case "peek": {
          next = process.next(state);
          break;
        }
        default:
          assertExhausted(action);
      }
    }

    return { state, value: next.value };
  }
}

// Overloaded signatures for different return types
function lift<A extends readonly unknown[]>(
  fn: (...args: A) => Modify<State>,
): (...args: A) => Process<void>;

function lift<T, A extends readonly unknown[]>(
  fn: (...args: A) => Read<State, T>,
): (...args: A) => Process<T>;

// Implementation
function lift<T, A extends readonly unknown[]>(
  fn: (...args: A) => Modify<State> | Read<State, T>,
) {
  return function* (...args: A): Process<T | void> {
    const result = fn(...args);

    switch (result.kind) {
      case "modify":
        yield { type: "modify", fn: result.fn };
        return;
      case "read":
        return result.fn(yield { type: "peek" });
      default:
        assertExhausted(result);
    }
  };
}
