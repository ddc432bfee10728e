import * as Ir from "#ir";
import type { Table } from "#linkage";

import type { Error as IrgenError } from "../errors.js";

/**
 * Main state for IR generation - immutable and threaded through every
 * lowering process
 */
export interface State {
  readonly module: State.Module; // Module being built incrementally
  readonly function: State.Function; // Current function context
  readonly block: State.Block; // Current block context
  readonly variables: ReadonlyMap<string, State.Variable>; // Flat, per function
  readonly loops: State.Loops; // Loop contexts for break/continue
  readonly counters: State.Counters; // ID generation counters
  readonly externs: Table; // Extern overloads (read-only)
  readonly warnings: readonly IrgenError[]; // Accumulated warnings
}

/**
 * State transition
 */
export type Modify<S> = { kind: "modify"; fn: (state: S) => S };

/**
 * State query
 */
export type Read<S, T> = { kind: "read"; fn: (state: S) => T };

const modify = (fn: (state: State) => State): Modify<State> => ({
  kind: "modify",
  fn,
});

const read = <T>(fn: (state: State) => T): Read<State, T> => ({
  kind: "read",
  fn,
});

export namespace State {
  /**
   * Partially built module
   */
  export interface Module {
    readonly name: string;
    readonly target: string;
    readonly types: ReadonlyMap<string, Ir.Type.Struct>;
    readonly globals: ReadonlyMap<string, Ir.Module.Global>;
    readonly declarations: ReadonlyMap<string, Ir.Module.Declaration>;
    readonly functions: ReadonlyMap<string, Ir.Function>;
    /** Signatures of every function the program defines */
    readonly signatures: ReadonlyMap<string, Signature>;
  }

  export interface Signature {
    readonly parameters: readonly Ir.Type[];
    readonly returnType: Ir.Type;
  }

  /**
   * Current function being built
   */
  export interface Function {
    readonly name: string;
    readonly parameters: readonly Ir.Function.Parameter[];
    readonly returnType: Ir.Type;
    readonly locals: readonly Ir.Function.Local[];
    /** Blocks switched away from, terminated or not */
    readonly blocks: ReadonlyMap<string, Block>;
  }

  /**
   * Current block being built - incomplete until terminator is set
   */
  export interface Block {
    readonly id: string;
    readonly instructions: readonly Ir.Instruction[];
    readonly terminator?: Ir.Block.Terminator;
  }

  /**
   * Binding of a source name to its stack slot
   */
  export interface Variable {
    readonly slot: string;
    readonly type: Ir.Type;
  }

  export interface Loops {
    readonly stack: readonly Loop[];
  }

  export interface Loop {
    readonly continueTarget: string; // Block ID for continue
    readonly breakTarget: string; // Block ID for break
  }

  /**
   * Counters for ID generation
   */
  export interface Counters {
    readonly temp: number; // Temporaries (t0, t1, ...), per function
    readonly block: number; // Block IDs (if_then_1, ...), per function
    readonly local: number; // Slot IDs (x.0, ...), per function
    readonly string: number; // String globals (.str.0, ...), per module
  }

  const emptyFunction: Function = {
    name: "",
    parameters: [],
    returnType: Ir.Type.void_,
    locals: [],
    blocks: new Map(),
  };

  export function initial(options: {
    name: string;
    target: string;
    externs: Table;
  }): State {
    return {
      module: {
        name: options.name,
        target: options.target,
        types: new Map(),
        globals: new Map(),
        declarations: new Map(),
        functions: new Map(),
        signatures: new Map(),
      },
      function: emptyFunction,
      block: { id: "entry", instructions: [] },
      variables: new Map(),
      loops: { stack: [] },
      counters: { temp: 0, block: 1, local: 0, string: 0 },
      externs: options.externs,
      warnings: [],
    };
  }

  export namespace Module {
    export const addType = (type: Ir.Type.Struct) =>
      modify((state) => ({
        ...state,
        module: {
          ...state.module,
          types: new Map([...state.module.types, [type.name, type]]),
        },
      }));

    export const addSignature = (name: string, signature: Signature) =>
      modify((state) => ({
        ...state,
        module: {
          ...state.module,
          signatures: new Map([...state.module.signatures, [name, signature]]),
        },
      }));

    export const signature = (name: string) =>
      read((state) => state.module.signatures.get(name));

    /**
     * Declare an external function unless its symbol is already declared
     */
    export const declare = (declaration: Ir.Module.Declaration) =>
      modify((state) =>
        state.module.declarations.has(declaration.symbol)
          ? state
          : {
              ...state,
              module: {
                ...state.module,
                declarations: new Map([
                  ...state.module.declarations,
                  [declaration.symbol, declaration],
                ]),
              },
            },
      );

    export const declaration = (symbol: string) =>
      read((state) => state.module.declarations.get(symbol));

    export const addGlobal = (global: Ir.Module.Global) =>
      modify((state) => ({
        ...state,
        module: {
          ...state.module,
          globals: new Map([...state.module.globals, [global.name, global]]),
        },
      }));

    export const addFunction = (func: Ir.Function) =>
      modify((state) => ({
        ...state,
        module: {
          ...state.module,
          functions: new Map([...state.module.functions, [func.name, func]]),
        },
      }));

    export const current = () => read((state) => state.module);
  }

  export namespace Function {
    /**
     * Start a fresh function; per-function state is reset
     */
    export const enter = (func: State.Function) =>
      modify((state) => ({
        ...state,
        function: func,
        block: { id: "entry", instructions: [] },
        variables: new Map(),
        loops: { stack: [] },
        counters: {
          ...state.counters,
          temp: func.parameters.length,
          block: 1,
          local: 0,
        },
      }));

    export const addLocal = (local: Ir.Function.Local) =>
      modify((state) => ({
        ...state,
        function: {
          ...state.function,
          locals: [...state.function.locals, local],
        },
      }));

    export const storeBlock = (block: State.Block) =>
      modify((state) => ({
        ...state,
        function: {
          ...state.function,
          blocks: new Map([...state.function.blocks, [block.id, block]]),
        },
      }));

    export const current = () => read((state) => state.function);
  }

  export namespace Block {
    export const emit = (instruction: Ir.Instruction) =>
      modify((state) => {
        if (state.block.terminator) {
          throw new globalThis.Error(
            `Cannot emit into terminated block ${state.block.id}`,
          );
        }
        return {
          ...state,
          block: {
            ...state.block,
            instructions: [...state.block.instructions, instruction],
          },
        };
      });

    export const setTerminator = (terminator: Ir.Block.Terminator) =>
      modify((state) => {
        if (state.block.terminator) {
          throw new globalThis.Error(
            `Block ${state.block.id} is already terminated`,
          );
        }
        return { ...state, block: { ...state.block, terminator } };
      });

    export const terminator = () => read((state) => state.block.terminator);

    export const current = () => read((state) => state.block);

    export const replace = (block: State.Block) =>
      modify((state) => ({ ...state, block }));
  }

  export namespace Variables {
    export const bind = (name: string, variable: Variable) =>
      modify((state) => ({
        ...state,
        variables: new Map([...state.variables, [name, variable]]),
      }));

    export const lookup = (name: string) =>
      read((state) => state.variables.get(name));
  }

  export namespace Loops {
    export const push = (loop: Loop) =>
      modify((state) => ({
        ...state,
        loops: { stack: [...state.loops.stack, loop] },
      }));

    export const pop = () =>
      modify((state) => ({
        ...state,
        loops: { stack: state.loops.stack.slice(0, -1) },
      }));

    export const current = () =>
      read((state) => state.loops.stack.at(-1));
  }

  export namespace Counters {
    export const current = () => read((state) => state.counters);

    export const consume = (counter: keyof Counters) =>
      modify((state) => ({
        ...state,
        counters: { ...state.counters, [counter]: state.counters[counter] + 1 },
      }));
  }

  export namespace Externs {
    export const table = () => read((state) => state.externs);
  }

  export namespace Warnings {
    export const append = (warning: IrgenError) =>
      modify((state) => ({
        ...state,
        warnings: [...state.warnings, warning],
      }));
  }
}
