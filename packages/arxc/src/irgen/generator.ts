import type * as Ast from "#ast";
import * as Ir from "#ir";
import { Table } from "#linkage";
import { Result } from "#result";

import { Error as IrgenError } from "#irgen/errors";

import { State } from "./generate/state.js";
import { Process } from "./generate/process.js";
import { buildModule } from "./generate/module.js";

export interface GenerateOptions {
  /** Extern overloads available to qualified calls */
  externs?: Table;
  /** Target triple recorded on the module; the host's when omitted */
  target?: string;
}

/**
 * Generate IR from an AST program (public API)
 *
 * Lowering stops at the first fatal error; warnings collected up to that
 * point are dropped along with the partial module.
 */
export function generateModule(
  program: Ast.Program,
  options: GenerateOptions = {},
): Result<Ir.Module, IrgenError> {
  const initialState = State.initial({
    name: program.name,
    target: options.target ?? Ir.Module.hostTriple(),
    externs: options.externs ?? Table.empty,
  });

  let state: State;
  try {
    ({ state } = Process.run(buildModule(program), initialState));
  } catch (error) {
    if (error instanceof IrgenError) {
      return Result.err(error);
    }
    throw error;
  }

  return Result.okWith(toModule(state.module, program), [...state.warnings]);
}

function toModule(module: State.Module, program: Ast.Program): Ir.Module {
  return {
    name: module.name,
    target: module.target,
    types: new Map(module.types),
    globals: new Map(module.globals),
    declarations: new Map(module.declarations),
    functions: new Map(module.functions),
    ...(program.loc ? { loc: program.loc } : {}),
  };
}
