/**
 * Intermediate representation between the AST and LLVM text
 *
 * A module of functions made of basic blocks. Locals are stack slots read
 * and written by name; every other value is an SSA temporary, a constant or
 * the address of a global.
 */

export * from "./spec/index.js";
export * from "./errors.js";
export * as Analysis from "./analysis/index.js";
export { default as pass } from "./pass.js";
