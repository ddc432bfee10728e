export { Type } from "./type.js";
export { Value } from "./value.js";
export { Instruction } from "./instruction.js";
export { Block } from "./block.js";
export type { Function } from "./function.js";
export { Module } from "./module.js";
