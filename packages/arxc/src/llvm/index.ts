export { Emitter, hexDouble, opcode } from "./emitter.js";
export { default as pass } from "./pass.js";
