/**
 * Arx AST: node definitions and JSON decoding
 */

export * from "./spec.js";
export { decode } from "./decode.js";
