/**
 * Extern linkage: descriptor files mapping `module.function` overloads to
 * C symbols
 */

export { Table } from "./table.js";
export { type Tag, parseTag, tagOf, typeOf } from "./tags.js";
export { type Descriptor, parseDescriptor } from "./descriptor.js";
export { type LoadOptions, loadExterns } from "./resolver.js";
export { Error, ErrorCode, ErrorMessages } from "./errors.js";
export { default as pass } from "./pass.js";
