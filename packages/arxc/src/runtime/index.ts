/**
 * List/array runtime model: the list record, ABI sizes and the runtime
 * helper functions lowering relies on
 */

export { sizeOf, layoutFields } from "./layout.js";
export { List, listPointer, isList, isPointerShaped } from "./list.js";
export { Helper, signatureOf } from "./helpers.js";
