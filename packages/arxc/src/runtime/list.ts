import * as Ir from "#ir";

import { layoutFields } from "./layout.js";

/**
 * The runtime list record
 *
 *     %List = type { ptr, i32, i32, i64, i1 }
 *
 * Lists are only ever handled through a pointer produced by
 * `core_list_create`.
 */
export const List: Ir.Type.Struct = Ir.Type.struct(
  "List",
  layoutFields([
    { name: "data", type: Ir.Type.pointer(Ir.Type.int8) },
    { name: "length", type: Ir.Type.int32 },
    { name: "elementSize", type: Ir.Type.int32 },
    { name: "reserved", type: Ir.Type.int64 },
    { name: "pointerElements", type: Ir.Type.bool },
  ]),
);

/** Type of every list-typed value */
export const listPointer = Ir.Type.pointer(List);

export const isList = (type: Ir.Type): boolean =>
  Ir.Type.isPointer(type) &&
  Ir.Type.isStruct(type.target) &&
  type.target.name === List.name;

/**
 * Whether values of this type live behind a pointer (strings and lists);
 * such list elements are stored as the pointer itself
 */
export const isPointerShaped = (type: Ir.Type): boolean =>
  Ir.Type.isPointer(type);
