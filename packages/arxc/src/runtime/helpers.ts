import * as Ir from "#ir";

import { listPointer } from "./list.js";

/**
 * Runtime entry points the lowering calls directly, by symbol
 */
export enum Helper {
  Alloc = "core_alloc",
  ListCreate = "core_list_create",
  ListLen = "core_list_len",
  ListGet = "core_list_get",
  StringEqual = "core_string_equal",
  StringConcat = "core_string_concat",
}

const bytes = Ir.Type.pointer(Ir.Type.int8);

const signatures: Record<Helper, Ir.Module.Declaration> = {
  [Helper.Alloc]: {
    symbol: Helper.Alloc,
    parameters: [Ir.Type.int64],
    returnType: bytes,
  },
  [Helper.ListCreate]: {
    symbol: Helper.ListCreate,
    parameters: [bytes, Ir.Type.int32, Ir.Type.int32, Ir.Type.bool],
    returnType: listPointer,
  },
  [Helper.ListLen]: {
    symbol: Helper.ListLen,
    parameters: [listPointer],
    returnType: Ir.Type.int32,
  },
  [Helper.ListGet]: {
    symbol: Helper.ListGet,
    parameters: [listPointer, Ir.Type.int32],
    returnType: bytes,
  },
  [Helper.StringEqual]: {
    symbol: Helper.StringEqual,
    parameters: [Ir.Type.string, Ir.Type.string],
    returnType: Ir.Type.bool,
  },
  [Helper.StringConcat]: {
    symbol: Helper.StringConcat,
    parameters: [Ir.Type.string, Ir.Type.string],
    returnType: Ir.Type.string,
  },
};

export const signatureOf = (helper: Helper): Ir.Module.Declaration =>
  signatures[helper];
