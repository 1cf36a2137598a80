import { fileStartSpan, type FileNode } from "../parser/index.js";
import type { SymbolTable } from "./binder/symbol-table.js";
import type { TypeArena } from "./typing/type-arena.js";

/** Declares the built-in functions into the root scope of a module table. */
export const declarePrelude = (
  symbols: SymbolTable,
  types: TypeArena,
  file: FileNode,
): void => {
  symbols.declare(
    {
      name: "print",
      kind: "function",
      declaredAt: file.id,
      span: fileStartSpan(file.path),
      access: "public",
      mutable: false,
      final: true,
      type: types.fn([types.unknown], types.void),
    },
    symbols.rootScope,
  );
};
