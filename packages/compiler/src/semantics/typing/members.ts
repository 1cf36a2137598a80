import type { SymbolRecord } from "../binder/types.js";
import type { ProgramContext } from "../context.js";
import type { DeclId, TypeId } from "../ids.js";

export interface MemberLookup {
  symbol: Readonly<SymbolRecord>;
  /** Type that declares the member; a superclass for inherited members. */
  owner: DeclId;
}

/** Finds a field, method or enum constant on a type or its superclasses. */
export const findMember = (
  program: ProgramContext,
  decl: DeclId,
  name: string,
): MemberLookup | undefined => {
  for (const owner of [decl, ...program.decls.ancestors(decl)]) {
    const entry = program.decls.getContainer(owner);
    if (!entry) continue;
    const id = entry.symbols.resolveLocal(name, entry.memberScope);
    if (id !== undefined) {
      return { symbol: entry.symbols.getSymbol(id), owner };
    }
  }
  return undefined;
};

/** The named type of a class, struct or enum declaration. */
export const containerType = (
  program: ProgramContext,
  decl: DeclId,
): TypeId | undefined => {
  const entry = program.decls.getContainer(decl);
  if (!entry) return undefined;
  return program.types.named({
    name: entry.node.name.name,
    decl,
    nominal: entry.node.kind,
  });
};
