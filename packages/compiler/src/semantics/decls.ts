import type {
  ContainerDecl,
  FunctionDecl,
  GlobalDecl,
} from "../parser/index.js";
import type { SymbolTable } from "./binder/symbol-table.js";
import type { DeclId, ScopeId, TypeId } from "./ids.js";

interface DeclEntryBase {
  id: DeclId;
  moduleId: string;
  /** Table of the module that owns the declaration. */
  symbols: SymbolTable;
}

export interface FunctionDeclEntry extends DeclEntryBase {
  kind: "function";
  node: FunctionDecl;
}

export interface GlobalDeclEntry extends DeclEntryBase {
  kind: "global";
  node: GlobalDecl;
}

export interface ContainerDeclEntry extends DeclEntryBase {
  kind: "container";
  node: ContainerDecl;
  memberScope: ScopeId;
  /** Parameter types of the first constructor, once resolved. */
  constructorParams?: readonly TypeId[];
  superclass?: DeclId;
}

export type DeclEntry = FunctionDeclEntry | GlobalDeclEntry | ContainerDeclEntry;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

export type DeclEntryInput = DistributiveOmit<DeclEntry, "id">;

/**
 * Program-wide declaration store. Types refer to their declarations by id so
 * imported classes and enums can be inspected from any module.
 */
export class DeclTable {
  private readonly entries: DeclEntry[] = [];

  register(input: DeclEntryInput): DeclEntry {
    const entry: DeclEntry = { ...input, id: this.entries.length };
    this.entries.push(entry);
    return entry;
  }

  get(id: DeclId): DeclEntry {
    const entry = this.entries[id];
    if (!entry) {
      throw new Error(`declaration ${id} does not exist`);
    }
    return entry;
  }

  getContainer(id: DeclId): ContainerDeclEntry | undefined {
    const entry = this.get(id);
    return entry.kind === "container" ? entry : undefined;
  }

  setConstructorParams(id: DeclId, params: readonly TypeId[]): void {
    const entry = this.getContainer(id);
    if (entry) entry.constructorParams = [...params];
  }

  setSuperclass(id: DeclId, superclass: DeclId): void {
    const entry = this.getContainer(id);
    if (entry) entry.superclass = superclass;
  }

  /** Superclass chain of a class, nearest first, stopping at a repeat. */
  ancestors(id: DeclId): DeclId[] {
    const chain: DeclId[] = [];
    const seen = new Set<DeclId>([id]);
    let current = this.getContainer(id)?.superclass;
    while (current !== undefined && !seen.has(current)) {
      chain.push(current);
      seen.add(current);
      current = this.getContainer(current)?.superclass;
    }
    return chain;
  }

  isSubclassOf(id: DeclId, ancestor: DeclId): boolean {
    return id === ancestor || this.ancestors(id).includes(ancestor);
  }
}
