import { DiagnosticEmitter } from "../diagnostics/index.js";
import type { FileNode } from "../parser/index.js";
import type { ModuleLoader } from "../modules/types.js";
import { SymbolTable } from "./binder/symbol-table.js";
import { DeclTable } from "./decls.js";
import type { DeclId, NodeId, ScopeId, SymbolId } from "./ids.js";
import { declarePrelude } from "./prelude.js";
import type { MemberLookup } from "./typing/members.js";
import { createTypeArena, type TypeArena } from "./typing/type-arena.js";
import { createTypeTable, type TypeTable } from "./typing/type-table.js";

/** State shared by every module of one compilation. */
export interface ProgramContext {
  decls: DeclTable;
  types: TypeArena;
}

export const createProgramContext = (): ProgramContext => ({
  decls: new DeclTable(),
  types: createTypeArena(),
});

/** Everything the five passes read and write while analyzing one file. */
export interface AnalysisContext {
  moduleId: string;
  moduleName: string;
  file: FileNode;
  program: ProgramContext;
  symbols: SymbolTable;
  /** Scope holding the module's top-level declarations and imports. */
  moduleScope: ScopeId;
  typeTable: TypeTable;
  diagnostics: DiagnosticEmitter;
  loader?: ModuleLoader;
  /** Identifier, struct literal and type-name nodes to the symbol they name. */
  resolutions: Map<NodeId, SymbolId>;
  /** Declaring nodes (parameters, locals, loops, members) to their symbol. */
  declarations: Map<NodeId, SymbolId>;
  /** Top-level and member declaration nodes to their arena entry. */
  declIds: Map<NodeId, DeclId>;
  /** Member and static access nodes to the member they select. */
  members: Map<NodeId, MemberLookup>;
}

export const createAnalysisContext = ({
  file,
  moduleId = file.path,
  moduleName = file.module?.path.join(".") ?? "",
  program = createProgramContext(),
  loader,
}: {
  file: FileNode;
  moduleId?: string;
  moduleName?: string;
  program?: ProgramContext;
  loader?: ModuleLoader;
}): AnalysisContext => {
  const symbols = new SymbolTable({ rootOwner: file.id });
  declarePrelude(symbols, program.types, file);
  const moduleScope = symbols.enter("module", file.id);

  return {
    moduleId,
    moduleName,
    file,
    program,
    symbols,
    moduleScope,
    typeTable: createTypeTable(),
    diagnostics: new DiagnosticEmitter(),
    ...(loader ? { loader } : {}),
    resolutions: new Map(),
    declarations: new Map(),
    declIds: new Map(),
    members: new Map(),
  };
};
