import type { Diagnostic } from "../diagnostics/index.js";
import type { ModuleExports, ModuleLoader } from "../modules/types.js";
import { parse, type FileNode } from "../parser/index.js";
import type { SymbolTable } from "./binder/symbol-table.js";
import type { SymbolRecord } from "./binder/types.js";
import { bindNames } from "./binding/bind-names.js";
import { collectDeclarations } from "./binding/collect-declarations.js";
import { checkTypes } from "./check-types/index.js";
import {
  createAnalysisContext,
  createProgramContext,
  type AnalysisContext,
  type ProgramContext,
} from "./context.js";
import type { DeclTable } from "./decls.js";
import type { NodeId, ScopeId, SymbolId } from "./ids.js";
import { resolveImports } from "./imports/resolve-imports.js";
import type { MemberLookup } from "./typing/members.js";
import { resolveTypes } from "./typing/resolve-types.js";
import type { TypeArena } from "./typing/type-arena.js";
import type { TypeTable } from "./typing/type-table.js";

export interface SemanticsPipelineResult {
  moduleId: string;
  moduleName: string;
  file: FileNode;
  symbols: SymbolTable;
  moduleScope: ScopeId;
  typeTable: TypeTable;
  types: TypeArena;
  decls: DeclTable;
  exports: ModuleExports;
  /** Parse diagnostics followed by those of the five passes. */
  diagnostics: readonly Diagnostic[];
  resolutions: ReadonlyMap<NodeId, SymbolId>;
  declarations: ReadonlyMap<NodeId, SymbolId>;
  members: ReadonlyMap<NodeId, MemberLookup>;
}

export interface AnalyzeModuleOptions {
  source: string;
  filePath: string;
  moduleName?: string;
  loader?: ModuleLoader;
  program?: ProgramContext;
}

const passes: readonly ((ctx: AnalysisContext) => void)[] = [
  collectDeclarations,
  resolveImports,
  bindNames,
  resolveTypes,
  checkTypes,
];

const collectExports = (ctx: AnalysisContext): ModuleExports => {
  const exports = new Map<string, Readonly<SymbolRecord>>();
  const hidden = new Map<string, Readonly<SymbolRecord>>();
  for (const id of ctx.symbols.symbolsInScope(ctx.moduleScope)) {
    const symbol = ctx.symbols.getSymbol(id);
    const exported = symbol.access === "public" || symbol.access === "default";
    (exported ? exports : hidden).set(symbol.name, symbol);
  }
  return { moduleId: ctx.moduleId, name: ctx.moduleName, exports, hidden };
};

/**
 * Parses one file and runs the semantic passes over it in order. Each pass
 * completes over the whole file before the next starts; errors never stop
 * the pipeline.
 */
export const analyzeModule = ({
  source,
  filePath,
  moduleName,
  loader,
  program = createProgramContext(),
}: AnalyzeModuleOptions): SemanticsPipelineResult => {
  const parsed = parse(source, filePath);
  const ctx = createAnalysisContext({
    file: parsed.file,
    moduleId: filePath,
    ...(moduleName !== undefined ? { moduleName } : {}),
    program,
    ...(loader ? { loader } : {}),
  });

  passes.forEach((pass) => pass(ctx));

  return {
    moduleId: ctx.moduleId,
    moduleName: ctx.moduleName,
    file: ctx.file,
    symbols: ctx.symbols,
    moduleScope: ctx.moduleScope,
    typeTable: ctx.typeTable,
    types: program.types,
    decls: program.decls,
    exports: collectExports(ctx),
    diagnostics: [...parsed.diagnostics, ...ctx.diagnostics.diagnostics],
    resolutions: ctx.resolutions,
    declarations: ctx.declarations,
    members: ctx.members,
  };
};
