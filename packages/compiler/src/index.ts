export * from "./diagnostics/index.js";
export * from "./parser/index.js";
export {
  analyzeSource,
  compileFile,
  type CompileFileOptions,
  type CompileResult,
} from "./compiler.js";
export {
  analyzeModule,
  type AnalyzeModuleOptions,
  type SemanticsPipelineResult,
} from "./semantics/pipeline.js";
export {
  createAnalysisContext,
  createProgramContext,
  type AnalysisContext,
  type ProgramContext,
} from "./semantics/context.js";
export { SymbolTable } from "./semantics/binder/symbol-table.js";
export type {
  AccessLevel,
  ScopeKind,
  SymbolKind,
  SymbolRecord,
} from "./semantics/binder/types.js";
export { DeclTable, type DeclEntry } from "./semantics/decls.js";
export type { DeclId, ScopeId, SymbolId, TypeId } from "./semantics/ids.js";
export {
  createTypeArena,
  type TypeArena,
  type TypeDescriptor,
} from "./semantics/typing/type-arena.js";
export { isAssignable, unifyTypes } from "./semantics/typing/assignability.js";
export { widerNumeric } from "./semantics/typing/numeric.js";
export {
  createModuleLoader,
  MODULE_ENTRY_FILE,
  SOURCE_EXTENSION,
  type ProgramLoader,
} from "./modules/loader.js";
export { createFsModuleHost } from "./modules/fs-host.js";
export { createMemoryModuleHost } from "./modules/memory-host.js";
export {
  createNodePathAdapter,
  createPosixPathAdapter,
} from "./modules/node-path-adapter.js";
export type {
  ModuleExports,
  ModuleHost,
  ModuleLoader,
  ModulePathAdapter,
} from "./modules/types.js";
