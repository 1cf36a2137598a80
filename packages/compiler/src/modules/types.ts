import type { Diagnostic, SourceSpan } from "../diagnostics/index.js";
import type { SymbolRecord } from "../semantics/binder/types.js";

export interface ModulePathAdapter {
  resolve(...parts: string[]): string;
  join(...parts: string[]): string;
  relative(from: string, to: string): string;
  dirname(path: string): string;
}

export interface ModuleHost {
  path: ModulePathAdapter;
  readFile(path: string): string;
  fileExists(path: string): boolean;
}

/** Read-only view of a module's top-level symbols. */
export interface ModuleExports {
  /** Absolute file path of the module. */
  moduleId: string;
  /** Dotted module name, e.g. `geometry.shapes`. */
  name: string;
  exports: ReadonlyMap<string, Readonly<SymbolRecord>>;
  /** Top-level symbols that exist but are not exported. */
  hidden: ReadonlyMap<string, Readonly<SymbolRecord>>;
}

export interface ModuleRequest {
  importer: string;
  span: SourceSpan;
}

export interface ModuleResolution {
  exports?: ModuleExports;
  diagnostics: readonly Diagnostic[];
}

export interface ModuleLoader {
  resolve(path: readonly string[], request: ModuleRequest): ModuleResolution;
}
