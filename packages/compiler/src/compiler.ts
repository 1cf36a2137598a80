import { DiagnosticError, type Diagnostic } from "./diagnostics/index.js";
import { createFsModuleHost } from "./modules/fs-host.js";
import { createModuleLoader } from "./modules/loader.js";
import type { ModuleHost } from "./modules/types.js";
import {
  createProgramContext,
  type ProgramContext,
} from "./semantics/context.js";
import {
  analyzeModule,
  type SemanticsPipelineResult,
} from "./semantics/pipeline.js";

export interface CompileFileOptions {
  /** Defaults to the real file system. */
  host?: ModuleHost;
  /** Directory import paths are resolved against; defaults to the entry's. */
  root?: string;
}

export interface CompileResult {
  entry: SemanticsPipelineResult;
  /** Every analyzed module keyed by absolute file path, entry included. */
  modules: ReadonlyMap<string, SemanticsPipelineResult>;
  program: ProgramContext;
  /** Diagnostics of every module, each reported once. */
  diagnostics: readonly Diagnostic[];
}

/**
 * Analyzes an entry file and every module it imports. Throws a
 * `DiagnosticError` only when the entry itself cannot be found or read.
 */
export const compileFile = (
  filePath: string,
  { host = createFsModuleHost(), root }: CompileFileOptions = {},
): CompileResult => {
  const entryPath = host.path.resolve(filePath);
  const program = createProgramContext();
  const loader = createModuleLoader({
    host,
    root: root ?? host.path.dirname(entryPath),
    analyze: (input) => analyzeModule({ ...input, program }),
  });

  const result = loader.loadFile(entryPath);
  if (!result.ok) {
    const [first] = result.diagnostics;
    if (!first) {
      throw new Error(`unable to load ${entryPath}`);
    }
    throw new DiagnosticError(first, result.diagnostics);
  }

  return {
    entry: result.module,
    modules: loader.modules,
    program,
    diagnostics: result.diagnostics,
  };
};

/** Analyzes a single in-memory source with no module loader attached. */
export const analyzeSource = (
  source: string,
  { filePath = "<memory>", moduleName }: { filePath?: string; moduleName?: string } = {},
): SemanticsPipelineResult =>
  analyzeModule({
    source,
    filePath,
    ...(moduleName !== undefined ? { moduleName } : {}),
  });
