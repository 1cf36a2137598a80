import {
  diagnosticFromCode,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import { fileStartSpan } from "../parser/index.js";
import type {
  ModuleExports,
  ModuleHost,
  ModuleLoader,
  ModuleRequest,
  ModuleResolution,
} from "./types.js";

export const SOURCE_EXTENSION = ".wf";
export const MODULE_ENTRY_FILE = `main${SOURCE_EXTENSION}`;

export interface AnalyzedModule {
  exports: ModuleExports;
  /** The module's own diagnostics plus those of modules it loaded first. */
  diagnostics: readonly Diagnostic[];
}

export interface AnalyzeModuleInput {
  source: string;
  filePath: string;
  moduleName: string;
  loader: ModuleLoader;
}

export type LoadResult<T> =
  | { ok: true; module: T; diagnostics: readonly Diagnostic[] }
  | { ok: false; diagnostics: readonly Diagnostic[] };

export interface ProgramLoader<T extends AnalyzedModule> extends ModuleLoader {
  /** Loads a module by file path, e.g. the entry file of a compilation. */
  loadFile(filePath: string): LoadResult<T>;
  readonly modules: ReadonlyMap<string, T>;
}

const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Maps dotted import paths to files under `root` and analyzes each file once.
 * Modules still being analyzed form the active import chain; a request for
 * one of them is a cycle.
 */
export const createModuleLoader = <T extends AnalyzedModule>({
  host,
  root,
  analyze,
}: {
  host: ModuleHost;
  root: string;
  analyze: (input: AnalyzeModuleInput) => T;
}): ProgramLoader<T> => {
  const rootDir = host.path.resolve(root);
  const modules = new Map<string, T>();
  const active: { filePath: string; name: string }[] = [];

  const candidatesFor = (segments: readonly string[]): string[] => [
    host.path.join(rootDir, ...segments) + SOURCE_EXTENSION,
    host.path.join(rootDir, ...segments, MODULE_ENTRY_FILE),
  ];

  const moduleNameOf = (filePath: string): string => {
    const segments = host.path
      .relative(rootDir, filePath)
      .replace(/\.wf$/, "")
      .split(/[\\/]/)
      .filter(Boolean);
    if (segments.length > 1 && segments.at(-1) === "main") {
      segments.pop();
    }
    return segments.join(".");
  };

  const load = (
    filePath: string,
    name: string,
    span: SourceSpan,
  ): LoadResult<T> => {
    const cached = modules.get(filePath);
    if (cached) {
      return { ok: true, module: cached, diagnostics: [] };
    }

    let source: string;
    try {
      source = host.readFile(filePath);
    } catch (error) {
      return {
        ok: false,
        diagnostics: [
          diagnosticFromCode({
            code: "MD0003",
            params: {
              kind: "unreadable-module",
              path: filePath,
              reason: formatErrorMessage(error),
            },
            span,
          }),
        ],
      };
    }

    active.push({ filePath, name });
    try {
      const module = analyze({ source, filePath, moduleName: name, loader });
      modules.set(filePath, module);
      return { ok: true, module, diagnostics: module.diagnostics };
    } finally {
      active.pop();
    }
  };

  const resolve = (
    path: readonly string[],
    request: ModuleRequest,
  ): ModuleResolution => {
    const name = path.join(".");
    const candidates = candidatesFor(path);
    const filePath = candidates.find((candidate) => host.fileExists(candidate));
    if (!filePath) {
      return {
        diagnostics: [
          diagnosticFromCode({
            code: "MD0001",
            params: { kind: "missing-module", path: name, candidates },
            span: request.span,
          }),
        ],
      };
    }

    const cycleStart = active.findIndex((entry) => entry.filePath === filePath);
    if (cycleStart >= 0) {
      const chain = [...active.slice(cycleStart).map((entry) => entry.name), name];
      return {
        diagnostics: [
          diagnosticFromCode({
            code: "MD0002",
            params: { kind: "import-cycle", chain },
            span: request.span,
          }),
        ],
      };
    }

    const result = load(filePath, name, request.span);
    return result.ok
      ? { exports: result.module.exports, diagnostics: result.diagnostics }
      : { diagnostics: result.diagnostics };
  };

  const loadFile = (filePath: string): LoadResult<T> => {
    const resolved = host.path.resolve(filePath);
    if (!host.fileExists(resolved)) {
      return {
        ok: false,
        diagnostics: [
          diagnosticFromCode({
            code: "MD0001",
            params: {
              kind: "missing-module",
              path: resolved,
              candidates: [resolved],
            },
            span: fileStartSpan(resolved),
          }),
        ],
      };
    }
    return load(resolved, moduleNameOf(resolved), fileStartSpan(resolved));
  };

  const loader: ProgramLoader<T> = { resolve, loadFile, modules };
  return loader;
};
