import { emitDiagnostic, type SourceSpan } from "../../diagnostics/index.js";
import type { Identifier, ImportDecl } from "../../parser/index.js";
import type { ModuleExports } from "../../modules/types.js";
import { declareSymbol } from "../binder/declare.js";
import type { SymbolRecord } from "../binder/types.js";
import type { AnalysisContext } from "../context.js";

interface ImportRequest {
  module: readonly string[];
  /** `undefined` imports every export of the module. */
  names?: readonly { name: Identifier; alias?: Identifier }[];
}

const requestOf = (decl: ImportDecl): ImportRequest => {
  const segments = decl.path.map((segment) => segment.name);
  switch (decl.form.kind) {
    case "wildcard":
      return { module: segments };
    case "group":
      return { module: segments, names: decl.form.entries };
    case "symbol": {
      if (segments.length === 1) return { module: segments };
      const name = decl.path[decl.path.length - 1];
      if (!name) return { module: segments };
      const { alias } = decl.form;
      return {
        module: segments.slice(0, -1),
        names: [alias ? { name, alias } : { name }],
      };
    }
  }
};

/**
 * Second pass: loads each imported module and merges the requested exports
 * into the module scope. The imported module's table is only read.
 */
export const resolveImports = (ctx: AnalysisContext): void => {
  ctx.file.imports.forEach((decl) => resolveImport(ctx, decl));
};

const resolveImport = (ctx: AnalysisContext, decl: ImportDecl): void => {
  const request = requestOf(decl);
  const resolution = ctx.loader?.resolve(request.module, {
    importer: ctx.moduleId,
    span: decl.span,
  });

  if (!resolution) {
    emitDiagnostic({
      ctx,
      code: "MD0001",
      params: {
        kind: "missing-module",
        path: request.module.join("."),
        candidates: [],
      },
      span: decl.span,
    });
    return;
  }

  ctx.diagnostics.addAll(resolution.diagnostics);
  const { exports } = resolution;
  if (!exports) return;

  if (!request.names) {
    exports.exports.forEach((symbol, name) =>
      importSymbol(ctx, decl, exports, symbol, name, decl.span),
    );
    return;
  }

  request.names.forEach(({ name, alias }) => {
    const symbol = lookupExport(ctx, exports, name);
    if (symbol) {
      const local = alias ?? name;
      importSymbol(ctx, decl, exports, symbol, local.name, local.span);
    }
  });
};

const lookupExport = (
  ctx: AnalysisContext,
  exports: ModuleExports,
  name: Identifier,
): Readonly<SymbolRecord> | undefined => {
  const exported = exports.exports.get(name.name);
  if (exported) return exported;

  const hidden = exports.hidden.get(name.name);
  emitDiagnostic({
    ctx,
    code: "BD0003",
    params: hidden
      ? {
          kind: "hidden-export",
          moduleName: exports.name,
          name: name.name,
          access: hidden.access,
        }
      : { kind: "not-exported", moduleName: exports.name, name: name.name },
    span: name.span,
  });
  return undefined;
};

const importSymbol = (
  ctx: AnalysisContext,
  decl: ImportDecl,
  exports: ModuleExports,
  symbol: Readonly<SymbolRecord>,
  localName: string,
  span: SourceSpan,
): void => {
  const origin = symbol.importedFrom ?? {
    moduleId: exports.moduleId,
    symbol: symbol.id,
  };

  // Importing the same symbol twice under one name is harmless.
  const existing = ctx.symbols.resolveLocal(localName, ctx.moduleScope);
  if (existing !== undefined) {
    const previous = ctx.symbols.getSymbol(existing).importedFrom;
    if (
      previous?.moduleId === origin.moduleId &&
      previous.symbol === origin.symbol
    ) {
      return;
    }
  }

  declareSymbol(
    ctx,
    {
      name: localName,
      kind: symbol.kind,
      declaredAt: decl.id,
      span,
      // Only `pub import` passes the name on to importers of this module.
      access: decl.visibility === "public" ? "public" : "private",
      mutable: symbol.mutable,
      final: symbol.final,
      ...(symbol.type === undefined ? {} : { type: symbol.type }),
      ...(symbol.decl === undefined ? {} : { decl: symbol.decl }),
      importedFrom: origin,
    },
    ctx.moduleScope,
  );
};
