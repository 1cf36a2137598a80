import { diagnosticFromCode, emitDiagnostic } from "../../diagnostics/index.js";
import type { AnalysisContext } from "../context.js";
import type { ScopeId, SymbolId } from "../ids.js";
import type { SymbolInput } from "./types.js";

/**
 * Declares a symbol, reporting a duplicate with a note at the earlier
 * declaration when the scope already binds the name.
 */
export const declareSymbol = (
  ctx: AnalysisContext,
  symbol: SymbolInput,
  scope: ScopeId = ctx.symbols.currentScope,
): SymbolId | undefined => {
  const result = ctx.symbols.declare(symbol, scope);
  if (result.ok) return result.id;

  const previous = ctx.symbols.getSymbol(result.existing);
  emitDiagnostic({
    ctx,
    code: "BD0001",
    params: { kind: "duplicate-declaration", name: symbol.name },
    span: symbol.span,
    related: [
      diagnosticFromCode({
        code: "BD0001",
        params: { kind: "previous-declaration", name: symbol.name },
        span: previous.span,
        severity: "note",
      }),
    ],
  });
  return undefined;
};
