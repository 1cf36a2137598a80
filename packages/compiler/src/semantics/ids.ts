/**
 * Shared identifier aliases consumed by the binder and typing passes. These
 * are intentionally opaque so downstream code cannot depend on their
 * underlying representation.
 */
export type { NodeId } from "../parser/index.js";
export type ScopeId = number;
export type SymbolId = number;
export type DeclId = number;
export type TypeId = number;

export type {
  SourceSpan,
  DiagnosticSeverity,
  Diagnostic,
  DiagnosticPhase,
} from "../diagnostics/index.js";
