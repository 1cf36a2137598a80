import type { SourceSpan } from "../../diagnostics/index.js";
import type { Visibility } from "../../parser/index.js";
import type { DeclId, NodeId, ScopeId, SymbolId, TypeId } from "../ids.js";

export type ScopeKind =
  | "prelude"
  | "module"
  | "type"
  | "function"
  | "block"
  | "loop";

export type SymbolKind =
  | "variable"
  | "function"
  | "class"
  | "struct"
  | "enum"
  | "field"
  | "method"
  | "enum-constant";

export type AccessLevel = Visibility;

export interface ScopeInfo {
  id: ScopeId;
  parent: ScopeId | null;
  kind: ScopeKind;
  owner: NodeId;
}

export interface ImportedFrom {
  moduleId: string;
  symbol: SymbolId;
}

export interface SymbolRecord {
  id: SymbolId;
  name: string;
  kind: SymbolKind;
  declaredAt: NodeId;
  scope: ScopeId;
  span: SourceSpan;
  access: AccessLevel;
  mutable: boolean;
  final: boolean;
  /** Filled in by type resolution and, for unannotated locals, by checking. */
  type?: TypeId;
  /** Declaration behind functions, types and globals. */
  decl?: DeclId;
  /** Declaration of the class, struct or enum that owns a member. */
  owner?: DeclId;
  importedFrom?: ImportedFrom;
}

export type SymbolInput = Omit<SymbolRecord, "id" | "scope">;

export type DeclareResult =
  | { ok: true; id: SymbolId }
  | { ok: false; existing: SymbolId };

export interface SymbolTableInit {
  /** Node that owns the root scope, typically the file AST node. */
  rootOwner: NodeId;
}
