export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "lexing"
  | "parsing"
  | "module-graph"
  | "binder"
  | "typing";

/**
 * A source range. `start` and `end` are character offsets (end exclusive);
 * lines and columns are 1-based and describe the same range.
 */
export interface SourceSpan {
  file: string;
  start: number;
  end: number;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};
