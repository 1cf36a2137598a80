export * from "./types.js";
export * from "./registry.js";

import type {
  Diagnostic,
  DiagnosticHint,
  DiagnosticInput,
  DiagnosticPhase,
  DiagnosticSeverity,
  SourceSpan,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePhasePrefixes: Record<string, DiagnosticPhase> = {
  LX: "lexing",
  PS: "parsing",
  MD: "module-graph",
  BD: "binder",
  TY: "typing",
};

const inferPhase = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>,
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    related: options.related,
    severity: options.severity ?? definition.severity,
    phase: options.phase ?? definition.phase,
    hints: options.hints ?? definition.hints,
  });
};

type DiagnosticsCarrier = DiagnosticEmitter | { diagnostics: DiagnosticEmitter };

export type EmitDiagnosticOptions<K extends DiagnosticCode> =
  RegistryDiagnosticOptions<K> & { ctx: DiagnosticsCarrier };

const getEmitter = (carrier: DiagnosticsCarrier): DiagnosticEmitter =>
  carrier instanceof DiagnosticEmitter ? carrier : carrier.diagnostics;

/** Records a registry diagnostic on the carrier and keeps going. */
export const emitDiagnostic = <K extends DiagnosticCode>(
  options: EmitDiagnosticOptions<K>,
): Diagnostic => {
  const { ctx, ...rest } = options;
  return getEmitter(ctx).add(diagnosticFromCode(rest));
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const { span } = diagnostic;
  const location = `${span.file}:${span.startLine}:${span.startColumn}`;
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${location} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((diagnostic) => diagnostic.severity === "error");

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;
  diagnostics: readonly Diagnostic[];

  constructor(diagnostic: Diagnostic, diagnostics?: readonly Diagnostic[]) {
    super(formatDiagnostic(diagnostic));
    this.diagnostic = diagnostic;
    this.diagnostics =
      diagnostics && diagnostics.length > 0 ? [...diagnostics] : [diagnostic];
  }
}

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  add(diagnostic: Diagnostic): Diagnostic {
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  addAll(diagnostics: Iterable<Diagnostic>): void {
    for (const diagnostic of diagnostics) {
      this.#diagnostics.push(diagnostic);
    }
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}
