import { readFileSync } from "node:fs";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@weft/compiler";

export type SourceReader = (path: string) => string | undefined;

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const readSourceFile: SourceReader = (path) => {
  try {
    return readFileSync(path, "utf8");
  } catch {
    return undefined;
  }
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  severity,
  span,
  lineText,
  color,
}: {
  severity: DiagnosticSeverity;
  span: SourceSpan;
  lineText: string;
  color: Colorizer;
}): string => {
  const offset = Math.min(span.startColumn - 1, lineText.length);
  // Multi-line spans are underlined to the end of their first line.
  const lastColumn =
    span.endLine === span.startLine ? span.endColumn : lineText.length + 1;
  const pointerLength = Math.max(1, lastColumn - span.startColumn);
  const gutter = `${span.startLine}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(offset)}${color.pointer(
    severity,
    "^".repeat(pointerLength)
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker}`,
  ].join("\n");
};

const formatLocation = (span: SourceSpan): string =>
  `${span.file}:${span.startLine}:${span.startColumn}`;

/**
 * Renders a diagnostic as a header line, the offending source line with
 * carets under the span, then hints and related notes.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; readSource?: SourceReader } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const readSource = options.readSource ?? readSourceFile;
  const { span, severity } = diagnostic;
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${formatLocation(span)} ${color.severityLabel(
    severity
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;

  const lineText = readSource(span.file)?.split("\n")[span.startLine - 1];
  const snippet =
    lineText === undefined
      ? undefined
      : formatSnippet({
          severity,
          span,
          lineText: lineText.replace(/\r$/, ""),
          color,
        });

  const hints = (diagnostic.hints ?? []).map(
    (hint) => `  = ${color.muted(`hint: ${hint.message}`)}`
  );
  const related = (diagnostic.related ?? []).map((note) =>
    formatCliDiagnostic(note, options)
  );

  return [header, snippet, ...hints, ...related]
    .filter((part): part is string => part !== undefined)
    .join("\n");
};
