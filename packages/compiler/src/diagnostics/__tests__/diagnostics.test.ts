import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  diagnosticCodes,
  diagnosticFromCode,
  emitDiagnostic,
  formatDiagnostic,
  hasErrors,
  type SourceSpan,
} from "../index.js";

const span = (overrides: Partial<SourceSpan> = {}): SourceSpan => ({
  file: "main.wf",
  start: 4,
  end: 7,
  startLine: 2,
  startColumn: 3,
  endLine: 2,
  endColumn: 6,
  ...overrides,
});

describe("diagnostic utilities", () => {
  it("formats diagnostics with the inferred phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0002",
      params: { kind: "undefined-symbol", name: "count" },
      span: span(),
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "main.wf:2:3 ERROR [binder] BD0002: undefined symbol 'count'",
    );
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "TY0016",
      params: { kind: "immutable-assignment", name: "total" },
      span: span(),
    });
    expect(diagnostic.message).toBe("cannot assign to immutable 'total'");
    expect(diagnostic.hints?.[0]?.message).toContain("'var'");
  });

  it("lets callers override the registry severity", () => {
    const note = diagnosticFromCode({
      code: "BD0001",
      params: { kind: "previous-declaration", name: "x" },
      span: span(),
      severity: "note",
    });
    expect(note.severity).toBe("note");
    expect(note.phase).toBe("binder");
    expect(hasErrors([note])).toBe(false);
  });

  it("joins import cycles into a readable chain", () => {
    const diagnostic = diagnosticFromCode({
      code: "MD0002",
      params: { kind: "import-cycle", chain: ["a", "b", "a"] },
      span: span(),
    });
    expect(diagnostic.message).toBe("import cycle detected: a -> b -> a");
    expect(diagnostic.phase).toBe("module-graph");
  });

  it("formats literal suffix problems", () => {
    const diagnostic = diagnosticFromCode({
      code: "TY0015",
      params: { kind: "float-with-integer-suffix", text: "3.14", suffix: "i32" },
      span: span(),
    });
    expect(diagnostic.message).toBe(
      "type mismatch: float literal 3.14 cannot take integer suffix 'i32'",
    );
  });

  it("registers every phase prefix", () => {
    const prefixes = new Set(diagnosticCodes().map((code) => code.slice(0, 2)));
    expect([...prefixes].sort()).toEqual(["BD", "LX", "MD", "PS", "TY"]);
  });
});

describe("DiagnosticEmitter", () => {
  it("collects emitted diagnostics in order", () => {
    const emitter = new DiagnosticEmitter();
    emitDiagnostic({
      ctx: emitter,
      code: "BD0004",
      params: { kind: "jump-outside-loop", keyword: "break" },
      span: span(),
    });
    emitDiagnostic({
      ctx: { diagnostics: emitter },
      code: "BD0005",
      params: { kind: "self-outside-type" },
      span: span(),
    });

    expect(emitter.diagnostics.map((d) => d.code)).toEqual(["BD0004", "BD0005"]);
    expect(emitter.diagnostics[0]?.message).toBe(
      "'break' can only be used inside a loop",
    );
  });

  it("wraps a fatal diagnostic with everything collected before it", () => {
    const earlier = diagnosticFromCode({
      code: "TY0001",
      params: { kind: "unknown-type", name: "Foo" },
      span: span(),
    });
    const fatal = diagnosticFromCode({
      code: "MD0001",
      params: { kind: "missing-module", path: "x", candidates: ["x.wf"] },
      span: span(),
    });

    const error = new DiagnosticError(fatal, [earlier, fatal]);
    expect(error.diagnostic).toBe(fatal);
    expect(error.diagnostics.map((d) => d.code)).toEqual(["TY0001", "MD0001"]);
    expect(error.message).toBe(
      "main.wf:2:3 ERROR [module-graph] MD0001: unable to find module x",
    );
    expect(new DiagnosticError(fatal).diagnostics).toEqual([fatal]);
  });
});
