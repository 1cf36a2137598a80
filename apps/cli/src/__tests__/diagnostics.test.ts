import { describe, expect, it } from "vitest";
import { analyzeSource, diagnosticFromCode, fileStartSpan } from "@weft/compiler";
import { formatCliDiagnostic } from "../diagnostics.js";

const diagnosticsOf = (source: string) => {
  const { diagnostics } = analyzeSource(source, { filePath: "main.wf" });
  return { diagnostics, readSource: () => source };
};

describe("formatCliDiagnostic", () => {
  it("renders the source line with carets under the span", () => {
    const { diagnostics, readSource } = diagnosticsOf("func f() {\n  print(count);\n}");
    const [diagnostic] = diagnostics;
    if (!diagnostic) throw new Error("expected a diagnostic");

    expect(formatCliDiagnostic(diagnostic, { color: false, readSource })).toBe(
      [
        "main.wf:2:9 ERROR [binder] BD0002: undefined symbol 'count'",
        "  |",
        "2 |   print(count);",
        `  | ${" ".repeat(8)}^^^^^`,
      ].join("\n"),
    );
  });

  it("appends hints", () => {
    const { diagnostics, readSource } = diagnosticsOf("let x = 1;\nfunc f() { x = 2; }");
    const [diagnostic] = diagnostics;
    if (!diagnostic) throw new Error("expected a diagnostic");

    const lines = formatCliDiagnostic(diagnostic, { color: false, readSource }).split("\n");
    expect(lines[0]).toBe("main.wf:2:12 ERROR [typing] TY0016: cannot assign to immutable 'x'");
    expect(lines.at(-1)).toBe(
      "  = hint: Declare the binding with 'var' (and without 'final') to allow reassignment.",
    );
  });

  it("renders related notes after the diagnostic", () => {
    const { diagnostics, readSource } = diagnosticsOf("func f() { }\nfunc f() { }");
    const [diagnostic] = diagnostics;
    if (!diagnostic) throw new Error("expected a diagnostic");

    const headers = formatCliDiagnostic(diagnostic, { color: false, readSource })
      .split("\n")
      .filter((line) => line.startsWith("main.wf"));
    expect(headers).toEqual([
      "main.wf:2:6 ERROR [binder] BD0001: 'f' is already declared in this scope",
      "main.wf:1:6 NOTE [binder] BD0001: previous declaration of 'f' is here",
    ]);
  });

  it("prints only the header when the source is unavailable", () => {
    const diagnostic = diagnosticFromCode({
      code: "MD0001",
      params: { kind: "missing-module", path: "net", candidates: [] },
      span: fileStartSpan("gone.wf"),
    });
    expect(formatCliDiagnostic(diagnostic, { color: false, readSource: () => undefined })).toBe(
      "gone.wf:1:1 ERROR [module-graph] MD0001: unable to find module net",
    );
  });

  it("colors the severity and code", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0005",
      params: { kind: "self-outside-type" },
      span: fileStartSpan("gone.wf"),
    });
    const [header] = formatCliDiagnostic(diagnostic, {
      readSource: () => undefined,
    }).split("\n");
    expect(header).toBe(
      "gone.wf:1:1 \u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m [binder] \u001B[35mBD0005\u001B[0m: 'self' can only be used inside a method or constructor",
    );
  });
});
