import { describe, expect, it } from "vitest";
import { analyzeSource } from "../../compiler.js";

const analyze = (source: string) => analyzeSource(source, { filePath: "test.wf" });

const messages = (source: string): string[] =>
  analyze(source).diagnostics.map((diagnostic) => diagnostic.message);

describe("name binding", () => {
  it("links identifier uses to their declarations", () => {
    const result = analyze("func f(a: i32) { print(a); }");
    const names = [...result.resolutions.values()].map(
      (id) => result.symbols.getSymbol(id).name,
    );
    expect(names).toEqual(["print", "a"]);
  });

  it("reports each undefined name once", () => {
    const source = "func f() { print(missing); print(missing); print(other); }";
    const result = analyze(source);
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["BD0002", "undefined symbol 'missing'"],
      ["BD0002", "undefined symbol 'other'"],
    ]);
  });

  it("reports duplicates with a note at the first declaration", () => {
    const result = analyze("func f() { }\nfunc f() { }");
    expect(result.diagnostics).toHaveLength(1);
    const [duplicate] = result.diagnostics;
    expect(duplicate?.code).toBe("BD0001");
    expect(duplicate?.message).toBe("'f' is already declared in this scope");
    expect(duplicate?.span.startLine).toBe(2);
    expect(duplicate?.related).toHaveLength(1);
    expect(duplicate?.related?.[0]).toMatchObject({
      code: "BD0001",
      severity: "note",
      message: "previous declaration of 'f' is here",
      span: { startLine: 1, startColumn: 6 },
    });
  });

  it("reports duplicate parameters", () => {
    expect(messages("func f(a: i32, a: i32) { }")).toEqual([
      "'a' is already declared in this scope",
    ]);
  });

  it("allows shadowing in nested scopes", () => {
    const source = 'func f(a: i32) { let a = 1; { let a = "s"; } }';
    expect(analyze(source).diagnostics).toEqual([]);
  });

  it("lets functions use globals declared after them", () => {
    const source = "func f() -> i32 { return later; }\nlet later = 1;";
    expect(analyze(source).diagnostics).toEqual([]);
  });

  it("limits break and continue to loops", () => {
    const source = "func f() { break; continue; loop (i: 0..2) { break; } }";
    expect(messages(source)).toEqual([
      "'break' can only be used inside a loop",
      "'continue' can only be used inside a loop",
    ]);
  });

  it("does not carry loop context into nested types", () => {
    const source = `
      class Runner {
        pub func run() { while (true) { continue; } }
        pub func stop() { break; }
      }
    `;
    expect(messages(source)).toEqual(["'break' can only be used inside a loop"]);
  });

  it("limits self to methods and constructors", () => {
    expect(messages("func f() { let s = self; }")).toEqual([
      "'self' can only be used inside a method or constructor",
    ]);
  });

  it("allows one constructor per type", () => {
    const source = "class A { constructor() { } constructor(x: i32) { } }";
    const result = analyze(source);
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["BD0006", "'A' already declares a constructor"],
    ]);
  });

  it("reports unknown types", () => {
    expect(messages("func f(w: Widget) { }")).toEqual(["unknown type 'Widget'"]);
  });

  it("declares members in the type's own scope", () => {
    const source = `
      class Counter { var count -> i32; pub func bump() { count += 1; } }
      enum Light { On, Off }
    `;
    const result = analyze(source);
    expect(result.diagnostics).toEqual([]);
    expect(result.symbols.resolveLocal("count", result.moduleScope)).toBeUndefined();
    expect(result.symbols.resolveLocal("On", result.moduleScope)).toBeUndefined();

    const kinds = [...result.declarations.values()].map((id) => {
      const symbol = result.symbols.getSymbol(id);
      return [symbol.name, symbol.kind];
    });
    expect(kinds).toEqual([
      ["Counter", "class"],
      ["count", "field"],
      ["bump", "method"],
      ["Light", "enum"],
      ["On", "enum-constant"],
      ["Off", "enum-constant"],
    ]);
  });
});
