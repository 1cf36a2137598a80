import { describe, expect, it } from "vitest";
import {
  formatTypeNode,
  type Decl,
  type Expr,
  type FileNode,
  type Stmt,
} from "../ast/nodes.js";
import { parse } from "../parser.js";

/** Fully parenthesized rendering so tests can assert grouping. */
const show = (expr: Expr): string => {
  switch (expr.kind) {
    case "identifier":
      return expr.name;
    case "self":
      return "self";
    case "literal":
      return expr.text;
    case "unary":
      return expr.fixity === "prefix"
        ? `(${expr.operator}${show(expr.operand)})`
        : `(${show(expr.operand)}${expr.operator})`;
    case "binary":
      return `(${show(expr.left)} ${expr.operator} ${show(expr.right)})`;
    case "assignment":
      return `(${show(expr.target)} = ${show(expr.value)})`;
    case "compound-assignment":
      return `(${show(expr.target)} ${expr.operator} ${show(expr.value)})`;
    case "call":
      return `${show(expr.callee)}(${expr.args.map(show).join(", ")})`;
    case "index":
      return `${show(expr.target)}[${show(expr.index)}]`;
    case "member":
      return `${show(expr.target)}.${expr.member.name}`;
    case "projection":
      return `${show(expr.target)}.(${expr.fields
        .map((field) =>
          field.alias ? `${field.name.name} as ${field.alias.name}` : field.name.name,
        )
        .join(", ")})`;
    case "cast":
      return `(${show(expr.expr)} as ${formatTypeNode(expr.type)})`;
    case "ternary":
      return `(${show(expr.condition)} ? ${show(expr.whenTrue)} : ${show(expr.whenFalse)})`;
    case "array-literal":
      return `[${expr.elements.map(show).join(", ")}]`;
    case "struct-literal":
      return `${expr.name.name} { ${expr.fields
        .map((field) => `${field.name.name}: ${show(field.value)}`)
        .join(", ")} }`;
  }
};

const bodyOf = (file: FileNode): readonly Stmt[] => {
  const [decl] = file.declarations;
  if (decl?.kind !== "function") throw new Error("expected a function");
  return decl.body.statements;
};

const parseBody = (source: string) => {
  const { file, diagnostics } = parse(`func f() { ${source} }`, "test.wf");
  return { statements: bodyOf(file), diagnostics };
};

const expr = (source: string): string => {
  const { statements, diagnostics } = parseBody(`${source};`);
  expect(diagnostics).toEqual([]);
  const [statement] = statements;
  if (statement?.kind !== "expression") throw new Error("expected an expression");
  return show(statement.expression);
};

const messages = (source: string) =>
  parse(source, "test.wf").diagnostics.map((d) => [d.code, d.message]);

const firstDecl = (source: string): Decl => {
  const { file, diagnostics } = parse(source, "test.wf");
  expect(diagnostics).toEqual([]);
  const [decl] = [...file.imports, ...file.declarations];
  if (!decl) throw new Error("expected a declaration");
  return decl;
};

describe("expressions", () => {
  it("binds multiplication tighter than addition", () => {
    expect(expr("1 + 2 * 3")).toBe("(1 + (2 * 3))");
  });

  it("associates binary operators to the left", () => {
    expect(expr("a - b - c")).toBe("((a - b) - c)");
  });

  it("orders logical and comparison operators", () => {
    expect(expr("a || b && c == d")).toBe("(a || (b && (c == d)))");
    expect(expr("a or b and c < d + 1")).toBe("(a || (b && (c < (d + 1))))");
  });

  it("binds casts tighter than binary operators", () => {
    expect(expr("x as i64 + 1")).toBe("((x as i64) + 1)");
  });

  it("reads a trailing ? after a cast as a nullable type", () => {
    expect(expr("a as i32?")).toBe("(a as i32?)");
    expect(expr("c as bool ? 1 : 2")).toBe("((c as bool) ? 1 : 2)");
  });

  it("nests ternaries to the right", () => {
    expect(expr("a ? b : c ? d : e")).toBe("(a ? b : (c ? d : e))");
  });

  it("chains assignments to the right", () => {
    expect(expr("x = y = 3")).toBe("(x = (y = 3))");
    expect(expr("total += price * 2")).toBe("(total += (price * 2))");
  });

  it("parses unary and postfix operators", () => {
    expect(expr("-a * b")).toBe("((-a) * b)");
    expect(expr("!done")).toBe("(!done)");
    expect(expr("i++")).toBe("(i++)");
  });

  it("parses calls, members and indexing", () => {
    expect(expr("items[i].scale(2, factor)")).toBe("items[i].scale(2, factor)");
    expect(expr("self.origin.x")).toBe("self.origin.x");
  });

  it("parses projections with aliases", () => {
    expect(expr("point.(x, y as height)")).toBe("point.(x, y as height)");
  });

  it("parses struct and array literals", () => {
    expect(expr("Point { x: 1, y: 2 }")).toBe("Point { x: 1, y: 2 }");
    expect(expr("[1, 2, 3]")).toBe("[1, 2, 3]");
  });
});

describe("statements", () => {
  it("parses variables with annotations and modifiers", () => {
    const { statements } = parseBody("final var limit -> i64 = 10; let name = \"x\";");
    const [limit, name] = statements;
    expect(limit).toMatchObject({
      kind: "variable",
      name: { name: "limit" },
      mutable: false,
      final: true,
      type: { kind: "named-type", name: "i64" },
    });
    expect(name).toMatchObject({ kind: "variable", mutable: false, final: false });
  });

  it("parses if chains", () => {
    const { statements } = parseBody(
      "if (a) { x(); } elif (b) { y(); } else if (c) { z(); }",
    );
    const [statement] = statements;
    if (statement?.kind !== "if") throw new Error("expected if");
    expect(statement.elifs).toHaveLength(1);
    expect(statement.otherwise?.statements[0]?.kind).toBe("if");
  });

  it("parses counted loops", () => {
    const { statements } = parseBody(
      "loop (i: 0..=10 step 2 rev) { } rev loop (j: 0..n) { }",
    );
    expect(statements[0]).toMatchObject({
      kind: "loop",
      variable: { name: "i" },
      inclusive: true,
      reverse: true,
    });
    expect(statements[0]).toHaveProperty("step");
    expect(statements[1]).toMatchObject({ kind: "loop", inclusive: false, reverse: true });
    expect(statements[1]).not.toHaveProperty("step");
  });

  it("parses for and do-while loops", () => {
    const { statements, diagnostics } = parseBody(
      "for (var i = 0; i < 3; i++) { continue; } do { break; } while (x);",
    );
    expect(diagnostics).toEqual([]);
    expect(statements.map((s) => s.kind)).toEqual(["for", "do-while"]);
  });
});

describe("declarations", () => {
  it("parses classes with members", () => {
    const decl = firstDecl(`
      pub final class Circle : Shape {
        prot var radius -> f64 = 1.0;
        let label -> string;
        count -> i32;
        constructor(r: f64) { self.radius = r; }
        pub func area() -> f64 { return radius * radius; }
      }
    `);
    if (decl.kind !== "class") throw new Error("expected a class");
    expect(decl.visibility).toBe("public");
    expect(decl.final).toBe(true);
    expect(decl.superclass?.kind === "named-type" && decl.superclass.name).toBe("Shape");
    expect(
      decl.fields.map((field) => [field.name.name, field.mutable, field.visibility]),
    ).toEqual([
      ["radius", true, "protected"],
      ["label", false, "default"],
      ["count", true, "default"],
    ]);
    expect(decl.constructors[0]?.params.map((p) => p.name.name)).toEqual(["r"]);
    expect(decl.methods[0]?.returnType).toMatchObject({ name: "f64" });
  });

  it("reads a constructor without modifiers as a constructor", () => {
    const { file, diagnostics } = parse("class A { constructor() { } }", "test.wf");
    expect(diagnostics).toEqual([]);
    const [decl] = file.declarations;
    if (decl?.kind !== "class") throw new Error("expected a class");
    expect(decl.constructors).toHaveLength(1);
    expect(decl.constructors[0]?.params).toEqual([]);
  });

  it("parses enum constants before members", () => {
    const decl = firstDecl(
      "enum Color { Red(1), Green(2); constructor(code: i32) { } }",
    );
    if (decl.kind !== "enum") throw new Error("expected an enum");
    expect(decl.constants.map((c) => [c.name.name, c.args?.length])).toEqual([
      ["Red", 1],
      ["Green", 1],
    ]);
    expect(decl.constructors).toHaveLength(1);

    const flags = firstDecl("enum Flag { On, Off }");
    if (flags.kind !== "enum") throw new Error("expected an enum");
    expect(flags.constants.map((c) => c.args)).toEqual([undefined, undefined]);
  });

  it("parses nested array and nullable types", () => {
    const decl = firstDecl("func f(grid: i32[][], label: string?) { }");
    if (decl.kind !== "function") throw new Error("expected a function");
    expect(decl.params.map((p) => formatTypeNode(p.type))).toEqual([
      "i32[][]",
      "string?",
    ]);
  });

  it("parses every import form", () => {
    const { file, diagnostics } = parse(
      [
        "import geometry.shapes as s;",
        "import geometry::{area, perimeter as per};",
        "import geometry.shapes::*;",
        "pub import io;",
      ].join("\n"),
      "test.wf",
    );
    expect(diagnostics).toEqual([]);
    const [alias, group, wildcard, bare] = file.imports;
    expect(alias?.path.map((p) => p.name)).toEqual(["geometry", "shapes"]);
    expect(alias?.form).toMatchObject({ kind: "symbol", alias: { name: "s" } });
    expect(group?.form).toMatchObject({
      kind: "group",
      entries: [{ name: { name: "area" } }, { name: { name: "perimeter" }, alias: { name: "per" } }],
    });
    expect(wildcard?.form).toEqual({ kind: "wildcard" });
    expect(bare?.visibility).toBe("public");
    expect(bare?.form).toEqual({ kind: "symbol" });
  });

  it("records the module declaration", () => {
    const { file } = parse("mod geometry.shapes;\nfunc f() { }", "test.wf");
    expect(file.module?.path).toEqual(["geometry", "shapes"]);
    expect(file.declarations).toHaveLength(1);
  });
});

describe("diagnostics and recovery", () => {
  it("rejects assignment to non-targets", () => {
    expect(messages("func f() { 1 = x; }")).toEqual([
      [
        "PS0002",
        "invalid target for '=': only identifiers and member accesses can be assigned",
      ],
    ]);
  });

  it("reports a missing semicolon once", () => {
    expect(messages("func f() { let x = 1 }")).toEqual([
      ["PS0001", "expected ';' but found '}'"],
    ]);
  });

  it("keeps parsing after a broken statement", () => {
    const { file, diagnostics } = parse(
      "func f() { let = 1; ok(); } func g() { }",
      "test.wf",
    );
    expect(diagnostics.map((d) => d.message)).toEqual([
      "expected variable name but found '='",
    ]);
    expect(file.declarations.map((d) => d.kind === "function" && d.name.name)).toEqual([
      "f",
      "g",
    ]);
    expect(bodyOf(file)).toHaveLength(1);
  });

  it("skips stray tokens between declarations", () => {
    const { file, diagnostics } = parse("42; func g() { }", "test.wf");
    expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["PS0003", "expected a declaration but found number literal 42"],
    ]);
    expect(file.declarations).toHaveLength(1);
  });

  it("reports modifiers with nothing to modify", () => {
    expect(messages("pub 42;")).toEqual([
      ["PS0003", "modifier 'pub' must be followed by a declaration, found number literal 42"],
    ]);
  });

  it("rejects final on imports but keeps the import", () => {
    const { file, diagnostics } = parse("final import io;", "test.wf");
    expect(diagnostics.map((d) => d.message)).toEqual([
      "modifier 'final' cannot be applied to an import",
    ]);
    expect(file.imports).toHaveLength(1);
  });

  it("requires the module declaration first", () => {
    expect(messages("import a;\nmod b;")).toEqual([
      ["PS0007", "module declaration must come before all other declarations"],
    ]);
    expect(messages("mod a;\nmod b;")).toEqual([
      ["PS0007", "a file can only declare its module once"],
    ]);
  });

  it("rejects empty projections with a hint", () => {
    const { diagnostics } = parse("func f() { p.(); }", "test.wf");
    expect(diagnostics.map((d) => d.message)).toEqual([
      "projection must select at least one field",
    ]);
    expect(diagnostics[0]?.hints?.[0]?.message).toBe(
      "Projections take the form value.(field, other as alias).",
    );
  });

  it("reports missing expressions and types", () => {
    expect(messages("func f() { return ); }")).toEqual([
      ["PS0006", "expected an expression but found ')'"],
    ]);
    expect(messages("var x -> 5;")).toEqual([
      ["PS0008", "expected a type but found number literal 5"],
    ]);
  });

  it("sorts lexical and syntax diagnostics by position", () => {
    const { diagnostics } = parse(
      'func f() { let x = 1 } func g() { "\\q"; }',
      "test.wf",
    );
    expect(diagnostics.map((d) => d.code)).toEqual(["PS0001", "LX0003"]);
  });

  it("reports diagnostics at 1-based positions", () => {
    const { diagnostics } = parse("func f() {\n  let x = 1\n}", "test.wf");
    expect(diagnostics[0]?.span).toMatchObject({ startLine: 3, startColumn: 1 });
  });

  it("gets through a file of stray punctuation", () => {
    const { file, diagnostics } = parse(") ] ; , :: ( } { ..", "test.wf");
    expect(file.declarations).toEqual([]);
    expect(diagnostics.length).toBeGreaterThan(0);
    expect(diagnostics.every((d) => d.code.startsWith("PS"))).toBe(true);
  });
});
