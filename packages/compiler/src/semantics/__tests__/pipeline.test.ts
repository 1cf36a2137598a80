import { describe, expect, it } from "vitest";
import { analyzeSource } from "../../compiler.js";
import { createProgramContext } from "../context.js";
import { analyzeModule } from "../pipeline.js";

describe("analyzeModule", () => {
  it("exports public and default top-level symbols", () => {
    const result = analyzeModule({
      source: "pub func a() { }\npriv func b() { }\nlet c = 1;",
      filePath: "m.wf",
      moduleName: "m",
    });
    expect(result.exports.name).toBe("m");
    expect(result.exports.moduleId).toBe("m.wf");
    expect([...result.exports.exports.keys()]).toEqual(["a", "c"]);
    expect([...result.exports.hidden.keys()]).toEqual(["b"]);
  });

  it("takes the module name from a mod declaration", () => {
    expect(analyzeSource("mod geometry.shapes;\nlet x = 1;").moduleName).toBe(
      "geometry.shapes",
    );
  });

  it("keeps running the passes after a parse error", () => {
    const result = analyzeSource("func f() { let x = 1 }\nfunc g() { print(y); }");
    expect(result.diagnostics.map((d) => d.code)).toEqual(["PS0001", "BD0002"]);
  });

  it("records a type for every checked expression", () => {
    const result = analyzeSource("let x = 1 + 2.5;");
    const [decl] = result.file.declarations;
    if (decl?.kind !== "global" || !decl.variable.initializer) {
      throw new Error("expected a global with an initializer");
    }
    const { initializer } = decl.variable;
    const type = result.typeTable.getNodeType(initializer.id);
    expect(type === undefined ? undefined : result.types.format(type)).toBe("f64");
  });

  it("shares declarations and types across modules of one program", () => {
    const program = createProgramContext();
    const first = analyzeModule({ source: "struct P { x -> i32; }", filePath: "a.wf", program });
    const second = analyzeModule({ source: "struct Q { y -> i32; }", filePath: "b.wf", program });

    expect(first.decls).toBe(second.decls);
    expect(first.types).toBe(second.types);
    expect(first.types.format(first.types.primitive("i32"))).toBe("i32");
  });
});
