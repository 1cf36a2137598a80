import { describe, expect, it } from "vitest";
import { analyzeSource } from "../../compiler.js";

const analyze = (source: string) => analyzeSource(source, { filePath: "test.wf" });

const messages = (source: string): string[] =>
  analyze(source).diagnostics.map((diagnostic) => diagnostic.message);

const globalTypes = (source: string, ...names: string[]): string[] => {
  const result = analyze(source);
  return names.map((name) => {
    const id = result.symbols.resolveLocal(name, result.moduleScope);
    if (id === undefined) throw new Error(`no global named ${name}`);
    const type = result.symbols.getSymbol(id).type;
    return type === undefined ? "<none>" : result.types.format(type);
  });
};

describe("type checker", () => {
  it("accepts a well-typed program", () => {
    const source = `
      struct Point { x -> i32; y -> i32; }
      class Shape { pub func area() -> f64 { return 0.0; } }
      class Circle : Shape {
        let radius -> f64;
        constructor(radius: f64) { self.radius = radius; }
        pub func area() -> f64 { return radius * radius * 3.14; }
      }
      func main() {
        let origin = Point { x: 0, y: 0 };
        let shape -> Shape = Circle(2.0);
        var total = 0;
        loop (i: 0..10 step 2) { total += i; }
        for (var j = 0; j < 3; j++) { total = total + j; }
        let maybe -> Circle? = null;
        print(shape.area());
        print(origin.x + total);
      }
    `;
    expect(analyze(source).diagnostics).toEqual([]);
  });

  describe("numeric literals", () => {
    it("defaults and widens numeric types", () => {
      const source = `
        let a = 1;
        let b = 2.5;
        let c = 1i8 + 2i32;
        let d = 5u32 + 1i32;
        let e = 2f32 * 3i64;
        let f = -128i8;
      `;
      expect(globalTypes(source, "a", "b", "c", "d", "e", "f")).toEqual([
        "i32",
        "f64",
        "i32",
        "i32",
        "f32",
        "i8",
      ]);
    });

    it("rejects integer suffixes on floats", () => {
      expect(messages("let x = 3.14i32;")).toEqual([
        "type mismatch: float literal 3.14i32 cannot take integer suffix 'i32'",
      ]);
    });

    it("range-checks suffixed integers including their sign", () => {
      expect(messages("let a = 300u8; let b = -129i8; let c = 255u8;")).toEqual([
        "literal 300u8 does not fit in u8",
        "literal -129i8 does not fit in i8",
      ]);
    });

    it("reports unknown suffixes", () => {
      expect(messages("let x = 5q;")).toEqual(["unknown numeric suffix 'q' on 5q"]);
    });
  });

  describe("expressions", () => {
    it("unifies ternary branches", () => {
      const source = `
        let a = true ? 1 : 2.5;
        let b = true ? "n" : 1;
        let c = false ? "s" : "t";
      `;
      expect(globalTypes(source, "a", "b", "c")).toEqual(["f64", "string", "string"]);
    });

    it("rejects branches that differ by nullability or class", () => {
      const source = `
        class A { }
        class B : A { }
        let n = true ? null : 1i32;
        let m = true ? B() : A();
        let s -> string? = "s";
        let o = false ? s : "t";
      `;
      expect(messages(source)).toEqual([
        "ternary branches have incompatible types null and i32",
        "ternary branches have incompatible types B and A",
        "ternary branches have incompatible types string? and string",
      ]);
      expect(globalTypes(source, "n", "m", "o")).toEqual(["unknown", "unknown", "unknown"]);
    });

    it("unifies suffixed ternary branches", () => {
      const source = 'let a = true ? 1i32 : 2.0f64; let b = true ? "a" : 1i32;';
      expect(globalTypes(source, "a", "b")).toEqual(["f64", "string"]);
    });

    it("reports incompatible ternary branches", () => {
      expect(messages('let t = true ? "a" : true;')).toEqual([
        "ternary branches have incompatible types string and bool",
      ]);
    });

    it("concatenates strings with printable values", () => {
      expect(globalTypes('let s = "n: " + 4;', "s")).toEqual(["string"]);
      expect(messages('let bad = true + 1; let flag = "s" + true; let ch = "s" + \'c\';')).toEqual([
        "operator '+' cannot be applied to bool and i32",
        "operator '+' cannot be applied to string and bool",
        "operator '+' cannot be applied to string and char",
      ]);
    });

    it("types arrays, indexing and length", () => {
      const source = `
        let xs = [1, 2];
        let len = xs.length;
        let first = xs[0];
        let ch = "abc"[1];
        let mixed = [1, 2.5];
        let words = [1, "a"];
      `;
      expect(globalTypes(source, "xs", "len", "first", "ch", "mixed", "words")).toEqual([
        "i32[]",
        "i32",
        "i32",
        "char",
        "f64[]",
        "string[]",
      ]);
    });

    it("reports bad indexing and mixed array elements", () => {
      const source = `
        func f(arr: i32[], n: i32) {
          let a = arr["0"];
          let b = n[0];
          let c = [1, true];
        }
      `;
      expect(messages(source)).toEqual([
        "index must be an integer, found string",
        "value of type i32 cannot be indexed",
        "array elements have incompatible types i32 and bool",
      ]);
    });

    it("validates casts", () => {
      const source = 'let v = "s" as i32; let w = 65 as char; let z = 1.5 as i8;';
      expect(messages(source)).toEqual(["cannot cast string to i32"]);
      expect(globalTypes(source, "v", "w", "z")).toEqual(["i32", "char", "i8"]);
    });

    it("requires bool conditions", () => {
      const source = 'func f() { if (1) { } while ("s") { } }';
      expect(messages(source)).toEqual([
        "if condition must be bool, found i32",
        "while condition must be bool, found string",
      ]);
    });
  });

  describe("bindings", () => {
    it("checks initializers against annotations", () => {
      expect(messages("let n -> i32 = null; let m -> i32? = null;")).toEqual([
        "type mismatch in initializer of 'n': expected i32, found null",
      ]);
    });

    it("needs an annotation when the type cannot be inferred", () => {
      expect(messages("let k = null; var q;")).toEqual([
        "cannot infer the type of 'k' from null; add a nullable annotation",
        "cannot infer the type of 'q' without an annotation or initializer",
      ]);
    });

    it("refuses assignments to immutable bindings", () => {
      const source = `
        let x = 1;
        final var y = 2;
        func main() {
          x = 2;
          y = 3;
          loop (i: 0..3) { i = 1; }
        }
      `;
      expect(messages(source)).toEqual([
        "cannot assign to immutable 'x'",
        "cannot assign to immutable 'y'",
        "cannot assign to immutable 'i'",
      ]);
    });
  });

  describe("structs", () => {
    it("checks struct literal fields", () => {
      const source = `
        struct Point { x -> i32; y -> i32; }
        class C { }
        let a = Point { x: 1 };
        let b = Point { x: 1, y: 2, z: 3 };
        let c = Point { x: 1, x: 2, y: 3 };
        let d = Point { x: "1", y: 2 };
        let e = C { x: 1 };
      `;
      expect(messages(source)).toEqual([
        "missing field 'y' when constructing 'Point'",
        "'Point' has no field 'z'",
        "field 'x' of 'Point' is given more than once",
        "type mismatch in field 'x' of 'Point': expected i32, found string",
        "'C' is not a struct",
      ]);
      expect(globalTypes(source, "a")).toEqual(["Point"]);
    });

    it("accepts a complete struct literal", () => {
      const source = "struct Point { x -> i32; y -> i32; }\nlet p = Point { x: 1, y: 2 };";
      expect(messages(source)).toEqual([]);
      expect(globalTypes(source, "p")).toEqual(["Point"]);
    });
  });

  describe("enums", () => {
    it("checks constants against the constructor", () => {
      const source = `
        enum Color { Red, Green }
        enum Size {
          Small(1), Large(2, 3);
          let factor -> i32;
          constructor(factor: i32) { self.factor = factor; }
        }
        enum Mode { Fast(1), Slow(2) }
        enum Mixed { A(1), B }
        let c = Color.Blue;
        let g = Color.Red;
      `;
      expect(messages(source)).toEqual([
        "Color has no member 'Blue'",
        "enum constant 'Size.Large' expects 1 argument(s), found 2",
        "enum 'Mode' has constants with arguments but declares no constructor",
        "enum 'Mixed' mixes constants with and without arguments",
        "enum 'Mixed' has constants with arguments but declares no constructor",
      ]);
      expect(globalTypes(source, "g")).toEqual(["Color"]);
    });

    it("accepts constants matching a constructor", () => {
      const header = `
        enum Color {
          RED(255, 0, 0), GREEN(0, 255, 0);
          constructor(r: i32, g: i32, b: i32) { }
        }
      `;
      expect(messages(header)).toEqual([]);
      expect(messages(header.replace("GREEN(0, 255, 0)", "GREEN"))).toEqual([
        "enum 'Color' mixes constants with and without arguments",
      ]);
    });

    it("projects enum fields under their aliases", () => {
      const source = `
        enum Planet {
          Earth(5.97, 6.37);
          let mass -> f64;
          let radius -> f64;
          constructor(mass: f64, radius: f64) {
            self.mass = mass;
            self.radius = radius;
          }
        }
        let p = Planet.Earth.(mass, radius as r);
        let m = p.mass;
      `;
      expect(analyze(source).diagnostics).toEqual([]);
      expect(globalTypes(source, "p", "m")).toEqual(["(mass: f64, r: f64)", "f64"]);
    });

    it("projects only enum values", () => {
      expect(messages('let bad = "s".(length);')).toEqual([
        "projection requires an enum value, found string",
      ]);
    });
  });

  describe("functions", () => {
    it("checks returns", () => {
      const source = `
        func a() -> i32 { }
        func b(flag: bool) -> i32 { if (flag) { return; } return 1; }
        func c() { return 1; }
        func d() -> string { return 1; }
      `;
      expect(messages(source)).toEqual([
        "function 'a' must return a value of type i32",
        "function 'b' must return a value of type i32 here",
        "function 'c' returns void and cannot return a value",
        "type mismatch in return value of 'd': expected string, found i32",
      ]);
    });

    it("reports a bare return in a value-returning function once", () => {
      expect(messages("func f() -> i32 { return; }")).toEqual([
        "function 'f' must return a value of type i32 here",
      ]);
    });

    it("checks calls", () => {
      const source = `
        func add(a: i32, b: i32) -> i32 { return a + b; }
        func h(v: i32) { }
        func noop() { }
        func main() {
          add(1);
          add(1, "two");
          let n = 3;
          n();
          let v = noop();
          h(noop());
        }
      `;
      expect(messages(source)).toEqual([
        "'add' expects 2 argument(s), found 1",
        "type mismatch in argument 2 of 'add': expected i32, found string",
        "value of type i32 is not callable",
        "cannot initialize 'v' with a void value",
        "void value cannot be used as argument 1 of 'h'",
      ]);
    });
  });

  describe("classes", () => {
    it("enforces member access and field mutability", () => {
      const source = `
        class Counter {
          priv var count -> i32 = 0;
          let label -> string;
          constructor(label: string) { self.label = label; }
          pub func bump() { count += 1; }
        }
        func main() {
          let c = Counter("clicks");
          c.count = 2;
          c.label = "other";
          c.missing();
        }
      `;
      expect(messages(source)).toEqual([
        "member 'count' of Counter is private and not accessible here",
        "cannot assign to immutable 'label'",
        "Counter has no member 'missing'",
      ]);
    });

    it("validates inheritance", () => {
      const source = `
        final class Leaf { }
        class Bud : Leaf { }
        struct Plain { }
        class Odd : Plain { }
        class Shape {
          prot var sides -> i32 = 0;
          pub final func name() -> string { return "shape"; }
        }
        class Square : Shape {
          func name() -> string { return "square"; }
          func count() -> i32 { return self.sides; }
        }
        func main() {
          let s = Shape();
          let q -> Square = s;
          let n = s.sides;
        }
      `;
      expect(messages(source)).toEqual([
        "class 'Bud' cannot extend final class 'Leaf'",
        "class 'Odd' cannot extend 'Plain', which is not a class",
        "class 'Square' cannot redeclare final method 'name'",
        "type mismatch in initializer of 'q': expected Square, found Shape",
        "member 'sides' of Shape is protected and not accessible here",
      ]);
    });

    it("reports inheritance cycles", () => {
      expect(messages("class A : B { } class B : A { }")).toEqual([
        "class 'A' inherits from itself",
        "class 'B' inherits from itself",
      ]);
    });

    it("reports member access on nullable values", () => {
      const source = "class Box { var v -> i32; } func f(b: Box?) { let x = b.v; }";
      expect(messages(source)).toEqual(["cannot access 'v' on nullable Box?"]);
    });
  });
});
