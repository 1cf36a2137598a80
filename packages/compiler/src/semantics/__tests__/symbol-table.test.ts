import { describe, expect, it } from "vitest";
import { fileStartSpan } from "../../parser/index.js";
import { SymbolTable } from "../binder/symbol-table.js";
import type { SymbolInput } from "../binder/types.js";

const input = (name: string, declaredAt: number): SymbolInput => ({
  name,
  kind: "variable",
  declaredAt,
  span: fileStartSpan("test.wf"),
  access: "default",
  mutable: true,
  final: false,
});

const declared = (result: ReturnType<SymbolTable["declare"]>): number => {
  if (!result.ok) throw new Error("expected the declaration to succeed");
  return result.id;
};

describe("SymbolTable", () => {
  it("resolves bindings across lexical scopes", () => {
    const table = new SymbolTable({ rootOwner: 0 });
    const rootSymbol = declared(table.declare(input("x", 1)));

    const fnScope = table.createScope({
      parent: table.rootScope,
      kind: "function",
      owner: 2,
    });

    table.enterScope(fnScope);
    const innerSymbol = declared(table.declare(input("x", 3)));
    table.exitScope();

    expect(table.resolve("x", fnScope)).toBe(innerSymbol);
    expect(table.resolve("x", table.rootScope)).toBe(rootSymbol);
    expect(table.resolve("missing", fnScope)).toBeUndefined();
  });

  it("refuses a second declaration of a name in one scope", () => {
    const table = new SymbolTable({ rootOwner: 0 });
    const first = declared(table.declare(input("x", 1)));
    expect(table.declare(input("x", 2))).toEqual({ ok: false, existing: first });
  });

  it("enters child scopes of the current scope", () => {
    const table = new SymbolTable({ rootOwner: 0 });
    const module = table.enter("module", 1);
    const block = table.enter("block", 2);

    expect(table.currentScope).toBe(block);
    expect(table.getScope(block)).toEqual({
      id: block,
      parent: module,
      kind: "block",
      owner: 2,
    });

    table.exitScope();
    expect(table.currentScope).toBe(module);
  });

  it("never exits the root scope", () => {
    const table = new SymbolTable({ rootOwner: 0 });
    expect(() => table.exitScope()).toThrow("attempted to exit root scope");
  });

  it("lists a scope's own symbols in declaration order", () => {
    const table = new SymbolTable({ rootOwner: 0 });
    const a = declared(table.declare(input("a", 1)));
    const b = declared(table.declare(input("b", 2)));
    table.enter("block", 3);
    table.declare(input("c", 4));

    expect([...table.symbolsInScope(table.rootScope)]).toEqual([a, b]);
    expect(table.resolveLocal("c", table.rootScope)).toBeUndefined();
  });

  it("records symbol types after declaration", () => {
    const table = new SymbolTable({ rootOwner: 0 });
    const id = declared(table.declare(input("x", 1)));
    table.setSymbolType(id, 7);
    expect(table.getSymbol(id)).toMatchObject({ name: "x", type: 7, scope: 0 });
  });
});
