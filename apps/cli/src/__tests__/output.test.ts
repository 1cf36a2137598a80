import { describe, expect, it } from "vitest";
import { stringifyOutput } from "../output.js";

describe("cli output", () => {
  it("serializes bigints and maps", () => {
    const value = { total: 7n, table: new Map([["entry", [1n, 2]]]) };
    expect(JSON.parse(stringifyOutput(value))).toEqual({
      total: "7n",
      table: { entry: ["1n", 2] },
    });
  });

  it("marks circular references", () => {
    const node: { name: string; self?: unknown } = { name: "root" };
    node.self = node;
    expect(stringifyOutput(node)).toBe('{\n  "name": "root",\n  "self": "[Circular]"\n}');
  });

  it("repeats shared objects that are not cycles", () => {
    const shared = { id: 1 };
    expect(JSON.parse(stringifyOutput({ a: shared, b: shared }))).toEqual({
      a: { id: 1 },
      b: { id: 1 },
    });
  });
});
