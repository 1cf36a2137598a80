import { describe, expect, it } from "vitest";
import { getConfigFromCli, parseArgs } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("parseArgs", () => {
  it("defaults to colored diagnostics and semantic checking", () => {
    expect(parseArgs(["main.wf"])).toEqual({
      file: "main.wf",
      color: true,
      emitParserAst: false,
    });
  });

  it("reads every option", () => {
    expect(
      parseArgs(["--no-color", "--emit-parser-ast", "--root", "src", "app/main.wf"]),
    ).toEqual({
      file: "app/main.wf",
      root: "src",
      color: false,
      emitParserAst: true,
    });
  });
});

describe("getConfigFromCli", () => {
  it("reads the process arguments after the script path", () => {
    const config = runWithArgv(["node", "weftc", "--no-color", "entry.wf"]);
    expect(config.file).toBe("entry.wf");
    expect(config.color).toBe(false);
  });
});
