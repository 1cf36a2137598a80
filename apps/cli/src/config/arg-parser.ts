import { Command } from "commander";
import { createRequire } from "node:module";
import type { WeftConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

interface CliOptions {
  color: boolean;
  emitParserAst?: boolean;
  root?: string;
}

const createCommand = (): Command =>
  new Command()
    .name("weftc")
    .description("Weft language front end: parse and check a source file")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<file>", "entry .wf source file")
    .option("--no-color", "disable ANSI colors in diagnostics")
    .option("--emit-parser-ast", "write the parser AST as JSON to stdout")
    .option("--root <dir>", "directory that import paths resolve against");

export const parseArgs = (argv: readonly string[]): WeftConfig => {
  const program = createCommand();
  program.parse(["node", "weftc", ...argv]);
  const opts = program.opts<CliOptions>();
  const [file] = program.args;
  if (file === undefined) {
    program.error("missing required argument 'file'");
  }

  return {
    file,
    ...(opts.root !== undefined ? { root: opts.root } : {}),
    color: opts.color,
    emitParserAst: opts.emitParserAst ?? false,
  };
};

export const getConfigFromCli = (): WeftConfig =>
  parseArgs(process.argv.slice(2));
