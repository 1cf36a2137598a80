import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  compileFile,
  DiagnosticError,
  hasErrors,
  parse,
  type Diagnostic,
} from "@weft/compiler";
import { getConfig } from "./config/index.js";
import type { WeftConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { stringifyOutput } from "./output.js";

export interface CliOutput {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleOutput: CliOutput = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export const exec = () => main().catch(errorHandler);

async function main() {
  process.exitCode = runCli(getConfig());
}

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? "" : "s"}`;

export const formatSummary = (diagnostics: readonly Diagnostic[]): string => {
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  const warnings = diagnostics.filter((d) => d.severity === "warning").length;
  if (errors === 0 && warnings === 0) {
    return "no errors found";
  }
  return `${plural(errors, "error")}, ${plural(warnings, "warning")}`;
};

const report = (
  diagnostics: readonly Diagnostic[],
  config: WeftConfig,
  output: CliOutput
): number => {
  diagnostics.forEach((diagnostic) =>
    output.err(formatCliDiagnostic(diagnostic, { color: config.color }))
  );
  output.out(formatSummary(diagnostics));
  return hasErrors(diagnostics) ? 1 : 0;
};

/** Runs one compilation and returns the process exit code. */
export const runCli = (
  config: WeftConfig,
  output: CliOutput = consoleOutput
): number => {
  const file = resolve(config.file);

  if (config.emitParserAst) {
    const parsed = parse(readFileSync(file, "utf8"), file);
    output.out(stringifyOutput(parsed.file));
    parsed.diagnostics.forEach((diagnostic) =>
      output.err(formatCliDiagnostic(diagnostic, { color: config.color }))
    );
    return hasErrors(parsed.diagnostics) ? 1 : 0;
  }

  try {
    const result = compileFile(file, {
      ...(config.root !== undefined ? { root: resolve(config.root) } : {}),
    });
    return report(result.diagnostics, config, output);
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return report(error.diagnostics, config, output);
    }
    throw error;
  }
};

function errorHandler(error: unknown) {
  console.error(error);
  process.exit(1);
}
