import type { SourceSpan } from "../diagnostics/index.js";

export type TokenKind =
  | "identifier"
  | "keyword"
  | "number"
  | "string"
  | "char"
  | "operator"
  | "punctuation"
  | "eof"
  | "invalid";

export type NumericBase = 2 | 8 | 10 | 16;

export interface NumericLiteral {
  /** Digits with the base prefix and `_` separators removed. */
  digits: string;
  base: NumericBase;
  isFloat: boolean;
  suffix?: string;
}

export type TokenValue = string | boolean | NumericLiteral;

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly span: SourceSpan;
  readonly value?: TokenValue;
}

export const keywords = new Set([
  "mod",
  "import",
  "func",
  "class",
  "struct",
  "enum",
  "var",
  "let",
  "pub",
  "priv",
  "prot",
  "final",
  "return",
  "if",
  "elif",
  "else",
  "while",
  "do",
  "for",
  "loop",
  "step",
  "rev",
  "break",
  "continue",
  "as",
  "true",
  "false",
  "null",
  "self",
  "constructor",
  "and",
  "or",
]);

/** Longest first so the scanner can match greedily. */
export const operators = [
  "..=",
  "++",
  "--",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "::",
  "..",
  "->",
  "+",
  "-",
  "*",
  "/",
  "%",
  "=",
  "<",
  ">",
  "!",
  "?",
  ":",
  ".",
] as const;

export const punctuation = new Set([",", ";", "(", ")", "{", "}", "[", "]"]);

export const isToken = (token: Token, text: string): boolean =>
  token.text === text &&
  (token.kind === "operator" ||
    token.kind === "punctuation" ||
    token.kind === "keyword");

export const isNumericLiteral = (
  value: TokenValue | undefined,
): value is NumericLiteral => typeof value === "object";

/** Integer literals become bigints so 64-bit values survive exactly. */
export const evaluateNumericLiteral = (
  literal: NumericLiteral,
): { kind: "int"; value: bigint } | { kind: "float"; value: number } => {
  if (literal.isFloat) {
    return { kind: "float", value: Number(literal.digits) };
  }

  const prefix = { 2: "0b", 8: "0o", 10: "", 16: "0x" }[literal.base];
  return { kind: "int", value: BigInt(`${prefix}${literal.digits}`) };
};

export const describeToken = (token: Token): string => {
  switch (token.kind) {
    case "eof":
      return "end of file";
    case "identifier":
      return `identifier '${token.text}'`;
    case "number":
    case "string":
    case "char":
      return `${token.kind} literal ${token.text}`;
    default:
      return `'${token.text}'`;
  }
};
