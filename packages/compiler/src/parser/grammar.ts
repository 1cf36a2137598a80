import type { BinaryOperator, CompoundOperator, UnaryOperator } from "./ast/nodes.js";
import type { Token } from "./token.js";

/** Key is the operator, value is its precedence */
export type OpMap = Map<string, number>;

export const binaryOps: OpMap = new Map([
  ["||", 1],
  ["or", 1],
  ["&&", 2],
  ["and", 2],
  ["==", 3],
  ["!=", 3],
  ["<", 4],
  ["<=", 4],
  [">", 4],
  [">=", 4],
  ["+", 5],
  ["-", 5],
  ["*", 6],
  ["/", 6],
  ["%", 6],
]);

const binaryAliases = new Map<string, BinaryOperator>([
  ["or", "||"],
  ["and", "&&"],
]);

const binaryOperatorNames = new Set<string>([
  "+", "-", "*", "/", "%", "==", "!=", "<", "<=", ">", ">=", "&&", "||",
]);

const isBinaryOperatorName = (text: string): text is BinaryOperator =>
  binaryOperatorNames.has(text);

export const binaryOperatorOf = (token: Token): BinaryOperator | undefined => {
  if (token.kind !== "operator" && token.kind !== "keyword") return undefined;
  const alias = binaryAliases.get(token.text);
  if (alias) return alias;
  return isBinaryOperatorName(token.text) ? token.text : undefined;
};

export const binaryPrecedence = (token: Token): number | undefined =>
  binaryOperatorOf(token) === undefined ? undefined : binaryOps.get(token.text);

const compoundOperatorNames = new Set<string>(["+=", "-=", "*=", "/=", "%="]);

export const compoundOperatorOf = (token: Token): CompoundOperator | undefined => {
  if (token.kind !== "operator") return undefined;
  switch (token.text) {
    case "+=":
    case "-=":
    case "*=":
    case "/=":
    case "%=":
      return token.text;
    default:
      return undefined;
  }
};

export const isAssignmentOperator = (token: Token): boolean =>
  token.kind === "operator" &&
  (token.text === "=" || compoundOperatorNames.has(token.text));

export const prefixOperatorOf = (token: Token): UnaryOperator | undefined => {
  if (token.kind !== "operator") return undefined;
  switch (token.text) {
    case "!":
    case "-":
    case "++":
    case "--":
      return token.text;
    default:
      return undefined;
  }
};

export const visibilityKeywords = {
  pub: "public",
  priv: "private",
  prot: "protected",
} as const;

export type VisibilityKeyword = keyof typeof visibilityKeywords;

export const isVisibilityKeyword = (token: Token): token is Token & { text: VisibilityKeyword } =>
  token.kind === "keyword" && Object.hasOwn(visibilityKeywords, token.text);

/** Tokens where error recovery may resume parsing. */
export const synchronizingKeywords = new Set([
  "mod",
  "import",
  "func",
  "class",
  "struct",
  "enum",
  "var",
  "let",
  "return",
  "pub",
  "priv",
  "prot",
  "final",
]);

const expressionStartKeywords = new Set(["true", "false", "null", "self"]);

export const startsExpression = (token: Token): boolean => {
  switch (token.kind) {
    case "identifier":
    case "number":
    case "string":
    case "char":
      return true;
    case "keyword":
      return expressionStartKeywords.has(token.text);
    case "punctuation":
      return token.text === "(" || token.text === "[";
    case "operator":
      return prefixOperatorOf(token) !== undefined;
    default:
      return false;
  }
};
