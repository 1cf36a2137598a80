import {
  DiagnosticEmitter,
  emitDiagnostic,
  type Diagnostic,
} from "../diagnostics/index.js";
import { createSpan, type Position } from "./span.js";
import {
  keywords,
  operators,
  punctuation,
  type NumericBase,
  type Token,
} from "./token.js";

/**
 * Lazy token source consumed left to right by the parser. Once the end of
 * input is reached `next` keeps returning the same EOF token.
 */
export interface TokenStream {
  next(): Token;
  peek(): Token;
  readonly diagnostics: readonly Diagnostic[];
}

const escapes: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  '"': '"',
  "'": "'",
};

const isIdentifierStart = (ch: string) => /^[A-Za-z_]$/.test(ch);
const isIdentifierPart = (ch: string) => /^[A-Za-z0-9_]$/.test(ch);
const isDecimalDigit = (ch: string) => /^[0-9]$/.test(ch);
const isWhitespace = (ch: string) => /^\s$/.test(ch);

const digitPatterns: Record<NumericBase, RegExp> = {
  2: /^[01]$/,
  8: /^[0-7]$/,
  10: /^[0-9]$/,
  16: /^[0-9a-fA-F]$/,
};

const basePrefixes: Record<string, NumericBase> = {
  "0x": 16,
  "0b": 2,
  "0o": 8,
};

export const createTokenStream = (source: string, file: string): TokenStream => {
  const diagnostics = new DiagnosticEmitter();
  let offset = 0;
  let line = 1;
  let column = 1;
  let lookahead: Token | undefined;
  let eof: Token | undefined;

  const position = (): Position => ({ offset, line, column });
  const charAt = (index = offset): string => source[index] ?? "";

  const advance = (): string => {
    const ch = charAt();
    offset += 1;
    if (ch === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    return ch;
  };

  const spanFrom = (start: Position) => createSpan(file, start, position());

  const makeToken = (
    kind: Token["kind"],
    start: Position,
    value?: Token["value"],
  ): Token => ({
    kind,
    text: source.slice(start.offset, offset),
    span: spanFrom(start),
    ...(value === undefined ? {} : { value }),
  });

  const skipTrivia = (): void => {
    while (offset < source.length) {
      const ch = charAt();
      if (isWhitespace(ch)) {
        advance();
        continue;
      }

      if (ch !== "#") return;

      if (charAt(offset + 1) === "|") {
        const start = position();
        advance();
        advance();
        while (offset < source.length && !source.startsWith("|#", offset)) {
          advance();
        }
        if (offset >= source.length) {
          emitDiagnostic({
            ctx: diagnostics,
            code: "LX0001",
            params: { kind: "unterminated-comment" },
            span: spanFrom(start),
          });
          return;
        }
        advance();
        advance();
        continue;
      }

      while (offset < source.length && charAt() !== "\n") {
        advance();
      }
    }
  };

  const readDigits = (base: NumericBase): string => {
    let digits = "";
    while (digitPatterns[base].test(charAt()) || charAt() === "_") {
      const ch = advance();
      if (ch !== "_") digits += ch;
    }
    return digits;
  };

  const scanNumber = (start: Position): Token => {
    const prefix = source.slice(offset, offset + 2).toLowerCase();
    const base = basePrefixes[prefix] ?? 10;
    if (base !== 10) {
      advance();
      advance();
    }

    let digits = readDigits(base);
    let isFloat = false;
    let malformed = digits === "";

    if (base === 10 && charAt() === "." && isDecimalDigit(charAt(offset + 1))) {
      advance();
      digits += `.${readDigits(10)}`;
      isFloat = true;
    }

    const exponentSign = charAt(offset + 1);
    const hasExponent =
      base === 10 &&
      !malformed &&
      (charAt() === "e" || charAt() === "E") &&
      (isDecimalDigit(exponentSign) ||
        ((exponentSign === "+" || exponentSign === "-") &&
          isDecimalDigit(charAt(offset + 2))));
    if (hasExponent) {
      advance();
      let exponent = "e";
      if (!isDecimalDigit(charAt())) exponent += advance();
      digits += `${exponent}${readDigits(10)}`;
      isFloat = true;
    }

    let suffix = "";
    while (isIdentifierPart(charAt())) {
      suffix += advance();
    }
    if (isDecimalDigit(suffix.charAt(0))) {
      malformed = true;
    }

    if (malformed) {
      emitDiagnostic({
        ctx: diagnostics,
        code: "LX0004",
        params: { kind: "malformed-number", text: source.slice(start.offset, offset) },
        span: spanFrom(start),
      });
      return makeToken("number", start, { digits: "0", base: 10, isFloat: false });
    }

    return makeToken("number", start, {
      digits,
      base,
      isFloat,
      ...(suffix ? { suffix } : {}),
    });
  };

  const scanEscape = (): string => {
    const start = position();
    advance();
    const ch = charAt();
    if (ch === "" || ch === "\n") return "";
    advance();
    const mapped = escapes[ch];
    if (mapped !== undefined) return mapped;
    emitDiagnostic({
      ctx: diagnostics,
      code: "LX0003",
      params: { kind: "invalid-escape", sequence: `\\${ch}` },
      span: spanFrom(start),
    });
    return ch;
  };

  const scanQuoted = (start: Position, quote: '"' | "'"): Token => {
    advance();
    let value = "";
    let terminated = false;

    while (offset < source.length) {
      const ch = charAt();
      if (ch === "\n") break;
      if (ch === quote) {
        advance();
        terminated = true;
        break;
      }
      if (ch === "\\") {
        value += scanEscape();
        continue;
      }
      value += advance();
    }

    if (!terminated) {
      emitDiagnostic({
        ctx: diagnostics,
        code: "LX0001",
        params: { kind: quote === '"' ? "unterminated-string" : "unterminated-char" },
        span: spanFrom(start),
      });
    } else if (quote === "'" && Array.from(value).length !== 1) {
      emitDiagnostic({
        ctx: diagnostics,
        code: "LX0003",
        params: {
          kind: "invalid-char-literal",
          text: source.slice(start.offset, offset),
        },
        span: spanFrom(start),
      });
    }

    return makeToken(quote === '"' ? "string" : "char", start, value);
  };

  const scan = (): Token => {
    if (eof) return eof;
    skipTrivia();

    const start = position();
    if (offset >= source.length) {
      eof = makeToken("eof", start);
      return eof;
    }

    const ch = charAt();
    if (isIdentifierStart(ch)) {
      while (isIdentifierPart(charAt())) advance();
      const text = source.slice(start.offset, offset);
      if (text === "true" || text === "false") {
        return makeToken("keyword", start, text === "true");
      }
      return makeToken(keywords.has(text) ? "keyword" : "identifier", start);
    }

    if (isDecimalDigit(ch)) return scanNumber(start);
    if (ch === '"' || ch === "'") return scanQuoted(start, ch);

    const operator = operators.find((op) => source.startsWith(op, offset));
    if (operator) {
      for (let i = 0; i < operator.length; i += 1) advance();
      return makeToken("operator", start);
    }

    if (punctuation.has(ch)) {
      advance();
      return makeToken("punctuation", start);
    }

    const codePoint = source.codePointAt(offset) ?? 0;
    advance();
    if (codePoint > 0xffff) advance();
    const token = makeToken("invalid", start);
    emitDiagnostic({
      ctx: diagnostics,
      code: "LX0002",
      params: { kind: "unexpected-character", character: token.text },
      span: token.span,
    });
    return token;
  };

  return {
    next: () => {
      if (lookahead) {
        const token = lookahead;
        lookahead = undefined;
        return token;
      }
      return scan();
    },
    peek: () => {
      lookahead ??= scan();
      return lookahead;
    },
    get diagnostics() {
      return diagnostics.diagnostics;
    },
  };
};

export const tokenize = (
  source: string,
  file: string,
): { tokens: Token[]; diagnostics: readonly Diagnostic[] } => {
  const stream = createTokenStream(source, file);
  const tokens: Token[] = [];
  for (;;) {
    const token = stream.next();
    tokens.push(token);
    if (token.kind === "eof") break;
  }
  return { tokens, diagnostics: stream.diagnostics };
};
