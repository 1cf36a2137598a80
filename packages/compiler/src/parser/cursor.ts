import {
  DiagnosticEmitter,
  emitDiagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { Identifier } from "./ast/nodes.js";
import { synchronizingKeywords } from "./grammar.js";
import type { TokenStream } from "./lexer.js";
import { mergeSpans } from "./span.js";
import { describeToken, isToken, type Token } from "./token.js";

/**
 * Result of a parse routine. A failed outcome means a diagnostic was already
 * reported and the caller should synchronize.
 */
export type ParseOutcome<T> = { ok: true; value: T } | { ok: false };

export const ok = <T>(value: T): ParseOutcome<T> => ({ ok: true, value });
export const failed: { ok: false } = { ok: false };

/** Token cursor with one token of lookahead past `current`. */
export class ParserCursor {
  readonly diagnostics = new DiagnosticEmitter();
  #current: Token;
  #previous: Token;
  #consumed = 0;

  constructor(private readonly stream: TokenStream) {
    this.#current = stream.next();
    this.#previous = this.#current;
  }

  get current(): Token {
    return this.#current;
  }

  get previous(): Token {
    return this.#previous;
  }

  /** Number of tokens consumed so far; used to guarantee forward progress. */
  get consumed(): number {
    return this.#consumed;
  }

  get atEnd(): boolean {
    return this.#current.kind === "eof";
  }

  peek(): Token {
    return this.stream.peek();
  }

  advance(): Token {
    const token = this.#current;
    if (token.kind !== "eof") {
      this.#previous = token;
      this.#current = this.stream.next();
      this.#consumed += 1;
    }
    return token;
  }

  check(text: string): boolean {
    return isToken(this.#current, text);
  }

  match(text: string): boolean {
    if (!this.check(text)) return false;
    this.advance();
    return true;
  }

  expect(text: string): ParseOutcome<Token> {
    if (this.check(text)) return ok(this.advance());
    this.unexpected(`'${text}'`);
    return failed;
  }

  expectIdentifier(what = "identifier"): ParseOutcome<Identifier> {
    if (this.#current.kind !== "identifier") {
      this.unexpected(what);
      return failed;
    }
    const token = this.advance();
    return ok({ name: token.text, span: token.span });
  }

  unexpected(expected: string): void {
    emitDiagnostic({
      ctx: this.diagnostics,
      code: "PS0001",
      params: {
        kind: "unexpected-token",
        expected,
        found: describeToken(this.#current),
      },
      span: this.#current.span,
    });
  }

  /** Span from `start` through the most recently consumed token. */
  spanFrom(start: Token | SourceSpan): SourceSpan {
    const startSpan = "kind" in start ? start.span : start;
    return mergeSpans(startSpan, this.#previous.span);
  }

  /**
   * Discards tokens until a statement boundary, a closing brace, or a token
   * that starts a declaration. Always consumes at least one token when the
   * failed construct consumed none.
   */
  synchronize(startConsumed: number): void {
    if (this.#consumed === startConsumed && !this.atEnd) {
      this.advance();
    }

    while (!this.atEnd) {
      if (this.check(";")) {
        this.advance();
        return;
      }
      if (this.check("}")) return;
      if (this.check("{")) {
        this.skipBalancedBraces();
        return;
      }
      if (
        this.#current.kind === "keyword" &&
        synchronizingKeywords.has(this.#current.text)
      ) {
        return;
      }
      this.advance();
    }
  }

  private skipBalancedBraces(): void {
    let depth = 0;
    while (!this.atEnd) {
      if (this.check("{")) depth += 1;
      if (this.check("}")) depth -= 1;
      this.advance();
      if (depth === 0) return;
    }
  }
}
