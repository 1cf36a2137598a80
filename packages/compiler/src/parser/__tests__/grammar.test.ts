import { describe, expect, it } from "vitest";
import { binaryOperatorOf, isVisibilityKeyword } from "../grammar.js";
import { fileStartSpan } from "../span.js";
import type { Token, TokenKind } from "../token.js";

const token = (kind: TokenKind, text: string): Token => ({
  kind,
  text,
  span: fileStartSpan("test.wf"),
});

describe("grammar tables", () => {
  it("recognizes only the visibility keywords", () => {
    expect(isVisibilityKeyword(token("keyword", "pub"))).toBe(true);
    expect(isVisibilityKeyword(token("keyword", "prot"))).toBe(true);
    expect(isVisibilityKeyword(token("keyword", "constructor"))).toBe(false);
    expect(isVisibilityKeyword(token("keyword", "toString"))).toBe(false);
    expect(isVisibilityKeyword(token("identifier", "pub"))).toBe(false);
  });

  it("maps word operators without reading object built-ins", () => {
    expect(binaryOperatorOf(token("keyword", "and"))).toBe("&&");
    expect(binaryOperatorOf(token("keyword", "or"))).toBe("||");
    expect(binaryOperatorOf(token("operator", "+"))).toBe("+");
    expect(binaryOperatorOf(token("keyword", "constructor"))).toBeUndefined();
    expect(binaryOperatorOf(token("identifier", "valueOf"))).toBeUndefined();
  });
});
