export * from "./ast/nodes.js";
export * from "./token.js";
export { createTokenStream, tokenize, type TokenStream } from "./lexer.js";
export { fileStartSpan, mergeSpans } from "./span.js";
export { parse, type ParseResult } from "./parser.js";
