import { emitDiagnostic, type Diagnostic } from "../diagnostics/index.js";
import {
  getSyntaxId,
  type Decl,
  type FileNode,
  type ImportDecl,
  type ModuleDecl,
} from "./ast/nodes.js";
import { ParserCursor } from "./cursor.js";
import { parseDeclaration, parseModuleDecl } from "./declarations.js";
import { createTokenStream } from "./lexer.js";
import { describeToken } from "./token.js";

export interface ParseResult {
  file: FileNode;
  /** Lexical and syntax diagnostics in source order. */
  diagnostics: readonly Diagnostic[];
}

/**
 * Parses a whole source file. Never throws on malformed input: every problem
 * becomes a diagnostic and parsing resumes at the next safe token.
 */
export const parse = (source: string, filePath = "<memory>"): ParseResult => {
  const stream = createTokenStream(source, filePath);
  const cursor = new ParserCursor(stream);
  const start = cursor.current;

  let module: ModuleDecl | undefined;
  const imports: ImportDecl[] = [];
  const declarations: Exclude<Decl, ImportDecl>[] = [];

  while (!cursor.atEnd) {
    const before = cursor.consumed;

    if (cursor.check("}")) {
      emitDiagnostic({
        ctx: cursor.diagnostics,
        code: "PS0003",
        params: { kind: "expected-declaration", found: describeToken(cursor.current) },
        span: cursor.current.span,
      });
      cursor.advance();
      continue;
    }

    if (cursor.check("mod")) {
      const parsed = parseModuleDecl(cursor);
      if (!parsed.ok) {
        cursor.synchronize(before);
        continue;
      }
      const misplaced = imports.length > 0 || declarations.length > 0;
      if (module || misplaced) {
        emitDiagnostic({
          ctx: cursor.diagnostics,
          code: "PS0007",
          params: {
            kind: module ? "duplicate-module-declaration" : "misplaced-module-declaration",
          },
          span: parsed.value.span,
        });
        continue;
      }
      module = parsed.value;
      continue;
    }

    const parsed = parseDeclaration(cursor);
    if (!parsed.ok) {
      cursor.synchronize(before);
      continue;
    }
    if (parsed.value.kind === "import") {
      imports.push(parsed.value);
    } else {
      declarations.push(parsed.value);
    }
  }

  const file: FileNode = {
    id: getSyntaxId(),
    kind: "file",
    path: filePath,
    ...(module ? { module } : {}),
    imports,
    declarations,
    span: cursor.spanFrom(start),
  };

  return {
    file,
    diagnostics: [...stream.diagnostics, ...cursor.diagnostics.diagnostics].sort(
      (left, right) => left.span.start - right.span.start,
    ),
  };
};
