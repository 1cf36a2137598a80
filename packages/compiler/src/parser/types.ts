import { emitDiagnostic } from "../diagnostics/index.js";
import { getSyntaxId, type TypeNode } from "./ast/nodes.js";
import { failed, ok, type ParseOutcome, type ParserCursor } from "./cursor.js";
import { startsExpression } from "./grammar.js";
import { describeToken } from "./token.js";

/**
 * Parses `Name`, `Name[]`, `Name?` and any stack of those suffixes. Inside an
 * expression (`x as T`) a `?` that begins a ternary is left alone.
 */
export const parseType = (
  cursor: ParserCursor,
  options: { inExpression?: boolean } = {},
): ParseOutcome<TypeNode> => {
  const start = cursor.current;
  if (start.kind !== "identifier") {
    emitDiagnostic({
      ctx: cursor.diagnostics,
      code: "PS0008",
      params: { kind: "expected-type", found: describeToken(start) },
      span: start.span,
    });
    return failed;
  }

  cursor.advance();
  let type: TypeNode = {
    id: getSyntaxId(),
    kind: "named-type",
    name: start.text,
    span: start.span,
  };

  for (;;) {
    if (cursor.check("[") && cursor.peek().text === "]") {
      cursor.advance();
      cursor.advance();
      type = {
        id: getSyntaxId(),
        kind: "array-type",
        element: type,
        span: cursor.spanFrom(start),
      };
      continue;
    }

    const nullableSuffix =
      cursor.check("?") && !(options.inExpression && startsExpression(cursor.peek()));
    if (nullableSuffix) {
      cursor.advance();
      type = {
        id: getSyntaxId(),
        kind: "nullable-type",
        inner: type,
        span: cursor.spanFrom(start),
      };
      continue;
    }

    return ok(type);
  }
};
