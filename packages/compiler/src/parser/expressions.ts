import { emitDiagnostic } from "../diagnostics/index.js";
import {
  getSyntaxId,
  isAssignmentTarget,
  type Expr,
  type Identifier,
  type LiteralValue,
  type ProjectionField,
  type StructLiteralField,
} from "./ast/nodes.js";
import { failed, ok, type ParseOutcome, type ParserCursor } from "./cursor.js";
import {
  binaryOperatorOf,
  binaryPrecedence,
  compoundOperatorOf,
  isAssignmentOperator,
  prefixOperatorOf,
} from "./grammar.js";
import { mergeSpans } from "./span.js";
import { describeToken, isNumericLiteral, type Token } from "./token.js";
import { parseType } from "./types.js";

export const parseExpression = (cursor: ParserCursor): ParseOutcome<Expr> =>
  parseAssignment(cursor);

const reportInvalidTarget = (
  cursor: ParserCursor,
  target: Expr,
  operator: string,
): void => {
  emitDiagnostic({
    ctx: cursor.diagnostics,
    code: "PS0002",
    params: { kind: "invalid-assignment-target", operator },
    span: target.span,
  });
};

const parseAssignment = (cursor: ParserCursor): ParseOutcome<Expr> => {
  const left = parseTernary(cursor);
  if (!left.ok || !isAssignmentOperator(cursor.current)) return left;

  const operatorToken = cursor.advance();
  const value = parseAssignment(cursor);
  if (!value.ok) return failed;

  const target = left.value;
  if (!isAssignmentTarget(target)) {
    reportInvalidTarget(cursor, target, operatorToken.text);
    return failed;
  }

  const span = mergeSpans(target.span, value.value.span);
  const compound = compoundOperatorOf(operatorToken);
  if (compound) {
    return ok({
      id: getSyntaxId(),
      kind: "compound-assignment",
      operator: compound,
      target,
      value: value.value,
      span,
    });
  }

  return ok({
    id: getSyntaxId(),
    kind: "assignment",
    target,
    value: value.value,
    span,
  });
};

/** `a ? b : c ? d : e` groups as `a ? b : (c ? d : e)`. */
const parseTernary = (cursor: ParserCursor): ParseOutcome<Expr> => {
  const condition = parseBinary(cursor, 1);
  if (!condition.ok || !cursor.match("?")) return condition;

  const whenTrue = parseTernary(cursor);
  if (!whenTrue.ok) return failed;
  if (!cursor.expect(":").ok) return failed;
  const whenFalse = parseTernary(cursor);
  if (!whenFalse.ok) return failed;

  return ok({
    id: getSyntaxId(),
    kind: "ternary",
    condition: condition.value,
    whenTrue: whenTrue.value,
    whenFalse: whenFalse.value,
    span: mergeSpans(condition.value.span, whenFalse.value.span),
  });
};

const parseBinary = (
  cursor: ParserCursor,
  minPrecedence: number,
): ParseOutcome<Expr> => {
  const first = parseCast(cursor);
  if (!first.ok) return failed;
  let left = first.value;

  for (;;) {
    const operator = binaryOperatorOf(cursor.current);
    const precedence = binaryPrecedence(cursor.current);
    if (!operator || precedence === undefined || precedence < minPrecedence) {
      return ok(left);
    }

    cursor.advance();
    const right = parseBinary(cursor, precedence + 1);
    if (!right.ok) return failed;

    left = {
      id: getSyntaxId(),
      kind: "binary",
      operator,
      left,
      right: right.value,
      span: mergeSpans(left.span, right.value.span),
    };
  }
};

const parseCast = (cursor: ParserCursor): ParseOutcome<Expr> => {
  const operand = parseUnary(cursor);
  if (!operand.ok) return failed;
  let expr = operand.value;

  while (cursor.match("as")) {
    const type = parseType(cursor, { inExpression: true });
    if (!type.ok) return failed;
    expr = {
      id: getSyntaxId(),
      kind: "cast",
      expr,
      type: type.value,
      span: mergeSpans(expr.span, type.value.span),
    };
  }

  return ok(expr);
};

const parseUnary = (cursor: ParserCursor): ParseOutcome<Expr> => {
  const operator = prefixOperatorOf(cursor.current);
  if (!operator) return parsePostfix(cursor);

  const operatorToken = cursor.advance();
  const operand = parseUnary(cursor);
  if (!operand.ok) return failed;

  if ((operator === "++" || operator === "--") && !isAssignmentTarget(operand.value)) {
    reportInvalidTarget(cursor, operand.value, operator);
    return failed;
  }

  return ok({
    id: getSyntaxId(),
    kind: "unary",
    operator,
    fixity: "prefix",
    operand: operand.value,
    span: mergeSpans(operatorToken.span, operand.value.span),
  });
};

const parseArguments = (
  cursor: ParserCursor,
  close: string,
): ParseOutcome<Expr[]> => {
  const args: Expr[] = [];
  if (cursor.match(close)) return ok(args);

  for (;;) {
    const arg = parseExpression(cursor);
    if (!arg.ok) return failed;
    args.push(arg.value);
    if (cursor.match(",")) continue;
    if (!cursor.expect(close).ok) return failed;
    return ok(args);
  }
};

/**
 * Parses the field group of `value.(a, b as c)`; the `.` has been consumed
 * and the cursor sits on `(`.
 */
const parseProjection = (
  cursor: ParserCursor,
  target: Expr,
): ParseOutcome<Expr> => {
  cursor.advance();

  if (cursor.check(")")) {
    emitDiagnostic({
      ctx: cursor.diagnostics,
      code: "PS0004",
      params: { kind: "empty-projection" },
      span: cursor.current.span,
    });
    cursor.advance();
    return failed;
  }

  const expectField = (): ParseOutcome<Identifier> => {
    const token = cursor.current;
    if (token.kind !== "identifier") {
      emitDiagnostic({
        ctx: cursor.diagnostics,
        code: "PS0004",
        params: { kind: "expected-projection-field", found: describeToken(token) },
        span: token.span,
      });
      return failed;
    }
    cursor.advance();
    return ok({ name: token.text, span: token.span });
  };

  const fields: ProjectionField[] = [];
  for (;;) {
    const name = expectField();
    if (!name.ok) return failed;

    if (cursor.match("as")) {
      const alias = expectField();
      if (!alias.ok) return failed;
      fields.push({ name: name.value, alias: alias.value });
    } else {
      fields.push({ name: name.value });
    }

    if (cursor.match(",")) continue;
    if (cursor.check(")")) break;

    emitDiagnostic({
      ctx: cursor.diagnostics,
      code: "PS0004",
      params: { kind: "unclosed-projection", found: describeToken(cursor.current) },
      span: cursor.current.span,
    });
    return failed;
  }

  cursor.advance();
  return ok({
    id: getSyntaxId(),
    kind: "projection",
    target,
    fields,
    span: mergeSpans(target.span, cursor.previous.span),
  });
};

const parseStructLiteral = (
  cursor: ParserCursor,
  name: Identifier,
): ParseOutcome<Expr> => {
  cursor.advance();
  const fields: StructLiteralField[] = [];

  while (!cursor.check("}")) {
    const fieldName = cursor.expectIdentifier("field name");
    if (!fieldName.ok) return failed;
    if (!cursor.expect(":").ok) return failed;
    const value = parseExpression(cursor);
    if (!value.ok) return failed;
    fields.push({
      name: fieldName.value,
      value: value.value,
      span: mergeSpans(fieldName.value.span, value.value.span),
    });
    if (!cursor.match(",")) break;
  }

  if (!cursor.expect("}").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "struct-literal",
    name,
    fields,
    span: mergeSpans(name.span, cursor.previous.span),
  });
};

const parsePostfix = (cursor: ParserCursor): ParseOutcome<Expr> => {
  const primary = parsePrimary(cursor);
  if (!primary.ok) return failed;
  let expr = primary.value;

  for (;;) {
    if (cursor.match("(")) {
      const args = parseArguments(cursor, ")");
      if (!args.ok) return failed;
      expr = {
        id: getSyntaxId(),
        kind: "call",
        callee: expr,
        args: args.value,
        span: mergeSpans(expr.span, cursor.previous.span),
      };
      continue;
    }

    if (cursor.match("[")) {
      const index = parseExpression(cursor);
      if (!index.ok || !cursor.expect("]").ok) return failed;
      expr = {
        id: getSyntaxId(),
        kind: "index",
        target: expr,
        index: index.value,
        span: mergeSpans(expr.span, cursor.previous.span),
      };
      continue;
    }

    if (cursor.match(".")) {
      if (cursor.check("(")) {
        const projection = parseProjection(cursor, expr);
        if (!projection.ok) return failed;
        expr = projection.value;
        continue;
      }

      const member = cursor.expectIdentifier("member name");
      if (!member.ok) return failed;
      expr = {
        id: getSyntaxId(),
        kind: "member",
        target: expr,
        member: member.value,
        span: mergeSpans(expr.span, member.value.span),
      };
      continue;
    }

    if (cursor.check("{") && expr.kind === "identifier") {
      const literal = parseStructLiteral(cursor, { name: expr.name, span: expr.span });
      if (!literal.ok) return failed;
      expr = literal.value;
      continue;
    }

    if (cursor.check("++") || cursor.check("--")) {
      const operatorToken = cursor.advance();
      const operator = operatorToken.text === "++" ? "++" : "--";
      if (!isAssignmentTarget(expr)) {
        reportInvalidTarget(cursor, expr, operator);
        return failed;
      }
      expr = {
        id: getSyntaxId(),
        kind: "unary",
        operator,
        fixity: "postfix",
        operand: expr,
        span: mergeSpans(expr.span, operatorToken.span),
      };
      continue;
    }

    return ok(expr);
  }
};

const literalOf = (token: Token): LiteralValue | undefined => {
  switch (token.kind) {
    case "number":
      return isNumericLiteral(token.value)
        ? { type: "number", value: token.value }
        : undefined;
    case "string":
    case "char":
      return typeof token.value === "string"
        ? { type: token.kind, value: token.value }
        : undefined;
    case "keyword":
      if (typeof token.value === "boolean") {
        return { type: "bool", value: token.value };
      }
      return token.text === "null" ? { type: "null" } : undefined;
    default:
      return undefined;
  }
};

const parsePrimary = (cursor: ParserCursor): ParseOutcome<Expr> => {
  const token = cursor.current;

  if (token.kind === "identifier") {
    cursor.advance();
    return ok({ id: getSyntaxId(), kind: "identifier", name: token.text, span: token.span });
  }

  if (cursor.check("self")) {
    cursor.advance();
    return ok({ id: getSyntaxId(), kind: "self", span: token.span });
  }

  const literal = literalOf(token);
  if (literal) {
    cursor.advance();
    return ok({
      id: getSyntaxId(),
      kind: "literal",
      literal,
      text: token.text,
      span: token.span,
    });
  }

  if (cursor.match("(")) {
    const inner = parseExpression(cursor);
    if (!inner.ok || !cursor.expect(")").ok) return failed;
    return inner;
  }

  if (cursor.match("[")) {
    const elements = parseArguments(cursor, "]");
    if (!elements.ok) return failed;
    return ok({
      id: getSyntaxId(),
      kind: "array-literal",
      elements: elements.value,
      span: mergeSpans(token.span, cursor.previous.span),
    });
  }

  // The scanner already reported the bad character.
  if (token.kind === "invalid") return failed;

  emitDiagnostic({
    ctx: cursor.diagnostics,
    code: "PS0006",
    params: { kind: "expected-expression", found: describeToken(token) },
    span: token.span,
  });
  return failed;
};
