import {
  getSyntaxId,
  type BlockStmt,
  type ElifClause,
  type Expr,
  type ExpressionStmt,
  type Stmt,
  type TypeNode,
  type VariableStmt,
} from "./ast/nodes.js";
import { failed, ok, type ParseOutcome, type ParserCursor } from "./cursor.js";
import { parseExpression } from "./expressions.js";
import type { Token } from "./token.js";
import { parseType } from "./types.js";

export const parseBlock = (cursor: ParserCursor): ParseOutcome<BlockStmt> => {
  const open = cursor.expect("{");
  if (!open.ok) return failed;

  const statements: Stmt[] = [];
  while (!cursor.check("}") && !cursor.atEnd) {
    const before = cursor.consumed;
    const statement = parseStatement(cursor);
    if (statement.ok) {
      statements.push(statement.value);
    } else {
      cursor.synchronize(before);
    }
  }

  // A missing `}` at end of input is reported but the block is kept.
  cursor.expect("}");
  return ok({
    id: getSyntaxId(),
    kind: "block",
    statements,
    span: cursor.spanFrom(open.value),
  });
};

/** Parses `var`/`let` through the terminating `;`. */
export const parseVariable = (
  cursor: ParserCursor,
  start: Token,
  options: { final: boolean },
): ParseOutcome<VariableStmt> => {
  const keyword = cursor.advance();
  const name = cursor.expectIdentifier("variable name");
  if (!name.ok) return failed;

  let type: TypeNode | undefined;
  if (cursor.match("->")) {
    const parsed = parseType(cursor);
    if (!parsed.ok) return failed;
    type = parsed.value;
  }

  let initializer: Expr | undefined;
  if (cursor.match("=")) {
    const parsed = parseExpression(cursor);
    if (!parsed.ok) return failed;
    initializer = parsed.value;
  }

  if (!cursor.expect(";").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "variable",
    name: name.value,
    mutable: keyword.text === "var" && !options.final,
    final: options.final,
    ...(type ? { type } : {}),
    ...(initializer ? { initializer } : {}),
    span: cursor.spanFrom(start),
  });
};

const parseCondition = (cursor: ParserCursor): ParseOutcome<Expr> => {
  if (!cursor.expect("(").ok) return failed;
  const condition = parseExpression(cursor);
  if (!condition.ok || !cursor.expect(")").ok) return failed;
  return condition;
};

const parseIf = (cursor: ParserCursor): ParseOutcome<Stmt> => {
  const start = cursor.advance();
  const condition = parseCondition(cursor);
  if (!condition.ok) return failed;
  const then = parseBlock(cursor);
  if (!then.ok) return failed;

  const elifs: ElifClause[] = [];
  while (cursor.match("elif")) {
    const elifCondition = parseCondition(cursor);
    if (!elifCondition.ok) return failed;
    const body = parseBlock(cursor);
    if (!body.ok) return failed;
    elifs.push({ condition: elifCondition.value, body: body.value });
  }

  let otherwise: BlockStmt | undefined;
  if (cursor.match("else")) {
    if (cursor.check("if")) {
      // `else if` nests the chained statement in its own block.
      const nested = parseIf(cursor);
      if (!nested.ok) return failed;
      otherwise = {
        id: getSyntaxId(),
        kind: "block",
        statements: [nested.value],
        span: nested.value.span,
      };
    } else {
      const body = parseBlock(cursor);
      if (!body.ok) return failed;
      otherwise = body.value;
    }
  }

  return ok({
    id: getSyntaxId(),
    kind: "if",
    condition: condition.value,
    then: then.value,
    elifs,
    ...(otherwise ? { otherwise } : {}),
    span: cursor.spanFrom(start),
  });
};

const parseWhile = (cursor: ParserCursor): ParseOutcome<Stmt> => {
  const start = cursor.advance();
  const condition = parseCondition(cursor);
  if (!condition.ok) return failed;
  const body = parseBlock(cursor);
  if (!body.ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "while",
    condition: condition.value,
    body: body.value,
    span: cursor.spanFrom(start),
  });
};

const parseDoWhile = (cursor: ParserCursor): ParseOutcome<Stmt> => {
  const start = cursor.advance();
  const body = parseBlock(cursor);
  if (!body.ok || !cursor.expect("while").ok) return failed;
  const condition = parseCondition(cursor);
  if (!condition.ok || !cursor.expect(";").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "do-while",
    body: body.value,
    condition: condition.value,
    span: cursor.spanFrom(start),
  });
};

const parseForInitializer = (
  cursor: ParserCursor,
): ParseOutcome<VariableStmt | ExpressionStmt | undefined> => {
  if (cursor.match(";")) return ok(undefined);

  const start = cursor.current;
  if (cursor.check("var") || cursor.check("let")) {
    return parseVariable(cursor, start, { final: false });
  }

  const expression = parseExpression(cursor);
  if (!expression.ok || !cursor.expect(";").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "expression",
    expression: expression.value,
    span: cursor.spanFrom(start),
  });
};

const parseFor = (cursor: ParserCursor): ParseOutcome<Stmt> => {
  const start = cursor.advance();
  if (!cursor.expect("(").ok) return failed;

  const initializer = parseForInitializer(cursor);
  if (!initializer.ok) return failed;

  let condition: Expr | undefined;
  if (!cursor.check(";")) {
    const parsed = parseExpression(cursor);
    if (!parsed.ok) return failed;
    condition = parsed.value;
  }
  if (!cursor.expect(";").ok) return failed;

  let update: Expr | undefined;
  if (!cursor.check(")")) {
    const parsed = parseExpression(cursor);
    if (!parsed.ok) return failed;
    update = parsed.value;
  }
  if (!cursor.expect(")").ok) return failed;

  const body = parseBlock(cursor);
  if (!body.ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "for",
    ...(initializer.value ? { initializer: initializer.value } : {}),
    ...(condition ? { condition } : {}),
    ...(update ? { update } : {}),
    body: body.value,
    span: cursor.spanFrom(start),
  });
};

/** `loop (i: a..b step s rev) { ... }`, optionally written `rev loop (...)`. */
const parseLoop = (cursor: ParserCursor, start: Token): ParseOutcome<Stmt> => {
  let reverse = cursor.match("rev");
  if (!cursor.expect("loop").ok || !cursor.expect("(").ok) return failed;

  const variable = cursor.expectIdentifier("loop variable");
  if (!variable.ok || !cursor.expect(":").ok) return failed;

  const from = parseExpression(cursor);
  if (!from.ok) return failed;

  const inclusive = cursor.check("..=");
  if (!inclusive && !cursor.check("..")) {
    cursor.unexpected("'..' or '..='");
    return failed;
  }
  cursor.advance();

  const to = parseExpression(cursor);
  if (!to.ok) return failed;

  let step: Expr | undefined;
  if (cursor.match("step")) {
    const parsed = parseExpression(cursor);
    if (!parsed.ok) return failed;
    step = parsed.value;
  }
  if (cursor.match("rev")) reverse = true;
  if (!cursor.expect(")").ok) return failed;

  const body = parseBlock(cursor);
  if (!body.ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "loop",
    variable: variable.value,
    start: from.value,
    end: to.value,
    inclusive,
    ...(step ? { step } : {}),
    reverse,
    body: body.value,
    span: cursor.spanFrom(start),
  });
};

export const parseStatement = (cursor: ParserCursor): ParseOutcome<Stmt> => {
  const start = cursor.current;

  if (cursor.check("{")) return parseBlock(cursor);

  if (cursor.check("final") && (cursor.peek().text === "var" || cursor.peek().text === "let")) {
    cursor.advance();
    return parseVariable(cursor, start, { final: true });
  }

  if (cursor.check("var") || cursor.check("let")) {
    return parseVariable(cursor, start, { final: false });
  }

  if (cursor.match("return")) {
    if (cursor.match(";")) {
      return ok({ id: getSyntaxId(), kind: "return", span: cursor.spanFrom(start) });
    }
    const value = parseExpression(cursor);
    if (!value.ok || !cursor.expect(";").ok) return failed;
    return ok({
      id: getSyntaxId(),
      kind: "return",
      value: value.value,
      span: cursor.spanFrom(start),
    });
  }

  if (cursor.check("break") || cursor.check("continue")) {
    const keyword = cursor.advance();
    if (!cursor.expect(";").ok) return failed;
    return ok({
      id: getSyntaxId(),
      kind: keyword.text === "break" ? "break" : "continue",
      span: cursor.spanFrom(start),
    });
  }

  if (cursor.check("if")) return parseIf(cursor);
  if (cursor.check("while")) return parseWhile(cursor);
  if (cursor.check("do")) return parseDoWhile(cursor);
  if (cursor.check("for")) return parseFor(cursor);
  if (cursor.check("loop") || cursor.check("rev")) return parseLoop(cursor, start);

  const expression = parseExpression(cursor);
  if (!expression.ok || !cursor.expect(";").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "expression",
    expression: expression.value,
    span: cursor.spanFrom(start),
  });
};
