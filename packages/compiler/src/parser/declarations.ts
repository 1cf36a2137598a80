import { emitDiagnostic } from "../diagnostics/index.js";
import {
  getSyntaxId,
  type ConstructorDecl,
  type Decl,
  type EnumConstant,
  type Expr,
  type FieldDecl,
  type FunctionDecl,
  type Identifier,
  type ImportEntry,
  type ImportForm,
  type ModuleDecl,
  type Modifiers,
  type Parameter,
  type TypeNode,
} from "./ast/nodes.js";
import { failed, ok, type ParseOutcome, type ParserCursor } from "./cursor.js";
import { parseExpression } from "./expressions.js";
import { isVisibilityKeyword, visibilityKeywords } from "./grammar.js";
import { parseBlock, parseVariable } from "./statements.js";
import { describeToken, type Token } from "./token.js";
import { parseType } from "./types.js";

interface ParsedModifiers extends Modifiers {
  /** Last modifier keyword consumed, if any. */
  keyword?: Token;
}

const parseModifiers = (cursor: ParserCursor): ParsedModifiers => {
  let modifiers: ParsedModifiers = { visibility: "default", final: false };
  const current = cursor.current;
  if (isVisibilityKeyword(current)) {
    cursor.advance();
    modifiers = { ...modifiers, visibility: visibilityKeywords[current.text], keyword: current };
  }
  if (cursor.check("final")) {
    modifiers = { ...modifiers, final: true, keyword: cursor.advance() };
  }
  return modifiers;
};

const reportMissingDeclaration = (
  cursor: ParserCursor,
  modifiers: ParsedModifiers,
): void => {
  const found = describeToken(cursor.current);
  if (modifiers.keyword) {
    emitDiagnostic({
      ctx: cursor.diagnostics,
      code: "PS0003",
      params: { kind: "dangling-modifier", modifier: modifiers.keyword.text, found },
      span: modifiers.keyword.span,
    });
    return;
  }
  emitDiagnostic({
    ctx: cursor.diagnostics,
    code: "PS0003",
    params: { kind: "expected-declaration", found },
    span: cursor.current.span,
  });
};

const reportInvalidModifier = (
  cursor: ParserCursor,
  modifier: Token,
  declaration: string,
): void => {
  emitDiagnostic({
    ctx: cursor.diagnostics,
    code: "PS0005",
    params: { kind: "invalid-modifier", modifier: modifier.text, declaration },
    span: modifier.span,
  });
};

const parsePathSegments = (cursor: ParserCursor): ParseOutcome<Identifier[]> => {
  const first = cursor.expectIdentifier("module path");
  if (!first.ok) return failed;
  const segments = [first.value];

  for (;;) {
    const separator = cursor.check(".") || cursor.check("::");
    if (!separator || cursor.peek().kind !== "identifier") return ok(segments);
    cursor.advance();
    const segment = cursor.expectIdentifier("module path");
    if (!segment.ok) return failed;
    segments.push(segment.value);
  }
};

export const parseModuleDecl = (cursor: ParserCursor): ParseOutcome<ModuleDecl> => {
  const start = cursor.advance();
  const path = parsePathSegments(cursor);
  if (!path.ok || !cursor.expect(";").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "module",
    path: path.value.map((segment) => segment.name),
    span: cursor.spanFrom(start),
  });
};

const parseImportEntries = (cursor: ParserCursor): ParseOutcome<ImportEntry[]> => {
  if (!cursor.expect("{").ok) return failed;
  const entries: ImportEntry[] = [];
  while (!cursor.check("}")) {
    const name = cursor.expectIdentifier("imported name");
    if (!name.ok) return failed;
    if (cursor.match("as")) {
      const alias = cursor.expectIdentifier("alias");
      if (!alias.ok) return failed;
      entries.push({ name: name.value, alias: alias.value });
    } else {
      entries.push({ name: name.value });
    }
    if (!cursor.match(",")) break;
  }
  if (!cursor.expect("}").ok) return failed;
  return ok(entries);
};

const parseImport = (
  cursor: ParserCursor,
  start: Token,
  modifiers: ParsedModifiers,
): ParseOutcome<Decl> => {
  if (modifiers.final && modifiers.keyword) {
    reportInvalidModifier(cursor, modifiers.keyword, "an import");
  }
  cursor.advance();

  const path = parsePathSegments(cursor);
  if (!path.ok) return failed;

  let form: ImportForm = { kind: "symbol" };
  if (cursor.match("::")) {
    if (cursor.match("*")) {
      form = { kind: "wildcard" };
    } else {
      const entries = parseImportEntries(cursor);
      if (!entries.ok) return failed;
      form = { kind: "group", entries: entries.value };
    }
  } else if (path.value.length > 1 && cursor.match("as")) {
    const alias = cursor.expectIdentifier("alias");
    if (!alias.ok) return failed;
    form = { kind: "symbol", alias: alias.value };
  }

  if (!cursor.expect(";").ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "import",
    path: path.value,
    form,
    visibility: modifiers.visibility,
    span: cursor.spanFrom(start),
  });
};

const parseParameters = (cursor: ParserCursor): ParseOutcome<Parameter[]> => {
  if (!cursor.expect("(").ok) return failed;
  const params: Parameter[] = [];
  while (!cursor.check(")")) {
    const name = cursor.expectIdentifier("parameter name");
    if (!name.ok || !cursor.expect(":").ok) return failed;
    const type = parseType(cursor);
    if (!type.ok) return failed;
    params.push({
      id: getSyntaxId(),
      kind: "parameter",
      name: name.value,
      type: type.value,
      span: cursor.spanFrom(name.value.span),
    });
    if (!cursor.match(",")) break;
  }
  if (!cursor.expect(")").ok) return failed;
  return ok(params);
};

const parseFunction = (
  cursor: ParserCursor,
  start: Token,
  modifiers: Modifiers,
): ParseOutcome<FunctionDecl> => {
  cursor.advance();
  const name = cursor.expectIdentifier("function name");
  if (!name.ok) return failed;
  const params = parseParameters(cursor);
  if (!params.ok) return failed;

  let returnType: TypeNode | undefined;
  if (cursor.match("->")) {
    const parsed = parseType(cursor);
    if (!parsed.ok) return failed;
    returnType = parsed.value;
  }

  const body = parseBlock(cursor);
  if (!body.ok) return failed;
  return ok({
    id: getSyntaxId(),
    kind: "function",
    name: name.value,
    params: params.value,
    ...(returnType ? { returnType } : {}),
    body: body.value,
    visibility: modifiers.visibility,
    final: modifiers.final,
    span: cursor.spanFrom(start),
  });
};

interface ContainerMembers {
  fields: FieldDecl[];
  methods: FunctionDecl[];
  constructors: ConstructorDecl[];
}

const parseField = (
  cursor: ParserCursor,
  start: Token,
  modifiers: Modifiers,
): ParseOutcome<FieldDecl> => {
  let mutable = !modifiers.final;
  if (cursor.check("var") || cursor.check("let")) {
    mutable = cursor.advance().text === "var" && !modifiers.final;
  }

  const name = cursor.expectIdentifier("field name");
  if (!name.ok || !cursor.expect("->").ok) return failed;
  const type = parseType(cursor);
  if (!type.ok) return failed;

  let initializer: Expr | undefined;
  if (cursor.match("=")) {
    const parsed = parseExpression(cursor);
    if (!parsed.ok) return failed;
    initializer = parsed.value;
  }
  if (!cursor.expect(";").ok) return failed;

  return ok({
    id: getSyntaxId(),
    kind: "field",
    name: name.value,
    mutable,
    type: type.value,
    ...(initializer ? { initializer } : {}),
    visibility: modifiers.visibility,
    final: modifiers.final,
    span: cursor.spanFrom(start),
  });
};

const parseMember = (
  cursor: ParserCursor,
  members: ContainerMembers,
): ParseOutcome<void> => {
  const start = cursor.current;
  const modifiers = parseModifiers(cursor);

  if (cursor.check("func")) {
    const method = parseFunction(cursor, start, modifiers);
    if (!method.ok) return failed;
    members.methods.push(method.value);
    return ok(undefined);
  }

  if (cursor.check("constructor")) {
    if (modifiers.final && modifiers.keyword) {
      reportInvalidModifier(cursor, modifiers.keyword, "a constructor");
    }
    cursor.advance();
    const params = parseParameters(cursor);
    if (!params.ok) return failed;
    const body = parseBlock(cursor);
    if (!body.ok) return failed;
    members.constructors.push({
      id: getSyntaxId(),
      kind: "constructor",
      params: params.value,
      body: body.value,
      visibility: modifiers.visibility,
      span: cursor.spanFrom(start),
    });
    return ok(undefined);
  }

  const fieldStart =
    cursor.check("var") ||
    cursor.check("let") ||
    (cursor.current.kind === "identifier" && cursor.peek().text === "->");
  if (fieldStart) {
    const field = parseField(cursor, start, modifiers);
    if (!field.ok) return failed;
    members.fields.push(field.value);
    return ok(undefined);
  }

  reportMissingDeclaration(cursor, modifiers);
  return failed;
};

const parseMembers = (cursor: ParserCursor, members: ContainerMembers): void => {
  while (!cursor.check("}") && !cursor.atEnd) {
    const before = cursor.consumed;
    if (!parseMember(cursor, members).ok) {
      cursor.synchronize(before);
    }
  }
};

const emptyMembers = (): ContainerMembers => ({
  fields: [],
  methods: [],
  constructors: [],
});

const parseClass = (
  cursor: ParserCursor,
  start: Token,
  modifiers: Modifiers,
): ParseOutcome<Decl> => {
  cursor.advance();
  const name = cursor.expectIdentifier("class name");
  if (!name.ok) return failed;

  let superclass: TypeNode | undefined;
  if (cursor.match(":")) {
    const parsed = parseType(cursor);
    if (!parsed.ok) return failed;
    superclass = parsed.value;
  }

  if (!cursor.expect("{").ok) return failed;
  const members = emptyMembers();
  parseMembers(cursor, members);
  if (!cursor.expect("}").ok) return failed;

  return ok({
    id: getSyntaxId(),
    kind: "class",
    name: name.value,
    ...(superclass ? { superclass } : {}),
    ...members,
    visibility: modifiers.visibility,
    final: modifiers.final,
    span: cursor.spanFrom(start),
  });
};

const parseStruct = (
  cursor: ParserCursor,
  start: Token,
  modifiers: Modifiers,
): ParseOutcome<Decl> => {
  cursor.advance();
  const name = cursor.expectIdentifier("struct name");
  if (!name.ok || !cursor.expect("{").ok) return failed;
  const members = emptyMembers();
  parseMembers(cursor, members);
  if (!cursor.expect("}").ok) return failed;

  return ok({
    id: getSyntaxId(),
    kind: "struct",
    name: name.value,
    ...members,
    visibility: modifiers.visibility,
    final: modifiers.final,
    span: cursor.spanFrom(start),
  });
};

const parseEnumConstant = (cursor: ParserCursor): ParseOutcome<EnumConstant> => {
  const name = cursor.expectIdentifier("enum constant");
  if (!name.ok) return failed;

  let args: Expr[] | undefined;
  if (cursor.match("(")) {
    args = [];
    while (!cursor.check(")")) {
      const arg = parseExpression(cursor);
      if (!arg.ok) return failed;
      args.push(arg.value);
      if (!cursor.match(",")) break;
    }
    if (!cursor.expect(")").ok) return failed;
  }

  return ok({
    id: getSyntaxId(),
    kind: "enum-constant",
    name: name.value,
    ...(args ? { args } : {}),
    span: cursor.spanFrom(name.value.span),
  });
};

/** Constants come first, then an optional `;` and ordinary members. */
const parseEnum = (
  cursor: ParserCursor,
  start: Token,
  modifiers: Modifiers,
): ParseOutcome<Decl> => {
  cursor.advance();
  const name = cursor.expectIdentifier("enum name");
  if (!name.ok || !cursor.expect("{").ok) return failed;

  const constants: EnumConstant[] = [];
  while (!cursor.check(";") && !cursor.check("}")) {
    const constant = parseEnumConstant(cursor);
    if (!constant.ok) return failed;
    constants.push(constant.value);
    if (!cursor.match(",")) break;
  }

  const members = emptyMembers();
  if (cursor.match(";")) {
    parseMembers(cursor, members);
  }
  if (!cursor.expect("}").ok) return failed;

  return ok({
    id: getSyntaxId(),
    kind: "enum",
    name: name.value,
    constants,
    ...members,
    visibility: modifiers.visibility,
    final: modifiers.final,
    span: cursor.spanFrom(start),
  });
};

export const parseDeclaration = (cursor: ParserCursor): ParseOutcome<Decl> => {
  const start = cursor.current;
  const modifiers = parseModifiers(cursor);

  if (cursor.check("import")) return parseImport(cursor, start, modifiers);
  if (cursor.check("func")) return parseFunction(cursor, start, modifiers);
  if (cursor.check("class")) return parseClass(cursor, start, modifiers);
  if (cursor.check("struct")) return parseStruct(cursor, start, modifiers);
  if (cursor.check("enum")) return parseEnum(cursor, start, modifiers);

  if (cursor.check("var") || cursor.check("let")) {
    const variable = parseVariable(cursor, start, { final: modifiers.final });
    if (!variable.ok) return failed;
    return ok({
      id: getSyntaxId(),
      kind: "global",
      variable: variable.value,
      visibility: modifiers.visibility,
      span: variable.value.span,
    });
  }

  reportMissingDeclaration(cursor, modifiers);
  return failed;
};
