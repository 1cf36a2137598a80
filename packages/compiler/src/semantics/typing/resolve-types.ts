import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  BlockStmt,
  ClassDecl,
  ConstructorDecl,
  ContainerDecl,
  Expr,
  FunctionDecl,
  Parameter,
  Stmt,
  TypeNode,
} from "../../parser/index.js";
import type { AnalysisContext } from "../context.js";
import type { DeclId, NodeId, TypeId } from "../ids.js";
import { containerType, findMember } from "./members.js";
import { isPrimitiveName, type PrimitiveName } from "./type-arena.js";

/**
 * Fourth pass: turns every written type into a TypeId. Declared symbols get
 * their types here; inheritance is validated here as well.
 */
export const resolveTypes = (ctx: AnalysisContext): void => {
  ctx.file.declarations.forEach((decl) => {
    switch (decl.kind) {
      case "function":
        resolveFunction(ctx, decl);
        return;
      case "global": {
        const { variable } = decl;
        if (variable.type) {
          const type = resolveTypeNode(ctx, variable.type);
          setDeclaredType(ctx, variable.id, type);
        }
        if (variable.initializer) resolveExprTypes(ctx, variable.initializer);
        return;
      }
      case "class":
        resolveSuperclass(ctx, decl);
        resolveMembers(ctx, decl);
        return;
      default:
        resolveMembers(ctx, decl);
    }
  });

  ctx.file.declarations.forEach((decl) => {
    if (decl.kind === "class") checkInheritance(ctx, decl);
  });
};

/** `unknown` and `null` are internal and cannot be written. */
const isWritablePrimitive = (
  name: string,
): name is Exclude<PrimitiveName, "unknown" | "null"> =>
  isPrimitiveName(name) && name !== "unknown" && name !== "null";

export const resolveTypeNode = (
  ctx: AnalysisContext,
  node: TypeNode,
): TypeId => {
  const type = resolveTypeNodeUncached(ctx, node);
  ctx.typeTable.setNodeType(node.id, type);
  return type;
};

const resolveTypeNodeUncached = (
  ctx: AnalysisContext,
  node: TypeNode,
): TypeId => {
  const { types } = ctx.program;
  switch (node.kind) {
    case "array-type":
      return types.array(resolveTypeNode(ctx, node.element));
    case "nullable-type":
      return types.nullable(resolveTypeNode(ctx, node.inner));
    case "named-type": {
      if (isWritablePrimitive(node.name)) {
        return types.primitive(node.name);
      }

      const symbolId = ctx.symbols.resolve(node.name, ctx.moduleScope);
      const symbol =
        symbolId === undefined ? undefined : ctx.symbols.getSymbol(symbolId);
      if (
        symbolId !== undefined &&
        symbol?.decl !== undefined &&
        (symbol.kind === "class" ||
          symbol.kind === "struct" ||
          symbol.kind === "enum")
      ) {
        ctx.resolutions.set(node.id, symbolId);
        return types.named({
          name: symbol.name,
          decl: symbol.decl,
          nominal: symbol.kind,
        });
      }

      emitDiagnostic({
        ctx,
        code: "TY0001",
        params: { kind: "unknown-type", name: node.name },
        span: node.span,
      });
      return types.unknown;
    }
  }
};

const setDeclaredType = (
  ctx: AnalysisContext,
  node: NodeId,
  type: TypeId,
): void => {
  const symbol = ctx.declarations.get(node);
  if (symbol !== undefined) ctx.symbols.setSymbolType(symbol, type);
};

const containerTypeOf = (
  ctx: AnalysisContext,
  decl: ContainerDecl,
): TypeId | undefined => {
  const declId = ctx.declIds.get(decl.id);
  return declId === undefined
    ? undefined
    : containerType(ctx.program, declId);
};

const resolveParameters = (
  ctx: AnalysisContext,
  params: readonly Parameter[],
): TypeId[] =>
  params.map((param) => resolveTypeNode(ctx, param.type));

/** Resolves a function or method signature and the types written in its body. */
const resolveFunction = (ctx: AnalysisContext, fn: FunctionDecl): void => {
  const { types } = ctx.program;
  const parameters = resolveParameters(ctx, fn.params);
  const returnType = fn.returnType
    ? resolveTypeNode(ctx, fn.returnType)
    : types.void;
  setDeclaredType(ctx, fn.id, types.fn(parameters, returnType));
  // Parameter symbols are declared by the binder, keyed by parameter node.
  fn.params.forEach((param, index) => {
    const type = parameters[index];
    if (type !== undefined) setDeclaredType(ctx, param.id, type);
  });
  resolveBlock(ctx, fn.body);
};

const resolveConstructor = (
  ctx: AnalysisContext,
  constructor: ConstructorDecl,
): TypeId[] => {
  const parameters = resolveParameters(ctx, constructor.params);
  constructor.params.forEach((param, index) => {
    const type = parameters[index];
    if (type !== undefined) setDeclaredType(ctx, param.id, type);
  });
  resolveBlock(ctx, constructor.body);
  return parameters;
};

const resolveMembers = (ctx: AnalysisContext, decl: ContainerDecl): void => {
  const selfType = containerTypeOf(ctx, decl);
  if (selfType !== undefined) setDeclaredType(ctx, decl.id, selfType);

  decl.fields.forEach((field) => {
    setDeclaredType(ctx, field.id, resolveTypeNode(ctx, field.type));
    if (field.initializer) resolveExprTypes(ctx, field.initializer);
  });

  if (decl.kind === "enum") {
    decl.constants.forEach((constant) => {
      if (selfType !== undefined) setDeclaredType(ctx, constant.id, selfType);
      constant.args?.forEach((arg) => resolveExprTypes(ctx, arg));
    });
  }

  decl.methods.forEach((method) => resolveFunction(ctx, method));

  const declId = ctx.declIds.get(decl.id);
  decl.constructors.forEach((constructor, index) => {
    const parameters = resolveConstructor(ctx, constructor);
    if (index === 0 && declId !== undefined) {
      ctx.program.decls.setConstructorParams(declId, parameters);
    }
  });
};

const resolveSuperclass = (ctx: AnalysisContext, decl: ClassDecl): void => {
  const declId = ctx.declIds.get(decl.id);
  if (!decl.superclass || declId === undefined) return;

  const type = resolveTypeNode(ctx, decl.superclass);
  const desc = ctx.program.types.get(type);
  if (desc.kind !== "named") return;

  if (desc.nominal !== "class") {
    emitDiagnostic({
      ctx,
      code: "TY0021",
      params: {
        kind: "superclass-not-class",
        className: decl.name.name,
        superclass: desc.name,
      },
      span: decl.superclass.span,
    });
    return;
  }

  const superEntry = ctx.program.decls.getContainer(desc.decl);
  if (superEntry?.node.final) {
    emitDiagnostic({
      ctx,
      code: "TY0021",
      params: {
        kind: "final-superclass",
        className: decl.name.name,
        superclass: desc.name,
      },
      span: decl.superclass.span,
    });
  }

  ctx.program.decls.setSuperclass(declId, desc.decl);
};

const inheritsFromSelf = (ctx: AnalysisContext, declId: DeclId): boolean => {
  const { decls } = ctx.program;
  const seen = new Set<DeclId>();
  let current = decls.getContainer(declId)?.superclass;
  while (current !== undefined && !seen.has(current)) {
    if (current === declId) return true;
    seen.add(current);
    current = decls.getContainer(current)?.superclass;
  }
  return false;
};

const checkInheritance = (ctx: AnalysisContext, decl: ClassDecl): void => {
  const declId = ctx.declIds.get(decl.id);
  if (declId === undefined || !decl.superclass) return;

  if (inheritsFromSelf(ctx, declId)) {
    emitDiagnostic({
      ctx,
      code: "TY0021",
      params: { kind: "inheritance-cycle", className: decl.name.name },
      span: decl.name.span,
    });
    return;
  }

  const superclass = ctx.program.decls.getContainer(declId)?.superclass;
  if (superclass === undefined) return;
  decl.methods.forEach((method) => {
    const inherited = findMember(ctx.program, superclass, method.name.name);
    if (inherited?.symbol.kind === "method" && inherited.symbol.final) {
      emitDiagnostic({
        ctx,
        code: "TY0021",
        params: {
          kind: "final-method-override",
          className: decl.name.name,
          method: method.name.name,
        },
        span: method.name.span,
      });
    }
  });
};

const resolveBlock = (ctx: AnalysisContext, block: BlockStmt): void => {
  block.statements.forEach((stmt) => resolveStmt(ctx, stmt));
};

/** Resolves local annotations and cast targets inside a body. */
const resolveStmt = (ctx: AnalysisContext, stmt: Stmt): void => {
  switch (stmt.kind) {
    case "block":
      resolveBlock(ctx, stmt);
      return;
    case "expression":
      resolveExprTypes(ctx, stmt.expression);
      return;
    case "return":
      if (stmt.value) resolveExprTypes(ctx, stmt.value);
      return;
    case "break":
    case "continue":
      return;
    case "variable":
      if (stmt.type) {
        setDeclaredType(ctx, stmt.id, resolveTypeNode(ctx, stmt.type));
      }
      if (stmt.initializer) resolveExprTypes(ctx, stmt.initializer);
      return;
    case "if":
      resolveExprTypes(ctx, stmt.condition);
      resolveBlock(ctx, stmt.then);
      stmt.elifs.forEach((clause) => {
        resolveExprTypes(ctx, clause.condition);
        resolveBlock(ctx, clause.body);
      });
      if (stmt.otherwise) resolveBlock(ctx, stmt.otherwise);
      return;
    case "while":
    case "do-while":
      resolveExprTypes(ctx, stmt.condition);
      resolveBlock(ctx, stmt.body);
      return;
    case "for":
      if (stmt.initializer) resolveStmt(ctx, stmt.initializer);
      if (stmt.condition) resolveExprTypes(ctx, stmt.condition);
      if (stmt.update) resolveExprTypes(ctx, stmt.update);
      resolveBlock(ctx, stmt.body);
      return;
    case "loop":
      resolveExprTypes(ctx, stmt.start);
      resolveExprTypes(ctx, stmt.end);
      if (stmt.step) resolveExprTypes(ctx, stmt.step);
      resolveBlock(ctx, stmt.body);
      return;
  }
};

const resolveExprTypes = (ctx: AnalysisContext, expr: Expr): void => {
  switch (expr.kind) {
    case "cast":
      resolveTypeNode(ctx, expr.type);
      resolveExprTypes(ctx, expr.expr);
      return;
    case "identifier":
    case "self":
    case "literal":
      return;
    case "unary":
      resolveExprTypes(ctx, expr.operand);
      return;
    case "binary":
      resolveExprTypes(ctx, expr.left);
      resolveExprTypes(ctx, expr.right);
      return;
    case "assignment":
    case "compound-assignment":
      resolveExprTypes(ctx, expr.target);
      resolveExprTypes(ctx, expr.value);
      return;
    case "call":
      resolveExprTypes(ctx, expr.callee);
      expr.args.forEach((arg) => resolveExprTypes(ctx, arg));
      return;
    case "index":
      resolveExprTypes(ctx, expr.target);
      resolveExprTypes(ctx, expr.index);
      return;
    case "member":
    case "projection":
      resolveExprTypes(ctx, expr.target);
      return;
    case "ternary":
      resolveExprTypes(ctx, expr.condition);
      resolveExprTypes(ctx, expr.whenTrue);
      resolveExprTypes(ctx, expr.whenFalse);
      return;
    case "array-literal":
      expr.elements.forEach((element) => resolveExprTypes(ctx, element));
      return;
    case "struct-literal":
      expr.fields.forEach((field) => resolveExprTypes(ctx, field.value));
      return;
  }
};
