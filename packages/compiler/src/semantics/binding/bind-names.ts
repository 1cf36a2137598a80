import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  BlockStmt,
  ConstructorDecl,
  ContainerDecl,
  Expr,
  FunctionDecl,
  Parameter,
  Stmt,
  VariableStmt,
} from "../../parser/index.js";
import { declareSymbol } from "../binder/declare.js";
import type { AnalysisContext } from "../context.js";
import type { DeclId, NodeId } from "../ids.js";

interface BinderState {
  ctx: AnalysisContext;
  loopDepth: number;
  /** Type whose method or constructor is being bound. */
  container?: DeclId;
  /** Undefined names already reported in this module. */
  reported: Set<string>;
}

/**
 * Third pass: opens function, block and loop scopes, declares parameters and
 * locals, and links every identifier use to the symbol it names.
 */
export const bindNames = (ctx: AnalysisContext): void => {
  const state: BinderState = { ctx, loopDepth: 0, reported: new Set() };

  ctx.file.declarations.forEach((decl) => {
    switch (decl.kind) {
      case "function":
        bindCallable(state, decl);
        return;
      case "global":
        if (decl.variable.initializer) {
          bindExpr(state, decl.variable.initializer);
        }
        return;
      default:
        bindContainer(state, decl);
    }
  });
};

const bindContainer = (state: BinderState, decl: ContainerDecl): void => {
  const { ctx } = state;
  const declId = ctx.declIds.get(decl.id);
  const entry =
    declId === undefined ? undefined : ctx.program.decls.getContainer(declId);
  if (!entry) return;

  ctx.symbols.enterScope(entry.memberScope);
  const outer = state.container;
  state.container = entry.id;

  decl.fields.forEach((field) => {
    if (field.initializer) bindExpr(state, field.initializer);
  });

  if (decl.kind === "enum") {
    decl.constants.forEach((constant) =>
      constant.args?.forEach((arg) => bindExpr(state, arg)),
    );
  }

  decl.constructors.forEach((constructor, index) => {
    if (index > 0) {
      emitDiagnostic({
        ctx,
        code: "BD0006",
        params: { kind: "duplicate-constructor", typeName: decl.name.name },
        span: constructor.span,
      });
    }
    bindCallable(state, constructor);
  });

  decl.methods.forEach((method) => bindCallable(state, method));

  state.container = outer;
  ctx.symbols.exitScope();
};

const bindCallable = (
  state: BinderState,
  callable: FunctionDecl | ConstructorDecl,
): void => {
  const { symbols } = state.ctx;
  symbols.enter("function", callable.id);
  callable.params.forEach((param) => declareParameter(state, param));

  // Loops do not reach into nested callables.
  const outerDepth = state.loopDepth;
  state.loopDepth = 0;
  bindBlock(state, callable.body);
  state.loopDepth = outerDepth;

  symbols.exitScope();
};

const declareParameter = (state: BinderState, param: Parameter): void => {
  const symbol = declareSymbol(state.ctx, {
    name: param.name.name,
    kind: "variable",
    declaredAt: param.id,
    span: param.name.span,
    access: "default",
    mutable: true,
    final: false,
  });
  if (symbol !== undefined) state.ctx.declarations.set(param.id, symbol);
};

const bindBlock = (state: BinderState, block: BlockStmt): void => {
  state.ctx.symbols.enter("block", block.id);
  block.statements.forEach((stmt) => bindStmt(state, stmt));
  state.ctx.symbols.exitScope();
};

const bindLoopBody = (state: BinderState, body: BlockStmt): void => {
  state.loopDepth += 1;
  bindBlock(state, body);
  state.loopDepth -= 1;
};

const declareLocal = (state: BinderState, stmt: VariableStmt): void => {
  if (stmt.initializer) bindExpr(state, stmt.initializer);
  const symbol = declareSymbol(state.ctx, {
    name: stmt.name.name,
    kind: "variable",
    declaredAt: stmt.id,
    span: stmt.name.span,
    access: "default",
    mutable: stmt.mutable,
    final: stmt.final,
  });
  if (symbol !== undefined) state.ctx.declarations.set(stmt.id, symbol);
};

const bindStmt = (state: BinderState, stmt: Stmt): void => {
  const { ctx } = state;
  switch (stmt.kind) {
    case "block":
      bindBlock(state, stmt);
      return;
    case "expression":
      bindExpr(state, stmt.expression);
      return;
    case "return":
      if (stmt.value) bindExpr(state, stmt.value);
      return;
    case "break":
    case "continue":
      if (state.loopDepth === 0) {
        emitDiagnostic({
          ctx,
          code: "BD0004",
          params: { kind: "jump-outside-loop", keyword: stmt.kind },
          span: stmt.span,
        });
      }
      return;
    case "variable":
      declareLocal(state, stmt);
      return;
    case "if":
      bindExpr(state, stmt.condition);
      bindBlock(state, stmt.then);
      stmt.elifs.forEach((clause) => {
        bindExpr(state, clause.condition);
        bindBlock(state, clause.body);
      });
      if (stmt.otherwise) bindBlock(state, stmt.otherwise);
      return;
    case "while":
      bindExpr(state, stmt.condition);
      bindLoopBody(state, stmt.body);
      return;
    case "do-while":
      bindLoopBody(state, stmt.body);
      bindExpr(state, stmt.condition);
      return;
    case "for":
      ctx.symbols.enter("loop", stmt.id);
      if (stmt.initializer) bindStmt(state, stmt.initializer);
      if (stmt.condition) bindExpr(state, stmt.condition);
      if (stmt.update) bindExpr(state, stmt.update);
      bindLoopBody(state, stmt.body);
      ctx.symbols.exitScope();
      return;
    case "loop": {
      bindExpr(state, stmt.start);
      bindExpr(state, stmt.end);
      if (stmt.step) bindExpr(state, stmt.step);
      ctx.symbols.enter("loop", stmt.id);
      const symbol = declareSymbol(ctx, {
        name: stmt.variable.name,
        kind: "variable",
        declaredAt: stmt.id,
        span: stmt.variable.span,
        access: "default",
        mutable: false,
        final: true,
      });
      if (symbol !== undefined) ctx.declarations.set(stmt.id, symbol);
      bindLoopBody(state, stmt.body);
      ctx.symbols.exitScope();
      return;
    }
  }
};

const resolveName = (
  state: BinderState,
  node: NodeId,
  name: string,
  span: Expr["span"],
): void => {
  const symbol = state.ctx.symbols.resolve(name);
  if (symbol !== undefined) {
    state.ctx.resolutions.set(node, symbol);
    return;
  }

  if (state.reported.has(name)) return;
  state.reported.add(name);
  emitDiagnostic({
    ctx: state.ctx,
    code: "BD0002",
    params: { kind: "undefined-symbol", name },
    span,
  });
};

const bindExpr = (state: BinderState, expr: Expr): void => {
  switch (expr.kind) {
    case "identifier":
      resolveName(state, expr.id, expr.name, expr.span);
      return;
    case "self":
      if (state.container === undefined) {
        emitDiagnostic({
          ctx: state.ctx,
          code: "BD0005",
          params: { kind: "self-outside-type" },
          span: expr.span,
        });
      }
      return;
    case "literal":
      return;
    case "unary":
      bindExpr(state, expr.operand);
      return;
    case "binary":
      bindExpr(state, expr.left);
      bindExpr(state, expr.right);
      return;
    case "assignment":
    case "compound-assignment":
      bindExpr(state, expr.target);
      bindExpr(state, expr.value);
      return;
    case "call":
      bindExpr(state, expr.callee);
      expr.args.forEach((arg) => bindExpr(state, arg));
      return;
    case "index":
      bindExpr(state, expr.target);
      bindExpr(state, expr.index);
      return;
    case "member":
    case "projection":
      // Member names are resolved against the receiver's type when checking.
      bindExpr(state, expr.target);
      return;
    case "cast":
      bindExpr(state, expr.expr);
      return;
    case "ternary":
      bindExpr(state, expr.condition);
      bindExpr(state, expr.whenTrue);
      bindExpr(state, expr.whenFalse);
      return;
    case "array-literal":
      expr.elements.forEach((element) => bindExpr(state, element));
      return;
    case "struct-literal":
      resolveName(state, expr.id, expr.name.name, expr.name.span);
      expr.fields.forEach((field) => bindExpr(state, field.value));
      return;
  }
};
