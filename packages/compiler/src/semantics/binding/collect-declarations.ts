import type {
  ContainerDecl,
  FunctionDecl,
  GlobalDecl,
} from "../../parser/index.js";
import { declareSymbol } from "../binder/declare.js";
import type { AnalysisContext } from "../context.js";
import type { DeclId, ScopeId } from "../ids.js";

/**
 * First pass: declares every top-level function, type and global in the
 * module scope, and every field, method and enum constant in its type's
 * member scope, so later passes can refer to them regardless of order.
 */
export const collectDeclarations = (ctx: AnalysisContext): void => {
  ctx.file.declarations.forEach((decl) => {
    switch (decl.kind) {
      case "function":
        collectFunction(ctx, decl, ctx.moduleScope);
        return;
      case "global":
        collectGlobal(ctx, decl);
        return;
      default:
        collectContainer(ctx, decl);
    }
  });
};

const collectFunction = (
  ctx: AnalysisContext,
  fn: FunctionDecl,
  scope: ScopeId,
  owner?: DeclId,
): void => {
  const entry = ctx.program.decls.register({
    kind: "function",
    node: fn,
    moduleId: ctx.moduleId,
    symbols: ctx.symbols,
  });
  ctx.declIds.set(fn.id, entry.id);

  const symbol = declareSymbol(
    ctx,
    {
      name: fn.name.name,
      kind: owner === undefined ? "function" : "method",
      declaredAt: fn.id,
      span: fn.name.span,
      access: fn.visibility,
      mutable: false,
      final: fn.final,
      decl: entry.id,
      ...(owner === undefined ? {} : { owner }),
    },
    scope,
  );
  if (symbol !== undefined) ctx.declarations.set(fn.id, symbol);
};

const collectGlobal = (ctx: AnalysisContext, global: GlobalDecl): void => {
  const { variable } = global;
  const entry = ctx.program.decls.register({
    kind: "global",
    node: global,
    moduleId: ctx.moduleId,
    symbols: ctx.symbols,
  });
  ctx.declIds.set(global.id, entry.id);

  const symbol = declareSymbol(
    ctx,
    {
      name: variable.name.name,
      kind: "variable",
      declaredAt: variable.id,
      span: variable.name.span,
      access: global.visibility,
      mutable: variable.mutable,
      final: variable.final,
      decl: entry.id,
    },
    ctx.moduleScope,
  );
  if (symbol !== undefined) ctx.declarations.set(variable.id, symbol);
};

const collectContainer = (ctx: AnalysisContext, decl: ContainerDecl): void => {
  const memberScope = ctx.symbols.createScope({
    parent: ctx.moduleScope,
    kind: "type",
    owner: decl.id,
  });
  const entry = ctx.program.decls.register({
    kind: "container",
    node: decl,
    moduleId: ctx.moduleId,
    symbols: ctx.symbols,
    memberScope,
  });
  ctx.declIds.set(decl.id, entry.id);

  const symbol = declareSymbol(
    ctx,
    {
      name: decl.name.name,
      kind: decl.kind,
      declaredAt: decl.id,
      span: decl.name.span,
      access: decl.visibility,
      mutable: false,
      final: decl.final,
      decl: entry.id,
    },
    ctx.moduleScope,
  );
  if (symbol !== undefined) ctx.declarations.set(decl.id, symbol);

  if (decl.kind === "enum") {
    decl.constants.forEach((constant) => {
      const id = declareSymbol(
        ctx,
        {
          name: constant.name.name,
          kind: "enum-constant",
          declaredAt: constant.id,
          span: constant.name.span,
          access: "public",
          mutable: false,
          final: true,
          owner: entry.id,
        },
        memberScope,
      );
      if (id !== undefined) ctx.declarations.set(constant.id, id);
    });
  }

  decl.fields.forEach((field) => {
    const id = declareSymbol(
      ctx,
      {
        name: field.name.name,
        kind: "field",
        declaredAt: field.id,
        span: field.name.span,
        access: field.visibility,
        mutable: field.mutable,
        final: field.final,
        owner: entry.id,
      },
      memberScope,
    );
    if (id !== undefined) ctx.declarations.set(field.id, id);
  });

  decl.methods.forEach((method) =>
    collectFunction(ctx, method, memberScope, entry.id),
  );
};
