import { emitDiagnostic, type SourceSpan } from "../../diagnostics/index.js";
import type { CallExpr, Expr } from "../../parser/index.js";
import type { DeclId, TypeId } from "../ids.js";
import { containerType } from "../typing/members.js";
import { checkExpr } from "./check-expr.js";
import {
  checkAssignable,
  formatType,
  recordType,
  type CheckerState,
} from "./state.js";

const calleeName = (callee: Expr): string => {
  switch (callee.kind) {
    case "identifier":
      return callee.name;
    case "member":
      return callee.member.name;
    default:
      return "expression";
  }
};

export const checkArguments = (
  state: CheckerState,
  {
    callee,
    parameters,
    args,
    span,
  }: {
    callee: string;
    parameters: readonly TypeId[];
    args: readonly Expr[];
    span: SourceSpan;
  },
): void => {
  const argTypes = args.map((arg) => checkExpr(state, arg));
  if (argTypes.length !== parameters.length) {
    emitDiagnostic({
      ctx: state.ctx,
      code: "TY0010",
      params: {
        kind: "argument-count",
        callee,
        expected: parameters.length,
        actual: argTypes.length,
      },
      span,
    });
    return;
  }

  args.forEach((arg, index) => {
    const source = argTypes[index];
    const target = parameters[index];
    if (source === undefined || target === undefined) return;
    checkAssignable(state, {
      source,
      target,
      context: `argument ${index + 1} of '${callee}'`,
      span: arg.span,
    });
  });
};

const checkConstructorCall = (
  state: CheckerState,
  expr: CallExpr,
  decl: DeclId,
  name: string,
): TypeId => {
  const { program } = state.ctx;
  checkArguments(state, {
    callee: name,
    parameters: program.decls.getContainer(decl)?.constructorParams ?? [],
    args: expr.args,
    span: expr.span,
  });
  return containerType(program, decl) ?? program.types.unknown;
};

/** Calls to functions and methods, and `Name(...)` for class construction. */
export const checkCall = (state: CheckerState, expr: CallExpr): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const { callee } = expr;

  if (callee.kind === "identifier") {
    const id = ctx.resolutions.get(callee.id);
    const symbol = id === undefined ? undefined : ctx.symbols.getSymbol(id);
    if (symbol?.kind === "class" && symbol.decl !== undefined) {
      recordType(state, callee.id, symbol.type ?? types.unknown);
      return checkConstructorCall(state, expr, symbol.decl, symbol.name);
    }
  }

  const calleeType = checkExpr(state, callee);
  if (calleeType === types.unknown) {
    expr.args.forEach((arg) => checkExpr(state, arg));
    return types.unknown;
  }

  const desc = types.get(calleeType);
  if (desc.kind !== "function") {
    emitDiagnostic({
      ctx,
      code: "TY0011",
      params: { kind: "not-callable", type: formatType(state, calleeType) },
      span: callee.span,
    });
    expr.args.forEach((arg) => checkExpr(state, arg));
    return types.unknown;
  }

  checkArguments(state, {
    callee: calleeName(callee),
    parameters: desc.parameters,
    args: expr.args,
    span: expr.span,
  });
  return desc.returnType;
};
