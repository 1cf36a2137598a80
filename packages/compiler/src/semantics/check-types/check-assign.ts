import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  AssignmentExpr,
  AssignmentTarget,
  CompoundAssignmentExpr,
} from "../../parser/index.js";
import type { SymbolRecord } from "../binder/types.js";
import type { TypeId } from "../ids.js";
import { isNumericType } from "../typing/numeric.js";
import { checkExpr } from "./check-expr.js";
import {
  checkAssignable,
  formatType,
  type CheckerState,
} from "./state.js";

const targetSymbol = (
  state: CheckerState,
  target: AssignmentTarget,
): Readonly<SymbolRecord> | undefined => {
  const { ctx } = state;
  if (target.kind === "member") return ctx.members.get(target.id)?.symbol;
  const id = ctx.resolutions.get(target.id);
  return id === undefined ? undefined : ctx.symbols.getSymbol(id);
};

/**
 * Reports a store into an immutable binding. `let` and `final` fields may be
 * set inside a constructor of the type that declares them.
 */
export const checkWritable = (
  state: CheckerState,
  target: AssignmentTarget,
): void => {
  const symbol = targetSymbol(state, target);
  if (!symbol) return;

  const writable =
    symbol.kind === "variable"
      ? symbol.mutable
      : symbol.kind === "field" &&
        (symbol.mutable ||
          (state.inConstructor &&
            symbol.owner !== undefined &&
            state.container === symbol.owner));
  if (writable) return;

  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0016",
    params: { kind: "immutable-assignment", name: symbol.name },
    span: target.span,
  });
};

const targetName = (target: AssignmentTarget): string =>
  target.kind === "identifier" ? target.name : target.member.name;

export const checkAssignment = (
  state: CheckerState,
  expr: AssignmentExpr,
): TypeId => {
  const target = checkExpr(state, expr.target);
  const value = checkExpr(state, expr.value);
  checkWritable(state, expr.target);
  checkAssignable(state, {
    source: value,
    target,
    context: `assignment to '${targetName(expr.target)}'`,
    span: expr.value.span,
  });
  return target;
};

export const checkCompoundAssignment = (
  state: CheckerState,
  expr: CompoundAssignmentExpr,
): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const target = checkExpr(state, expr.target);
  const value = checkExpr(state, expr.value);
  checkWritable(state, expr.target);
  if (target === types.unknown || value === types.unknown) return target;

  const numeric = isNumericType(types, target) && isNumericType(types, value);
  const appends =
    expr.operator === "+=" &&
    target === types.string &&
    (value === types.string || isNumericType(types, value));
  if (!numeric && !appends) {
    emitDiagnostic({
      ctx,
      code: "TY0003",
      params: {
        kind: "binary-operands",
        operator: expr.operator,
        left: formatType(state, target),
        right: formatType(state, value),
      },
      span: expr.span,
    });
  }
  return target;
};
