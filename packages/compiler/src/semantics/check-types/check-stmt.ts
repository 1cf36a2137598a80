import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  BlockStmt,
  Expr,
  LoopStmt,
  ReturnStmt,
  Stmt,
  VariableStmt,
} from "../../parser/index.js";
import type { TypeId } from "../ids.js";
import { isNumericType, widerNumeric } from "../typing/numeric.js";
import { checkExpr } from "./check-expr.js";
import {
  checkAssignable,
  checkCondition,
  formatType,
  type CheckerState,
} from "./state.js";

export const checkBlock = (state: CheckerState, block: BlockStmt): void => {
  block.statements.forEach((stmt) => checkStmt(state, stmt));
};

const checkStmt = (state: CheckerState, stmt: Stmt): void => {
  switch (stmt.kind) {
    case "block":
      checkBlock(state, stmt);
      return;
    case "expression":
      checkExpr(state, stmt.expression);
      return;
    case "return":
      checkReturn(state, stmt);
      return;
    case "break":
    case "continue":
      return;
    case "variable":
      checkVariable(state, stmt);
      return;
    case "if":
      checkConditionExpr(state, stmt.condition, "if");
      checkBlock(state, stmt.then);
      stmt.elifs.forEach((clause) => {
        checkConditionExpr(state, clause.condition, "elif");
        checkBlock(state, clause.body);
      });
      if (stmt.otherwise) checkBlock(state, stmt.otherwise);
      return;
    case "while":
      checkConditionExpr(state, stmt.condition, "while");
      checkBlock(state, stmt.body);
      return;
    case "do-while":
      checkBlock(state, stmt.body);
      checkConditionExpr(state, stmt.condition, "do-while");
      return;
    case "for":
      if (stmt.initializer) checkStmt(state, stmt.initializer);
      if (stmt.condition) checkConditionExpr(state, stmt.condition, "for");
      if (stmt.update) checkExpr(state, stmt.update);
      checkBlock(state, stmt.body);
      return;
    case "loop":
      checkLoop(state, stmt);
      return;
  }
};

const checkConditionExpr = (
  state: CheckerState,
  condition: Expr,
  construct: string,
): void => {
  checkCondition(state, checkExpr(state, condition), construct, condition.span);
};

const checkRangeBound = (state: CheckerState, bound: Expr): TypeId => {
  const { types } = state.ctx.program;
  const type = checkExpr(state, bound);
  if (type === types.unknown || isNumericType(types, type)) return type;

  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0002",
    params: {
      kind: "type-mismatch",
      context: "loop range",
      expected: "a numeric type",
      actual: formatType(state, type),
    },
    span: bound.span,
  });
  return types.unknown;
};

/** The loop variable takes the wider of the two bound types. */
const checkLoop = (state: CheckerState, stmt: LoopStmt): void => {
  const { ctx } = state;
  const { types } = ctx.program;
  const start = checkRangeBound(state, stmt.start);
  const end = checkRangeBound(state, stmt.end);
  if (stmt.step) checkRangeBound(state, stmt.step);

  const variable = ctx.declarations.get(stmt.id);
  if (variable !== undefined) {
    const type =
      start === types.unknown || end === types.unknown
        ? types.unknown
        : widerNumeric(types, start, end);
    ctx.symbols.setSymbolType(variable, type);
  }
  checkBlock(state, stmt.body);
};

/**
 * Checks an initializer against the annotation, or infers the binding's type
 * from it when there is none.
 */
export const checkVariable = (state: CheckerState, stmt: VariableStmt): void => {
  const { ctx } = state;
  const { types } = ctx.program;
  const name = stmt.name.name;
  const initializer = stmt.initializer
    ? checkExpr(state, stmt.initializer)
    : undefined;

  if (stmt.type) {
    const declared = ctx.typeTable.getNodeType(stmt.type.id) ?? types.unknown;
    if (stmt.initializer && initializer !== undefined) {
      checkAssignable(state, {
        source: initializer,
        target: declared,
        context: `initializer of '${name}'`,
        span: stmt.initializer.span,
      });
    }
    return;
  }

  const inferred = inferBindingType(state, stmt, initializer);
  const symbol = ctx.declarations.get(stmt.id);
  if (symbol !== undefined) ctx.symbols.setSymbolType(symbol, inferred);
};

const inferBindingType = (
  state: CheckerState,
  stmt: VariableStmt,
  initializer: TypeId | undefined,
): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const problem =
    initializer === undefined
      ? "missing-type-and-initializer"
      : initializer === types.null
        ? "null-initializer"
        : initializer === types.void
          ? "void-initializer"
          : undefined;
  if (!problem) return initializer ?? types.unknown;

  emitDiagnostic({
    ctx,
    code: "TY0019",
    params: { kind: problem, name: stmt.name.name },
    span: stmt.name.span,
  });
  return types.unknown;
};

const checkReturn = (state: CheckerState, stmt: ReturnStmt): void => {
  const { ctx } = state;
  const { types } = ctx.program;
  const frame = state.fn;
  const value = stmt.value ? checkExpr(state, stmt.value) : undefined;
  if (!frame) return;

  if (stmt.value && value !== undefined) {
    if (frame.returnType === types.void) {
      emitDiagnostic({
        ctx,
        code: "TY0014",
        params: { kind: "unexpected-return-value", functionName: frame.name },
        span: stmt.value.span,
      });
      return;
    }
    frame.returnsValue = true;
    checkAssignable(state, {
      source: value,
      target: frame.returnType,
      context: `return value of '${frame.name}'`,
      span: stmt.value.span,
    });
    return;
  }

  if (frame.returnType !== types.void && frame.returnType !== types.unknown) {
    frame.reportedBareReturn = true;
    emitDiagnostic({
      ctx,
      code: "TY0014",
      params: {
        kind: "missing-return-value",
        functionName: frame.name,
        expected: formatType(state, frame.returnType),
      },
      span: stmt.span,
    });
  }
};
