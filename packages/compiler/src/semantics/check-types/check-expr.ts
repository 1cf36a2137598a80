import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  ArrayLiteralExpr,
  BinaryExpr,
  CastExpr,
  Expr,
  IdentifierExpr,
  IndexExpr,
  TernaryExpr,
  UnaryExpr,
} from "../../parser/index.js";
import type { TypeId } from "../ids.js";
import { isAssignable, unifyTypes } from "../typing/assignability.js";
import { containerType } from "../typing/members.js";
import {
  isIntegerType,
  isNumericType,
  widerNumeric,
} from "../typing/numeric.js";
import { checkAssignment, checkCompoundAssignment, checkWritable } from "./check-assign.js";
import { checkCall } from "./check-call.js";
import { checkLiteral } from "./check-literal.js";
import { checkMember, checkProjection } from "./check-member.js";
import { checkStructLiteral } from "./check-struct.js";
import { checkCondition, formatType, recordType, type CheckerState } from "./state.js";

/** Infers the type of `expr`, records it in the type table and returns it. */
export const checkExpr = (state: CheckerState, expr: Expr): TypeId =>
  recordType(state, expr.id, inferExpr(state, expr));

const inferExpr = (state: CheckerState, expr: Expr): TypeId => {
  switch (expr.kind) {
    case "identifier":
      return checkIdentifier(state, expr);
    case "self":
      return state.container === undefined
        ? state.ctx.program.types.unknown
        : containerType(state.ctx.program, state.container) ??
            state.ctx.program.types.unknown;
    case "literal":
      return checkLiteral(state, expr);
    case "unary":
      return checkUnary(state, expr);
    case "binary":
      return checkBinary(state, expr);
    case "assignment":
      return checkAssignment(state, expr);
    case "compound-assignment":
      return checkCompoundAssignment(state, expr);
    case "call":
      return checkCall(state, expr);
    case "index":
      return checkIndex(state, expr);
    case "member":
      return checkMember(state, expr);
    case "projection":
      return checkProjection(state, expr);
    case "cast":
      return checkCast(state, expr);
    case "ternary":
      return checkTernary(state, expr);
    case "array-literal":
      return checkArrayLiteral(state, expr);
    case "struct-literal":
      return checkStructLiteral(state, expr);
  }
};

const checkIdentifier = (state: CheckerState, expr: IdentifierExpr): TypeId => {
  const { ctx } = state;
  const symbol = ctx.resolutions.get(expr.id);
  if (symbol === undefined) return ctx.program.types.unknown;
  return ctx.symbols.getSymbol(symbol).type ?? ctx.program.types.unknown;
};

const reportUnary = (
  state: CheckerState,
  expr: UnaryExpr,
  operand: TypeId,
): TypeId => {
  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0003",
    params: {
      kind: "unary-operand",
      operator: expr.operator,
      operand: formatType(state, operand),
    },
    span: expr.span,
  });
  return state.ctx.program.types.unknown;
};

const checkUnary = (state: CheckerState, expr: UnaryExpr): TypeId => {
  const { types } = state.ctx.program;
  const { operand: operandExpr } = expr;

  // `-128i8` is range-checked as a whole.
  if (
    expr.operator === "-" &&
    operandExpr.kind === "literal" &&
    operandExpr.literal.type === "number"
  ) {
    return recordType(
      state,
      operandExpr.id,
      checkLiteral(state, operandExpr, { negated: true }),
    );
  }

  const operand = checkExpr(state, operandExpr);
  if (operand === types.unknown) return types.unknown;

  switch (expr.operator) {
    case "!":
      return operand === types.bool ? types.bool : reportUnary(state, expr, operand);
    case "-":
      return isNumericType(types, operand)
        ? operand
        : reportUnary(state, expr, operand);
    case "++":
    case "--":
      if (!isNumericType(types, operand)) return reportUnary(state, expr, operand);
      if (operandExpr.kind === "identifier" || operandExpr.kind === "member") {
        checkWritable(state, operandExpr);
      }
      return operand;
  }
};

const reportBinary = (
  state: CheckerState,
  expr: BinaryExpr,
  left: TypeId,
  right: TypeId,
): void => {
  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0003",
    params: {
      kind: "binary-operands",
      operator: expr.operator,
      left: formatType(state, left),
      right: formatType(state, right),
    },
    span: expr.span,
  });
};

/** `+` concatenates a string with another string or a number. */
const isConcatenable = (state: CheckerState, type: TypeId): boolean => {
  const { types } = state.ctx.program;
  return type === types.string || isNumericType(types, type);
};

const checkBinary = (state: CheckerState, expr: BinaryExpr): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const left = checkExpr(state, expr.left);
  const right = checkExpr(state, expr.right);
  const anyUnknown = left === types.unknown || right === types.unknown;
  const bothNumeric =
    isNumericType(types, left) && isNumericType(types, right);

  switch (expr.operator) {
    case "&&":
    case "||":
      if (
        !anyUnknown &&
        (left !== types.bool || right !== types.bool)
      ) {
        reportBinary(state, expr, left, right);
      }
      return types.bool;
    case "==":
    case "!=":
      if (
        !anyUnknown &&
        !bothNumeric &&
        !isAssignable(ctx.program, left, right) &&
        !isAssignable(ctx.program, right, left)
      ) {
        reportBinary(state, expr, left, right);
      }
      return types.bool;
    case "<":
    case "<=":
    case ">":
    case ">=": {
      const bothChars = left === right && left === types.primitive("char");
      if (!anyUnknown && !bothNumeric && !bothChars) {
        reportBinary(state, expr, left, right);
      }
      return types.bool;
    }
    case "+":
      if (anyUnknown) return types.unknown;
      if (bothNumeric) return widerNumeric(types, left, right);
      if (
        (left === types.string || right === types.string) &&
        isConcatenable(state, left) &&
        isConcatenable(state, right)
      ) {
        return types.string;
      }
      reportBinary(state, expr, left, right);
      return types.unknown;
    case "-":
    case "*":
    case "/":
    case "%":
      if (anyUnknown) return types.unknown;
      if (bothNumeric) return widerNumeric(types, left, right);
      reportBinary(state, expr, left, right);
      return types.unknown;
  }
};

const checkTernary = (state: CheckerState, expr: TernaryExpr): TypeId => {
  const { ctx } = state;
  checkCondition(state, checkExpr(state, expr.condition), "ternary", expr.condition.span);
  const whenTrue = checkExpr(state, expr.whenTrue);
  const whenFalse = checkExpr(state, expr.whenFalse);

  const unified = unifyTypes(ctx.program, whenTrue, whenFalse);
  if (unified !== undefined) return unified;

  emitDiagnostic({
    ctx,
    code: "TY0005",
    params: {
      kind: "incompatible-branches",
      left: formatType(state, whenTrue),
      right: formatType(state, whenFalse),
    },
    span: expr.span,
  });
  return ctx.program.types.unknown;
};

const checkArrayLiteral = (
  state: CheckerState,
  expr: ArrayLiteralExpr,
): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  let element: TypeId | undefined;
  let consistent = true;

  expr.elements.forEach((item) => {
    const type = checkExpr(state, item);
    if (element === undefined || !consistent) {
      element ??= type;
      return;
    }

    const unified = unifyTypes(ctx.program, element, type);
    if (unified !== undefined) {
      element = unified;
      return;
    }

    consistent = false;
    emitDiagnostic({
      ctx,
      code: "TY0023",
      params: {
        kind: "incompatible-elements",
        first: formatType(state, element),
        other: formatType(state, type),
      },
      span: item.span,
    });
  });

  if (!consistent) return types.unknown;
  return types.array(element ?? types.unknown);
};

const isValidCast = (state: CheckerState, from: TypeId, to: TypeId): boolean => {
  const { program } = state.ctx;
  const { types, decls } = program;
  if (isAssignable(program, from, to)) return true;
  if (isNumericType(types, from) && isNumericType(types, to)) return true;

  const char = types.primitive("char");
  if (from === char && isIntegerType(types, to)) return true;
  if (to === char && isIntegerType(types, from)) return true;

  // Downcasts along the class hierarchy.
  const fromDesc = types.get(from);
  const toDesc = types.get(to);
  return (
    fromDesc.kind === "named" &&
    toDesc.kind === "named" &&
    fromDesc.nominal === "class" &&
    toDesc.nominal === "class" &&
    decls.isSubclassOf(toDesc.decl, fromDesc.decl)
  );
};

const checkCast = (state: CheckerState, expr: CastExpr): TypeId => {
  const { ctx } = state;
  const from = checkExpr(state, expr.expr);
  const to = ctx.typeTable.getNodeType(expr.type.id) ?? ctx.program.types.unknown;

  if (!isValidCast(state, from, to)) {
    emitDiagnostic({
      ctx,
      code: "TY0018",
      params: {
        kind: "invalid-cast",
        from: formatType(state, from),
        to: formatType(state, to),
      },
      span: expr.span,
    });
  }
  return to;
};

const checkIndex = (state: CheckerState, expr: IndexExpr): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const target = checkExpr(state, expr.target);
  const index = checkExpr(state, expr.index);

  if (index !== types.unknown && !isIntegerType(types, index)) {
    emitDiagnostic({
      ctx,
      code: "TY0020",
      params: { kind: "non-integer-index", type: formatType(state, index) },
      span: expr.index.span,
    });
  }

  if (target === types.unknown) return types.unknown;
  if (target === types.string) return types.primitive("char");

  const desc = types.get(target);
  if (desc.kind === "array") return desc.element;

  emitDiagnostic({
    ctx,
    code: "TY0020",
    params: { kind: "not-indexable", type: formatType(state, target) },
    span: expr.target.span,
  });
  return types.unknown;
};
