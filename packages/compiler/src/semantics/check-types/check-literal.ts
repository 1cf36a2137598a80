import { emitDiagnostic } from "../../diagnostics/index.js";
import {
  evaluateNumericLiteral,
  type LiteralExpr,
  type NumericLiteral,
} from "../../parser/index.js";
import type { TypeId } from "../ids.js";
import { fitsInteger, isIntegerName, isNumericName } from "../typing/numeric.js";
import type { CheckerState } from "./state.js";

export const checkLiteral = (
  state: CheckerState,
  expr: LiteralExpr,
  { negated = false }: { negated?: boolean } = {},
): TypeId => {
  const { types } = state.ctx.program;
  const { literal } = expr;
  switch (literal.type) {
    case "number":
      return checkNumber(state, expr, literal.value, negated);
    case "string":
      return types.string;
    case "char":
      return types.primitive("char");
    case "bool":
      return types.bool;
    case "null":
      return types.null;
  }
};

/**
 * Unsuffixed integers are i32 and unsuffixed floats f64. A suffix fixes the
 * type; suffixed integers must fit it, counting a leading minus.
 */
const checkNumber = (
  state: CheckerState,
  expr: LiteralExpr,
  literal: NumericLiteral,
  negated: boolean,
): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const { suffix } = literal;
  if (suffix === undefined) {
    return types.primitive(literal.isFloat ? "f64" : "i32");
  }

  if (!isNumericName(suffix)) {
    emitDiagnostic({
      ctx,
      code: "TY0015",
      params: { kind: "unknown-suffix", text: expr.text, suffix },
      span: expr.span,
    });
    return types.unknown;
  }

  if (!isIntegerName(suffix)) return types.primitive(suffix);

  if (literal.isFloat) {
    emitDiagnostic({
      ctx,
      code: "TY0015",
      params: { kind: "float-with-integer-suffix", text: expr.text, suffix },
      span: expr.span,
    });
    return types.unknown;
  }

  const evaluated = evaluateNumericLiteral(literal);
  if (evaluated.kind === "int") {
    const value = negated ? -evaluated.value : evaluated.value;
    if (!fitsInteger(suffix, value)) {
      emitDiagnostic({
        ctx,
        code: "TY0015",
        params: {
          kind: "literal-out-of-range",
          text: negated ? `-${expr.text}` : expr.text,
          type: suffix,
        },
        span: expr.span,
      });
    }
  }
  return types.primitive(suffix);
};
