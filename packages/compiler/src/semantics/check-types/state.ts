import { emitDiagnostic, type SourceSpan } from "../../diagnostics/index.js";
import type { NodeId } from "../../parser/index.js";
import type { AnalysisContext } from "../context.js";
import type { DeclId, TypeId } from "../ids.js";
import { isAssignable } from "../typing/assignability.js";

export interface FunctionFrame {
  name: string;
  returnType: TypeId;
  returnsValue: boolean;
  /** A bare `return;` in a value-returning function was already reported. */
  reportedBareReturn: boolean;
}

export interface CheckerState {
  ctx: AnalysisContext;
  /** Type whose member is being checked, for `self` and access rules. */
  container?: DeclId;
  fn?: FunctionFrame;
  inConstructor: boolean;
}

export const recordType = (
  state: CheckerState,
  node: NodeId,
  type: TypeId,
): TypeId => {
  state.ctx.typeTable.setNodeType(node, type);
  return type;
};

export const formatType = (state: CheckerState, type: TypeId): string =>
  state.ctx.program.types.format(type);

/**
 * Reports `source` not fitting `target`. Void values are rejected outright
 * since they can never be stored.
 */
export const checkAssignable = (
  state: CheckerState,
  {
    source,
    target,
    context,
    span,
  }: { source: TypeId; target: TypeId; context: string; span: SourceSpan },
): boolean => {
  const { ctx } = state;
  const { types } = ctx.program;
  if (source === types.void && target !== types.void) {
    emitDiagnostic({
      ctx,
      code: "TY0025",
      params: { kind: "void-value", context },
      span,
    });
    return false;
  }

  if (isAssignable(ctx.program, source, target)) return true;

  emitDiagnostic({
    ctx,
    code: "TY0002",
    params: {
      kind: "type-mismatch",
      context,
      expected: formatType(state, target),
      actual: formatType(state, source),
    },
    span,
  });
  return false;
};

/** Reports a condition that is neither `bool` nor unknown. */
export const checkCondition = (
  state: CheckerState,
  type: TypeId,
  construct: string,
  span: SourceSpan,
): void => {
  const { types } = state.ctx.program;
  if (type === types.bool || type === types.unknown) return;
  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0004",
    params: {
      kind: "non-bool-condition",
      construct,
      actual: formatType(state, type),
    },
    span,
  });
};
