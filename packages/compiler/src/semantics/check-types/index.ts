import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  ConstructorDecl,
  ContainerDecl,
  FunctionDecl,
} from "../../parser/index.js";
import type { AnalysisContext } from "../context.js";
import { checkEnumConstants } from "./check-enum.js";
import { checkExpr } from "./check-expr.js";
import { checkBlock, checkVariable } from "./check-stmt.js";
import {
  checkAssignable,
  formatType,
  type CheckerState,
} from "./state.js";

/**
 * Fifth pass: infers a type for every expression and validates assignments,
 * calls, returns, conditions and the shapes of struct and enum values.
 */
export const checkTypes = (ctx: AnalysisContext): void => {
  const state: CheckerState = { ctx, inConstructor: false };

  // Globals first, so functions see the types inferred for them.
  ctx.file.declarations.forEach((decl) => {
    if (decl.kind === "global") checkVariable(state, decl.variable);
  });

  ctx.file.declarations.forEach((decl) => {
    switch (decl.kind) {
      case "global":
        return;
      case "function":
        checkFunction(state, decl);
        return;
      default:
        checkContainer(state, decl);
    }
  });
};

const checkFunction = (state: CheckerState, fn: FunctionDecl): void => {
  const { ctx } = state;
  const { types } = ctx.program;
  const returnType = fn.returnType
    ? (ctx.typeTable.getNodeType(fn.returnType.id) ?? types.unknown)
    : types.void;

  const frame = {
    name: fn.name.name,
    returnType,
    returnsValue: false,
    reportedBareReturn: false,
  };
  state.fn = frame;
  checkBlock(state, fn.body);
  state.fn = undefined;

  if (
    !frame.returnsValue &&
    !frame.reportedBareReturn &&
    returnType !== types.void &&
    returnType !== types.unknown
  ) {
    emitDiagnostic({
      ctx,
      code: "TY0014",
      params: {
        kind: "missing-return",
        functionName: fn.name.name,
        expected: formatType(state, returnType),
      },
      span: fn.name.span,
    });
  }
};

const checkConstructor = (
  state: CheckerState,
  decl: ContainerDecl,
  constructor: ConstructorDecl,
): void => {
  state.inConstructor = true;
  state.fn = {
    name: `${decl.name.name}.constructor`,
    returnType: state.ctx.program.types.void,
    returnsValue: false,
    reportedBareReturn: false,
  };
  checkBlock(state, constructor.body);
  state.fn = undefined;
  state.inConstructor = false;
};

const checkContainer = (state: CheckerState, decl: ContainerDecl): void => {
  const { ctx } = state;
  const declId = ctx.declIds.get(decl.id);
  const entry =
    declId === undefined ? undefined : ctx.program.decls.getContainer(declId);
  if (!entry) return;
  state.container = entry.id;

  decl.fields.forEach((field) => {
    if (!field.initializer) return;
    const type = checkExpr(state, field.initializer);
    checkAssignable(state, {
      source: type,
      target: ctx.typeTable.getNodeType(field.type.id) ?? ctx.program.types.unknown,
      context: `initializer of field '${field.name.name}'`,
      span: field.initializer.span,
    });
  });

  if (decl.kind === "enum") checkEnumConstants(state, decl, entry);
  decl.constructors.forEach((constructor) =>
    checkConstructor(state, decl, constructor),
  );
  decl.methods.forEach((method) => checkFunction(state, method));

  state.container = undefined;
};
