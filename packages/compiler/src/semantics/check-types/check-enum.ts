import { emitDiagnostic } from "../../diagnostics/index.js";
import type { EnumDecl } from "../../parser/index.js";
import type { ContainerDeclEntry } from "../decls.js";
import { checkExpr } from "./check-expr.js";
import { checkAssignable, type CheckerState } from "./state.js";

/**
 * Once any constant carries arguments, the enum needs a constructor and
 * every constant must supply arguments matching it.
 */
export const checkEnumConstants = (
  state: CheckerState,
  decl: EnumDecl,
  entry: ContainerDeclEntry,
): void => {
  const { ctx } = state;
  const enumName = decl.name.name;
  const checked = decl.constants.map((constant) => ({
    constant,
    argTypes: (constant.args ?? []).map((arg) => checkExpr(state, arg)),
  }));

  const withArgs = checked.filter(({ argTypes }) => argTypes.length > 0);
  if (withArgs.length === 0) return;

  if (withArgs.length < checked.length) {
    emitDiagnostic({
      ctx,
      code: "TY0009",
      params: { kind: "mixed-parameters", enumName },
      span: decl.name.span,
    });
  }

  const parameters = entry.constructorParams;
  if (!parameters) {
    emitDiagnostic({
      ctx,
      code: "TY0009",
      params: { kind: "missing-constructor", enumName },
      span: decl.name.span,
    });
    return;
  }

  withArgs.forEach(({ constant, argTypes }) => {
    const constantName = constant.name.name;
    if (argTypes.length !== parameters.length) {
      emitDiagnostic({
        ctx,
        code: "TY0009",
        params: {
          kind: "constant-arity",
          enumName,
          constant: constantName,
          expected: parameters.length,
          actual: argTypes.length,
        },
        span: constant.span,
      });
      return;
    }

    constant.args?.forEach((arg, index) => {
      const source = argTypes[index];
      const target = parameters[index];
      if (source === undefined || target === undefined) return;
      checkAssignable(state, {
        source,
        target,
        context: `argument ${index + 1} of '${enumName}.${constantName}'`,
        span: arg.span,
      });
    });
  });
};
