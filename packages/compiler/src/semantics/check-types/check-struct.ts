import { emitDiagnostic } from "../../diagnostics/index.js";
import type { StructLiteralExpr } from "../../parser/index.js";
import type { TypeId } from "../ids.js";
import { containerType } from "../typing/members.js";
import { checkExpr } from "./check-expr.js";
import { checkAssignable, type CheckerState } from "./state.js";

/** Every declared field must be given exactly once, and nothing else. */
export const checkStructLiteral = (
  state: CheckerState,
  expr: StructLiteralExpr,
): TypeId => {
  const { ctx } = state;
  const { program } = ctx;
  const provided = expr.fields.map((field) => ({
    field,
    type: checkExpr(state, field.value),
  }));

  const id = ctx.resolutions.get(expr.id);
  if (id === undefined) return program.types.unknown;

  const symbol = ctx.symbols.getSymbol(id);
  const entry =
    symbol.kind === "struct" && symbol.decl !== undefined
      ? program.decls.getContainer(symbol.decl)
      : undefined;
  if (!entry) {
    emitDiagnostic({
      ctx,
      code: "TY0022",
      params: { kind: "not-a-struct", name: expr.name.name },
      span: expr.name.span,
    });
    return program.types.unknown;
  }

  const structName = entry.node.name.name;
  const seen = new Set<string>();
  provided.forEach(({ field, type }) => {
    const name = field.name.name;
    const memberId = entry.symbols.resolveLocal(name, entry.memberScope);
    const member =
      memberId === undefined ? undefined : entry.symbols.getSymbol(memberId);
    if (member?.kind !== "field") {
      emitDiagnostic({
        ctx,
        code: "TY0007",
        params: { kind: "unexpected-field", field: name, struct: structName },
        span: field.name.span,
      });
      return;
    }

    if (seen.has(name)) {
      emitDiagnostic({
        ctx,
        code: "TY0008",
        params: { kind: "duplicate-field", field: name, struct: structName },
        span: field.name.span,
      });
      return;
    }
    seen.add(name);

    checkAssignable(state, {
      source: type,
      target: member.type ?? program.types.unknown,
      context: `field '${name}' of '${structName}'`,
      span: field.value.span,
    });
  });

  entry.node.fields.forEach((field) => {
    if (seen.has(field.name.name)) return;
    emitDiagnostic({
      ctx,
      code: "TY0006",
      params: { kind: "missing-field", field: field.name.name, struct: structName },
      span: expr.span,
    });
  });

  return containerType(program, entry.id) ?? program.types.unknown;
};
