import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  Expr,
  Identifier,
  MemberExpr,
  ProjectionExpr,
} from "../../parser/index.js";
import type { SymbolRecord } from "../binder/types.js";
import type { TypeId } from "../ids.js";
import { findMember, type MemberLookup } from "../typing/members.js";
import type { ProjectionFieldType } from "../typing/type-arena.js";
import { checkExpr } from "./check-expr.js";
import { formatType, recordType, type CheckerState } from "./state.js";

const reportUnknownMember = (
  state: CheckerState,
  member: Identifier,
  receiver: string,
): TypeId => {
  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0012",
    params: { kind: "unknown-member", member: member.name, receiver },
    span: member.span,
  });
  return state.ctx.program.types.unknown;
};

/**
 * Private members are visible only inside the declaring type; protected
 * members also inside its subclasses.
 */
export const checkAccess = (
  state: CheckerState,
  lookup: MemberLookup,
  receiver: string,
  member: Identifier,
): void => {
  const { access } = lookup.symbol;
  const { container } = state;
  const { decls } = state.ctx.program;
  const allowed =
    access === "private"
      ? container === lookup.owner
      : access === "protected"
        ? container !== undefined && decls.isSubclassOf(container, lookup.owner)
        : true;
  if (allowed) return;

  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0013",
    params: { kind: "access-violation", member: member.name, receiver, access },
    span: member.span,
  });
};

/** `Color.RED`: the target names a type rather than a value. */
const staticTargetOf = (
  state: CheckerState,
  target: Expr,
): Readonly<SymbolRecord> | undefined => {
  if (target.kind !== "identifier") return undefined;
  const id = state.ctx.resolutions.get(target.id);
  if (id === undefined) return undefined;
  const symbol = state.ctx.symbols.getSymbol(id);
  return (symbol.kind === "class" ||
    symbol.kind === "struct" ||
    symbol.kind === "enum") &&
    symbol.decl !== undefined
    ? symbol
    : undefined;
};

export const checkMember = (state: CheckerState, expr: MemberExpr): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const { member } = expr;

  const owner = staticTargetOf(state, expr.target);
  if (owner?.decl !== undefined) {
    recordType(state, expr.target.id, owner.type ?? types.unknown);
    const lookup = findMember(ctx.program, owner.decl, member.name);
    if (lookup?.symbol.kind !== "enum-constant") {
      return reportUnknownMember(state, member, owner.name);
    }
    ctx.members.set(expr.id, lookup);
    return lookup.symbol.type ?? types.unknown;
  }

  const receiver = checkExpr(state, expr.target);
  if (receiver === types.unknown) return types.unknown;

  const desc = types.get(receiver);
  if (desc.kind === "nullable") {
    emitDiagnostic({
      ctx,
      code: "TY0024",
      params: {
        kind: "nullable-member-access",
        member: member.name,
        receiver: formatType(state, receiver),
      },
      span: member.span,
    });
    return types.unknown;
  }

  if (
    member.name === "length" &&
    (desc.kind === "array" || receiver === types.string)
  ) {
    return types.primitive("i32");
  }

  if (desc.kind === "projection") {
    const field = desc.fields.find(({ name }) => name === member.name);
    return field?.type ?? reportUnknownMember(state, member, formatType(state, receiver));
  }

  if (desc.kind !== "named") {
    return reportUnknownMember(state, member, formatType(state, receiver));
  }

  const lookup = findMember(ctx.program, desc.decl, member.name);
  if (!lookup) return reportUnknownMember(state, member, desc.name);

  checkAccess(state, lookup, desc.name, member);
  ctx.members.set(expr.id, lookup);
  return lookup.symbol.type ?? types.unknown;
};

/** `value.(a, b as c)` selects fields of an enum value into a projection. */
export const checkProjection = (
  state: CheckerState,
  expr: ProjectionExpr,
): TypeId => {
  const { ctx } = state;
  const { types } = ctx.program;
  const target = checkExpr(state, expr.target);
  if (target === types.unknown) return types.unknown;

  const desc = types.get(target);
  if (desc.kind !== "named" || desc.nominal !== "enum") {
    emitDiagnostic({
      ctx,
      code: "TY0017",
      params: { kind: "projection-target", type: formatType(state, target) },
      span: expr.target.span,
    });
    return types.unknown;
  }

  const fields = expr.fields.map(({ name, alias }): ProjectionFieldType => {
    const label = (alias ?? name).name;
    const lookup = findMember(ctx.program, desc.decl, name.name);
    if (lookup?.symbol.kind !== "field") {
      return { name: label, type: reportUnknownMember(state, name, desc.name) };
    }
    checkAccess(state, lookup, desc.name, name);
    return { name: label, type: lookup.symbol.type ?? types.unknown };
  });

  return types.projection(fields);
};
