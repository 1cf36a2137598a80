import type { ProgramContext } from "../context.js";
import type { TypeId } from "../ids.js";
import { isNumericName, isNumericType, widerNumeric } from "./numeric.js";

/** Whether a value of type `source` may be stored where `target` is expected. */
export const isAssignable = (
  program: ProgramContext,
  source: TypeId,
  target: TypeId,
): boolean => {
  const { types, decls } = program;
  if (source === target) return true;
  if (source === types.unknown || target === types.unknown) return true;

  const sourceDesc = types.get(source);
  const targetDesc = types.get(target);

  if (targetDesc.kind === "nullable") {
    if (source === types.null) return true;
    const inner = sourceDesc.kind === "nullable" ? sourceDesc.inner : source;
    return isAssignable(program, inner, targetDesc.inner);
  }

  if (sourceDesc.kind === "primitive" && targetDesc.kind === "primitive") {
    return isNumericName(sourceDesc.name) && isNumericName(targetDesc.name);
  }

  if (sourceDesc.kind === "array" && targetDesc.kind === "array") {
    // `[]` has element type unknown and fits any array.
    return sourceDesc.element === types.unknown;
  }

  if (sourceDesc.kind === "named" && targetDesc.kind === "named") {
    return (
      sourceDesc.nominal === "class" &&
      targetDesc.nominal === "class" &&
      decls.isSubclassOf(sourceDesc.decl, targetDesc.decl)
    );
  }

  return false;
};

/**
 * Common type of two branches (ternary arms, array elements), or `undefined`
 * when they have none. Only identical types, two numbers (the wider one) and
 * a string with a number (string) unify.
 */
export const unifyTypes = (
  program: ProgramContext,
  left: TypeId,
  right: TypeId,
): TypeId | undefined => {
  const { types } = program;
  if (left === right) return left;
  if (left === types.unknown || right === types.unknown) return types.unknown;

  const leftNumeric = isNumericType(types, left);
  const rightNumeric = isNumericType(types, right);
  if (leftNumeric && rightNumeric) return widerNumeric(types, left, right);

  if (
    (left === types.string && rightNumeric) ||
    (right === types.string && leftNumeric)
  ) {
    return types.string;
  }

  return undefined;
};
