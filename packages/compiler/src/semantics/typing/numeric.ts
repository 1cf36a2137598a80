import type { TypeId } from "../ids.js";
import type { PrimitiveName, TypeArena } from "./type-arena.js";

export type NumericName = Extract<
  PrimitiveName,
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "f16"
  | "f32"
  | "f64"
  | "byte"
>;

export type IntegerName = Exclude<NumericName, "f16" | "f32" | "f64">;

/** Widening order; names sharing a rank differ only in signedness. */
const numericRanks: Record<NumericName, number> = {
  i8: 1,
  u8: 1,
  byte: 1,
  i16: 2,
  u16: 2,
  i32: 3,
  u32: 3,
  i64: 4,
  u64: 4,
  f16: 5,
  f32: 6,
  f64: 7,
};

const integerRanges: Record<IntegerName, readonly [bigint, bigint]> = {
  i8: [-(2n ** 7n), 2n ** 7n - 1n],
  i16: [-(2n ** 15n), 2n ** 15n - 1n],
  i32: [-(2n ** 31n), 2n ** 31n - 1n],
  i64: [-(2n ** 63n), 2n ** 63n - 1n],
  u8: [0n, 2n ** 8n - 1n],
  u16: [0n, 2n ** 16n - 1n],
  u32: [0n, 2n ** 32n - 1n],
  u64: [0n, 2n ** 64n - 1n],
  byte: [0n, 2n ** 8n - 1n],
};

export const isNumericName = (name: string): name is NumericName =>
  Object.hasOwn(numericRanks, name);

export const isIntegerName = (name: string): name is IntegerName =>
  Object.hasOwn(integerRanges, name);

const isSigned = (name: NumericName): boolean =>
  name.startsWith("i") || name.startsWith("f");

export const numericNameOf = (
  types: TypeArena,
  type: TypeId,
): NumericName | undefined => {
  const desc = types.get(type);
  return desc.kind === "primitive" && isNumericName(desc.name)
    ? desc.name
    : undefined;
};

export const isNumericType = (types: TypeArena, type: TypeId): boolean =>
  numericNameOf(types, type) !== undefined;

export const isIntegerType = (types: TypeArena, type: TypeId): boolean => {
  const name = numericNameOf(types, type);
  return name !== undefined && isIntegerName(name);
};

/**
 * Result type of arithmetic on two numeric operands: the higher rank wins;
 * on a tie the signed operand wins, and otherwise the left one.
 */
export const widerNumeric = (
  types: TypeArena,
  left: TypeId,
  right: TypeId,
): TypeId => {
  const leftName = numericNameOf(types, left);
  const rightName = numericNameOf(types, right);
  if (!leftName || !rightName) return types.unknown;

  const leftRank = numericRanks[leftName];
  const rightRank = numericRanks[rightName];
  if (leftRank !== rightRank) return leftRank > rightRank ? left : right;
  if (!isSigned(leftName) && isSigned(rightName)) return right;
  return left;
};

export const fitsInteger = (name: IntegerName, value: bigint): boolean => {
  const [min, max] = integerRanges[name];
  return value >= min && value <= max;
};
