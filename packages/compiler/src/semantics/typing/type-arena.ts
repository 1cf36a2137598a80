import type { DeclId, TypeId } from "../ids.js";

export const primitiveNames = [
  "i8",
  "i16",
  "i32",
  "i64",
  "u8",
  "u16",
  "u32",
  "u64",
  "f16",
  "f32",
  "f64",
  "byte",
  "bool",
  "bit",
  "string",
  "char",
  "void",
  "null",
  "unknown",
] as const;

export type PrimitiveName = (typeof primitiveNames)[number];

export type NominalKind = "class" | "struct" | "enum";

export interface PrimitiveType {
  kind: "primitive";
  name: PrimitiveName;
}

export interface ArrayType {
  kind: "array";
  element: TypeId;
}

export interface NullableType {
  kind: "nullable";
  inner: TypeId;
}

export interface NamedType {
  kind: "named";
  name: string;
  decl: DeclId;
  nominal: NominalKind;
}

export interface FunctionType {
  kind: "function";
  parameters: readonly TypeId[];
  returnType: TypeId;
}

export interface ProjectionFieldType {
  name: string;
  type: TypeId;
}

/** Result of `value.(a, b)`: the named fields of an enum value. */
export interface ProjectionType {
  kind: "projection";
  fields: readonly ProjectionFieldType[];
}

export type TypeDescriptor =
  | PrimitiveType
  | ArrayType
  | NullableType
  | NamedType
  | FunctionType
  | ProjectionType;

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  primitive(name: PrimitiveName): TypeId;
  array(element: TypeId): TypeId;
  nullable(inner: TypeId): TypeId;
  named(desc: Omit<NamedType, "kind">): TypeId;
  fn(parameters: readonly TypeId[], returnType: TypeId): TypeId;
  projection(fields: readonly ProjectionFieldType[]): TypeId;
  format(id: TypeId): string;
  readonly unknown: TypeId;
  readonly void: TypeId;
  readonly null: TypeId;
  readonly bool: TypeId;
  readonly string: TypeId;
}

export const isPrimitiveName = (name: string): name is PrimitiveName =>
  primitiveNames.some((candidate) => candidate === name);

/**
 * Program-wide type store. Structurally equal descriptors intern to the same
 * id, so type equality is id equality.
 */
export const createTypeArena = (): TypeArena => {
  let nextTypeId: TypeId = 0;
  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();

  const keyFor = (desc: TypeDescriptor): string => JSON.stringify(desc);

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = nextTypeId++;
    descriptors[id] = desc;
    descriptorCache.set(key, id);
    return id;
  };

  const get = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }

    return desc;
  };

  const primitive = (name: PrimitiveName): TypeId =>
    storeDescriptor({ kind: "primitive", name });

  const unknown = primitive("unknown");
  const nullType = primitive("null");

  const nullable = (inner: TypeId): TypeId => {
    // T?? is T?, null? is null and unknown? stays unknown.
    if (inner === unknown || inner === nullType) return inner;
    if (get(inner).kind === "nullable") return inner;
    return storeDescriptor({ kind: "nullable", inner });
  };

  const format = (id: TypeId): string => {
    const desc = get(id);
    switch (desc.kind) {
      case "primitive":
        return desc.name;
      case "array":
        return `${format(desc.element)}[]`;
      case "nullable":
        return `${format(desc.inner)}?`;
      case "named":
        return desc.name;
      case "function":
        return `(${desc.parameters.map(format).join(", ")}) -> ${format(desc.returnType)}`;
      case "projection":
        return `(${desc.fields
          .map((field) => `${field.name}: ${format(field.type)}`)
          .join(", ")})`;
    }
  };

  return {
    get,
    primitive,
    array: (element) => storeDescriptor({ kind: "array", element }),
    nullable,
    named: ({ name, decl, nominal }) =>
      storeDescriptor({ kind: "named", name, decl, nominal }),
    fn: (parameters, returnType) =>
      storeDescriptor({ kind: "function", parameters: [...parameters], returnType }),
    projection: (fields) =>
      storeDescriptor({
        kind: "projection",
        fields: fields.map(({ name, type }) => ({ name, type })),
      }),
    format,
    unknown,
    void: primitive("void"),
    null: nullType,
    bool: primitive("bool"),
    string: primitive("string"),
  };
};
