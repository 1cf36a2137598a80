import type { NodeId, TypeId } from "../ids.js";

/** Per-module record of the type computed for each expression and type node. */
export interface TypeTable {
  setNodeType(id: NodeId, type: TypeId): void;
  getNodeType(id: NodeId): TypeId | undefined;
  entries(): Iterable<[NodeId, TypeId]>;
}

export const createTypeTable = (): TypeTable => {
  const nodeTypes = new Map<NodeId, TypeId>();

  return {
    setNodeType: (id, type) => {
      nodeTypes.set(id, type);
    },
    getNodeType: (id) => nodeTypes.get(id),
    entries: () => nodeTypes.entries(),
  };
};
