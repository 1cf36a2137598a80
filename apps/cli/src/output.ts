const CIRCULAR_REFERENCE = "[Circular]";

const normalizeBigInt = (value: bigint): string => `${value}n`;

const normalizeWithTraversalTracking = ({
  value,
  ancestors,
  normalize,
}: {
  value: object;
  ancestors: WeakSet<object>;
  normalize: () => unknown;
}): unknown => {
  if (ancestors.has(value)) {
    return CIRCULAR_REFERENCE;
  }

  ancestors.add(value);
  try {
    return normalize();
  } finally {
    ancestors.delete(value);
  }
};

const normalizeEntries = ({
  entries,
  ancestors,
}: {
  entries: Iterable<[unknown, unknown]>;
  ancestors: WeakSet<object>;
}): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(entries, ([key, entry]) => [
      String(normalizeOutput({ value: key, ancestors })),
      normalizeOutput({ value: entry, ancestors }),
    ])
  );

const normalizeOutput = (
  { value, ancestors = new WeakSet() }: { value: unknown; ancestors?: WeakSet<object> }
): unknown => {
  if (typeof value === "bigint") {
    return normalizeBigInt(value);
  }

  if (!value || typeof value !== "object") {
    return value;
  }

  return normalizeWithTraversalTracking({
    value,
    ancestors,
    normalize: () => {
      if (value instanceof Map) {
        return normalizeEntries({ entries: value.entries(), ancestors });
      }

      if (Array.isArray(value)) {
        return value.map((entry) => normalizeOutput({ value: entry, ancestors }));
      }

      return normalizeEntries({ entries: Object.entries(value), ancestors });
    },
  });
};

/** JSON for stdout; bigints become `12n` and cycles become "[Circular]". */
export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput({ value }), undefined, 2);
