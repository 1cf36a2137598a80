import { createPosixPathAdapter } from "./node-path-adapter.js";
import type { ModuleHost, ModulePathAdapter } from "./types.js";

/**
 * Host backed by a path-to-source record. A `null` entry models a file that
 * exists but cannot be read.
 */
export const createMemoryModuleHost = ({
  files,
  pathAdapter = createPosixPathAdapter(),
}: {
  files: Record<string, string | null>;
  pathAdapter?: ModulePathAdapter;
}): ModuleHost => {
  const normalized = new Map<string, string | null>();
  const normalizePath = (path: string) => pathAdapter.resolve(path);

  Object.entries(files).forEach(([path, contents]) => {
    normalized.set(normalizePath(path), contents);
  });

  return {
    path: pathAdapter,
    readFile: (path: string) => {
      const resolved = normalizePath(path);
      const file = normalized.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      if (file === null) {
        throw new Error(`Permission denied: ${resolved}`);
      }
      return file;
    },
    fileExists: (path: string) => normalized.has(normalizePath(path)),
  };
};
