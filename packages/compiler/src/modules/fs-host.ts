import { readFileSync, statSync } from "node:fs";
import type { ModuleHost } from "./types.js";
import { createNodePathAdapter } from "./node-path-adapter.js";

export const createFsModuleHost = (): ModuleHost => {
  const fileCache = new Map<string, boolean>();

  const fileExists = (path: string): boolean => {
    const cached = fileCache.get(path);
    if (typeof cached === "boolean") {
      return cached;
    }
    const result = statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
    fileCache.set(path, result);
    return result;
  };

  return {
    path: createNodePathAdapter(),
    readFile: (path: string) => readFileSync(path, "utf8"),
    fileExists,
  };
};
