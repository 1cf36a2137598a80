import path from "node:path";
import type { ModulePathAdapter } from "./types.js";

export const createNodePathAdapter = (
  platform: path.PlatformPath = path,
): ModulePathAdapter => ({
  resolve: platform.resolve,
  join: platform.join,
  relative: platform.relative,
  dirname: platform.dirname,
});

/** Forward-slash paths regardless of the host platform. */
export const createPosixPathAdapter = (): ModulePathAdapter =>
  createNodePathAdapter(path.posix);
