import { describe, expect, it, vi } from "vitest";
import type { Diagnostic } from "../../diagnostics/index.js";
import { fileStartSpan } from "../../parser/index.js";
import { createModuleLoader, type AnalyzeModuleInput } from "../loader.js";
import { createMemoryModuleHost } from "../memory-host.js";

const request = { importer: "/root/main.wf", span: fileStartSpan("/root/main.wf") };

/**
 * Stand-in analysis: each source line names a module to import, so tests can
 * build import graphs without the parser.
 */
const createAnalyze = () =>
  vi.fn((input: AnalyzeModuleInput) => {
    const diagnostics: Diagnostic[] = [];
    input.source
      .split("\n")
      .filter(Boolean)
      .forEach((line) => {
        const resolution = input.loader.resolve(line.split("."), {
          importer: input.filePath,
          span: fileStartSpan(input.filePath),
        });
        diagnostics.push(...resolution.diagnostics);
      });
    return {
      exports: {
        moduleId: input.filePath,
        name: input.moduleName,
        exports: new Map(),
        hidden: new Map(),
      },
      diagnostics,
    };
  });

const createLoader = (files: Record<string, string | null>) => {
  const analyze = createAnalyze();
  const loader = createModuleLoader({
    host: createMemoryModuleHost({ files }),
    root: "/root",
    analyze,
  });
  return { loader, analyze };
};

describe("module loader", () => {
  it("maps dotted paths to files under the root", () => {
    const { loader, analyze } = createLoader({ "/root/geo/shapes.wf": "" });
    const resolution = loader.resolve(["geo", "shapes"], request);

    expect(resolution.diagnostics).toEqual([]);
    expect(resolution.exports?.name).toBe("geo.shapes");
    expect(analyze).toHaveBeenCalledWith(
      expect.objectContaining({ filePath: "/root/geo/shapes.wf", moduleName: "geo.shapes" }),
    );
  });

  it("falls back to a directory's main file", () => {
    const { loader } = createLoader({ "/root/geo/main.wf": "" });
    expect(loader.resolve(["geo"], request).exports?.moduleId).toBe("/root/geo/main.wf");
  });

  it("prefers a file over a directory entry", () => {
    const { loader } = createLoader({ "/root/geo.wf": "", "/root/geo/main.wf": "" });
    expect(loader.resolve(["geo"], request).exports?.moduleId).toBe("/root/geo.wf");
  });

  it("analyzes each module once", () => {
    const { loader, analyze } = createLoader({
      "/root/a.wf": "missing",
      "/root/b.wf": "",
    });

    const first = loader.resolve(["a"], request);
    const second = loader.resolve(["a"], request);

    expect(first.diagnostics.map((d) => d.message)).toEqual([
      "unable to find module missing",
    ]);
    expect(second.diagnostics).toEqual([]);
    expect(second.exports).toBe(first.exports);
    expect(analyze).toHaveBeenCalledTimes(1);
    expect([...loader.modules.keys()]).toEqual(["/root/a.wf"]);
  });

  it("reports the chain of an import cycle", () => {
    const { loader } = createLoader({
      "/root/a.wf": "b",
      "/root/b.wf": "c",
      "/root/c.wf": "b",
    });
    const resolution = loader.resolve(["a"], request);
    expect(resolution.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["MD0002", "import cycle detected: b -> c -> b"],
    ]);
    expect(resolution.diagnostics[0]?.span.file).toBe("/root/c.wf");
  });

  it("reports missing modules with their candidates", () => {
    const { loader } = createLoader({});
    const [diagnostic] = loader.resolve(["net", "http"], request).diagnostics;
    expect(diagnostic?.code).toBe("MD0001");
    expect(diagnostic?.message).toBe("unable to find module net.http");
    expect(diagnostic?.span).toEqual(request.span);
  });

  it("reports files that exist but cannot be read", () => {
    const { loader, analyze } = createLoader({ "/root/locked.wf": null });
    const resolution = loader.resolve(["locked"], request);
    expect(resolution.exports).toBeUndefined();
    expect(resolution.diagnostics.map((d) => d.message)).toEqual([
      "unable to read module /root/locked.wf: Permission denied: /root/locked.wf",
    ]);
    expect(analyze).not.toHaveBeenCalled();
  });

  describe("loadFile", () => {
    it("names entry modules after their path under the root", () => {
      const { loader } = createLoader({
        "/root/main.wf": "",
        "/root/tools/main.wf": "",
        "/root/tools/fmt.wf": "",
      });
      const names = ["/root/main.wf", "/root/tools/main.wf", "/root/tools/fmt.wf"].map(
        (path) => {
          const result = loader.loadFile(path);
          return result.ok ? result.module.exports.name : undefined;
        },
      );
      expect(names).toEqual(["main", "tools", "tools.fmt"]);
    });

    it("fails for a missing entry file", () => {
      const { loader } = createLoader({});
      const result = loader.loadFile("/root/none.wf");
      expect(result.ok).toBe(false);
      expect(result.diagnostics.map((d) => d.message)).toEqual([
        "unable to find module /root/none.wf",
      ]);
    });
  });
});
