import { parsePythonImports } from "../src/parse/parsePythonImports.js";

describe("parsePythonImports", () => {
  it("plain imports keep dotted names and drop aliases", () => {
    const result = parsePythonImports("import os, sys as system\nimport a.b.c\n");
    expect(result).toEqual({
      kind: "parsed",
      clauses: [
        { kind: "import", name: "os" },
        { kind: "import", name: "sys" },
        { kind: "import", name: "a.b.c" },
      ],
    });
  });

  it("from-imports carry level and module", () => {
    const source = [
      "from . import x",
      "from ..pkg.mod import y",
      "from json import dumps, loads",
      "from .. import (a,",
      "    b)",
      "",
    ].join("\n");
    const result = parsePythonImports(source);
    expect(result).toEqual({
      kind: "parsed",
      clauses: [
        { kind: "from", level: 1, module: null },
        { kind: "from", level: 2, module: "pkg.mod" },
        { kind: "from", level: 0, module: "json" },
        { kind: "from", level: 2, module: null },
      ],
    });
  });

  it("treats __future__ as an absolute from-import", () => {
    const result = parsePythonImports("from __future__ import annotations\nimport os\n");
    expect(result).toEqual({
      kind: "parsed",
      clauses: [
        { kind: "from", level: 0, module: "__future__" },
        { kind: "import", name: "os" },
      ],
    });
  });

  it("includes nested imports in source order", () => {
    const source = [
      "import b",
      "def f():",
      "    import c",
      "    if True:",
      "        from .d import e",
      "class K:",
      "    import g",
      "import h",
      "",
    ].join("\n");
    const result = parsePythonImports(source);
    expect(result.kind).toBe("parsed");
    if (result.kind !== "parsed") return;
    expect(result.clauses).toEqual([
      { kind: "import", name: "b" },
      { kind: "import", name: "c" },
      { kind: "from", level: 1, module: "d" },
      { kind: "import", name: "g" },
      { kind: "import", name: "h" },
    ]);
  });

  it("ignores import-like text in strings and comments", () => {
    const result = parsePythonImports('# import nope\ntext = "import also_nope"\n');
    expect(result).toEqual({ kind: "parsed", clauses: [] });
  });

  it("empty source parses with no clauses", () => {
    expect(parsePythonImports("")).toEqual({ kind: "parsed", clauses: [] });
  });

  it("reports syntax errors as failed", () => {
    const result = parsePythonImports("import os\ndef broken(:\n    pass\n");
    expect(result.kind).toBe("failed");
    if (result.kind !== "failed") return;
    expect(result.reason).toMatch(/^syntax error near line \d+$/);
  });

  it("rejects Python 2 print statements", () => {
    expect(parsePythonImports('import foo\nprint "hello"\n')).toEqual({
      kind: "failed",
      reason: "Python 2 syntax: print statement near line 2",
    });
  });

  it("rejects Python 2 exec statements", () => {
    expect(parsePythonImports('import foo\nexec "x = 1"\n')).toEqual({
      kind: "failed",
      reason: "Python 2 syntax: exec statement near line 2",
    });
  });

  it("rejects the <> comparison operator", () => {
    expect(parsePythonImports("import foo\nif 1 <> 2:\n    pass\n")).toEqual({
      kind: "failed",
      reason: "Python 2 syntax: <> operator near line 2",
    });
  });

  it("print and exec calls are ordinary Python 3", () => {
    expect(parsePythonImports('import foo\nprint("hello")\nexec("x = 1")\n')).toEqual({
      kind: "parsed",
      clauses: [{ kind: "import", name: "foo" }],
    });
  });

  it("parses repeatedly with the shared parser", () => {
    const first = parsePythonImports("import a\n");
    const second = parsePythonImports("import b\n");
    expect(first).toEqual({ kind: "parsed", clauses: [{ kind: "import", name: "a" }] });
    expect(second).toEqual({ kind: "parsed", clauses: [{ kind: "import", name: "b" }] });
  });
});
