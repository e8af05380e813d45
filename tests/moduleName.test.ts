/**
 * Module names from paths, from-import resolution, package entry detection.
 */

import { isPackageEntry, pathToFqn, resolveRelative, topLevelName } from "../src/resolve/moduleName.js";

describe("pathToFqn", () => {
  it("joins components and strips the suffix", () => {
    expect(pathToFqn("/proj", "/proj/sub/file.ext")).toBe("sub.file");
    expect(pathToFqn("/proj", "/proj/main.py")).toBe("main");
    expect(pathToFqn("/proj/", "/proj/a/b/c.py")).toBe("a.b.c");
  });

  it("strips only the last suffix", () => {
    expect(pathToFqn("/proj", "/proj/a/b.tar.py")).toBe("a.b.tar");
  });

  it("keeps the explicit entry component for package entry files", () => {
    expect(pathToFqn("/proj", "/proj/pkg/__init__.py")).toBe("pkg.__init__");
    expect(pathToFqn("/proj", "/proj/__init__.py")).toBe("__init__");
  });

  it("throws for paths outside the root", () => {
    expect(() => pathToFqn("/proj", "/other/x.py")).toThrow("pathToFqn: /other/x.py is not under /proj");
    expect(() => pathToFqn("/proj", "/projx/a.py")).toThrow(/not under/);
    expect(() => pathToFqn("/proj", "/proj")).toThrow(/not under/);
  });
});

describe("resolveRelative", () => {
  it("level 1 stays in the enclosing package", () => {
    expect(resolveRelative("a.b.c", 1, "d")).toBe("a.b.d");
    expect(resolveRelative("a.b.c", 1, null)).toBe("a.b");
  });

  it("level 2 drops one more segment", () => {
    expect(resolveRelative("a.b.c", 2, "d")).toBe("a.d");
    expect(resolveRelative("a.b.c", 2)).toBe("a");
  });

  it("level 0 still prefixes the enclosing package", () => {
    expect(resolveRelative("a.b.c", 0, "x.y")).toBe("a.b.x.y");
    expect(resolveRelative("top", 0, "os")).toBe("os");
  });

  it("levels deeper than the package path leave an empty prefix", () => {
    expect(resolveRelative("a.b.c", 3, "d")).toBe("d");
    expect(resolveRelative("a.b.c", 5, "d")).toBe("d");
    expect(resolveRelative("a.b.c", 5, null)).toBe("");
  });
});

describe("isPackageEntry", () => {
  it("matches root and nested entry names only", () => {
    expect(isPackageEntry("__init__")).toBe(true);
    expect(isPackageEntry("pkg.sub.__init__")).toBe(true);
    expect(isPackageEntry("pkg.init")).toBe(false);
    expect(isPackageEntry("pkg.my__init__")).toBe(false);
  });
});

describe("topLevelName", () => {
  it("returns the first segment", () => {
    expect(topLevelName("a.b.c")).toBe("a");
    expect(topLevelName("a")).toBe("a");
    expect(topLevelName("")).toBe("");
  });
});
