import { extname, isAbsolute, relative, resolve, sep } from "path";

const PACKAGE_ENTRY = "__init__";

/**
 * Dotted module name of a file under root: relative path, final suffix stripped,
 * components joined with ".". Package entry files keep their own component
 * (`pkg/__init__.py` → `pkg.__init__`).
 * Throws when filePath is not strictly inside root.
 */
export function pathToFqn(root: string, filePath: string): string {
  const absRoot = resolve(root);
  const absFile = resolve(absRoot, filePath);
  const rel = relative(absRoot, absFile);
  if (rel === "" || rel === ".." || rel.startsWith(".." + sep) || isAbsolute(rel)) {
    throw new Error(`pathToFqn: ${filePath} is not under ${root}`);
  }

  const parts = rel.split(sep);
  const last = parts[parts.length - 1] ?? "";
  const suffix = extname(last);
  parts[parts.length - 1] = suffix ? last.slice(0, -suffix.length) : last;
  return parts.join(".");
}

/**
 * Target of a from-import clause seen in module currentFqn.
 * The enclosing package is currentFqn minus its last segment; each level past
 * the first drops one more trailing segment. Running out of segments leaves an
 * empty prefix rather than failing.
 *
 * Level 0 still prefixes the enclosing package onto the clause:
 * `resolveRelative("a.b.c", 0, "x.y")` is `"a.b.x.y"`.
 */
export function resolveRelative(
  currentFqn: string,
  level: number,
  moduleClause?: string | null,
): string {
  let pkgParts = currentFqn.split(".").slice(0, -1);
  if (level > 1) {
    const keep = pkgParts.length - (level - 1);
    pkgParts = keep > 0 ? pkgParts.slice(0, keep) : [];
  }
  if (moduleClause) return [...pkgParts, moduleClause].join(".");
  return pkgParts.join(".");
}

/** True for `__init__` and any `<pkg>.__init__`. */
export function isPackageEntry(fqn: string): boolean {
  return fqn === PACKAGE_ENTRY || fqn.endsWith("." + PACKAGE_ENTRY);
}

/** First dotted segment ("" for the empty name). */
export function topLevelName(name: string): string {
  const dot = name.indexOf(".");
  return dot === -1 ? name : name.slice(0, dot);
}
