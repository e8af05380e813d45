import { readFileSync } from "fs";
import { join } from "path";
import { walkTree } from "../fs/walkTree.js";
import { SOURCE_EXTENSION } from "../config/projectConfig.js";
import { parsePythonImports, type ImportClause } from "../parse/parsePythonImports.js";
import { pathToFqn, resolveRelative } from "../resolve/moduleName.js";
import type { ModuleFqn, ParseOutcome, TreeOptions } from "./types.js";

/** A module as found on disk, before classification. */
export interface WalkedModule {
  fqn: ModuleFqn;
  path: string;
  rawImports: string[];
  parse: ParseOutcome;
}

export interface SourceWalk {
  modules: WalkedModule[];
  prunedEnvironments: string[];
  unreadableDirectories: string[];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function readSource(absPath: string): { text: string } | { error: string } {
  try {
    return { text: utf8.decode(readFileSync(absPath)) };
  } catch (err) {
    return { error: err instanceof Error ? err.message : String(err) };
  }
}

function importTarget(fqn: ModuleFqn, clause: ImportClause): string {
  if (clause.kind === "import") return clause.name;
  return resolveRelative(fqn, clause.level, clause.module);
}

function scanFile(root: string, absPath: string): WalkedModule {
  const fqn = pathToFqn(root, absPath);
  const source = readSource(absPath);
  if ("error" in source) {
    return { fqn, path: absPath, rawImports: [], parse: { kind: "failed", reason: source.error } };
  }

  const parsed = parsePythonImports(source.text);
  if (parsed.kind === "failed") {
    return { fqn, path: absPath, rawImports: [], parse: parsed };
  }
  return {
    fqn,
    path: absPath,
    rawImports: parsed.clauses.map((c) => importTarget(fqn, c)),
    parse: { kind: "parsed" },
  };
}

/**
 * Reads every source file outside virtual environments. A directory holding the
 * environment marker contributes nothing, nor does anything beneath it.
 * A file that cannot be read or parsed still yields a module, with no imports.
 * Module names are unique: when two files map to the same name (`a.b.py` and
 * `a/b.py`), the later file in walk order replaces the earlier one in its slot.
 */
export function walkSources(root: string, options: TreeOptions): SourceWalk {
  const modules = new Map<ModuleFqn, WalkedModule>();
  const prunedEnvironments: string[] = [];

  const { unreadable } = walkTree(
    root,
    (listing) => {
      if (listing.files.includes(options.venvMarker)) {
        prunedEnvironments.push(listing.absDir);
        return false;
      }
      for (const file of listing.files) {
        if (file.endsWith(SOURCE_EXTENSION)) {
          const scanned = scanFile(root, join(listing.absDir, file));
          modules.set(scanned.fqn, scanned);
        }
      }
      return true;
    },
    { exclude: options.exclude },
  );

  return { modules: [...modules.values()], prunedEnvironments, unreadableDirectories: unreadable };
}
