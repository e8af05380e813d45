import { statSync } from "fs";
import { resolve } from "path";
import { DEFAULT_PACKAGE_MARKER, DEFAULT_VENV_MARKER } from "../config/projectConfig.js";
import { classifyImports } from "../structural/classifyImports.js";
import { surveyTree } from "../structural/surveyTree.js";
import { walkSources } from "../structural/walkSources.js";
import type { ModuleRecord, ProjectCatalog, ScanResult, TreeOptions } from "../structural/types.js";

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function emptyResult(root: string): ScanResult {
  const catalog: ProjectCatalog = { localPackages: new Set(), allLocalModules: new Set() };
  return { root, catalog, modules: [], prunedEnvironments: [], unreadableDirectories: [] };
}

/**
 * Full scan of a project tree: survey, walk, classify. Each call builds a new
 * result from what is on disk now; nothing is carried over between calls.
 * A missing root, or one that is not a directory, gives an empty result.
 */
export function scanProject(root: string, options: Partial<TreeOptions> = {}): ScanResult {
  const absRoot = resolve(root);
  if (!isDirectory(absRoot)) return emptyResult(absRoot);

  const treeOptions: TreeOptions = {
    packageMarker: options.packageMarker ?? DEFAULT_PACKAGE_MARKER,
    venvMarker: options.venvMarker ?? DEFAULT_VENV_MARKER,
    exclude: options.exclude ?? [],
  };

  const catalog = surveyTree(absRoot, treeOptions);
  const walk = walkSources(absRoot, treeOptions);

  const modules: ModuleRecord[] = walk.modules.map((m) => {
    const { internal, external } = classifyImports(m.rawImports, catalog);
    return {
      fqn: m.fqn,
      path: m.path,
      rawImports: m.rawImports,
      internalImports: internal,
      externalImports: external,
      parse: m.parse,
    };
  });

  return {
    root: absRoot,
    catalog,
    modules,
    prunedEnvironments: walk.prunedEnvironments,
    unreadableDirectories: walk.unreadableDirectories,
  };
}

/** Modules whose file could not be read or parsed. */
export function parseFailures(result: ScanResult): { fqn: string; reason: string }[] {
  const failures: { fqn: string; reason: string }[] = [];
  for (const m of result.modules) {
    if (m.parse.kind === "failed") failures.push({ fqn: m.fqn, reason: m.parse.reason });
  }
  return failures;
}
