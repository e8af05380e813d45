import { topLevelName } from "../resolve/moduleName.js";
import type { ProjectCatalog } from "./types.js";

export interface ClassifiedImports {
  internal: string[];
  external: string[];
}

/** Internal: a known module, or anything under a top-level local package. */
export function isInternalTarget(target: string, catalog: ProjectCatalog): boolean {
  return catalog.allLocalModules.has(target) || catalog.localPackages.has(topLevelName(target));
}

/** Order-preserving partition of rawImports; duplicates stay where they fall. */
export function classifyImports(rawImports: readonly string[], catalog: ProjectCatalog): ClassifiedImports {
  const internal: string[] = [];
  const external: string[] = [];
  for (const target of rawImports) {
    if (isInternalTarget(target, catalog)) internal.push(target);
    else external.push(target);
  }
  return { internal, external };
}
