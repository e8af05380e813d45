import type { ModuleRecord } from "../structural/types.js";
import type { DependencyGraph } from "./types.js";

/**
 * Adjacency over internal imports only, one key per module (in module order).
 * External imports never become edges.
 */
export function buildDependencyGraph(modules: readonly ModuleRecord[]): DependencyGraph {
  const graph = new Map<string, Set<string>>();
  for (const mod of modules) {
    graph.set(mod.fqn, new Set(mod.internalImports));
  }
  return graph;
}
