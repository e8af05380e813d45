/**
 * Graphviz DOT description of the scanned project: internal and external edges,
 * cycle members highlighted. Rendering is left to the `dot` tool.
 */

import { sortStringsBinary, stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { cycleMembers } from "../graph/detectCycles.js";
import type { Cycle } from "../graph/types.js";
import { isPackageEntry } from "../resolve/moduleName.js";
import type { ModuleRecord, ScanResult } from "../structural/types.js";

export const CYCLE_COLOR = "red";
export const INTERNAL_COLOR = "gray";
export const EXTERNAL_COLOR = "lightblue";

export interface DotOptions {
  /** Drop package entry files that import nothing (default true) */
  hideEmptyPackageEntries?: boolean;
  /** Include external import targets as nodes (default true) */
  showExternal?: boolean;
}

/** Modules worth drawing: everything except package entries with no imports of their own. */
export function displayedModules(modules: readonly ModuleRecord[], hideEmptyPackageEntries = true): ModuleRecord[] {
  if (!hideEmptyPackageEntries) return [...modules];
  return modules.filter((m) => !isPackageEntry(m.fqn) || m.rawImports.length > 0);
}

function quote(id: string): string {
  return '"' + id.replace(/\\/g, "\\\\").replace(/"/g, '\\"') + '"';
}

export function exportDot(result: ScanResult, cycles: readonly Cycle[], options: DotOptions = {}): string {
  const shown = displayedModules(result.modules, options.hideEmptyPackageEntries ?? true);
  const showExternal = options.showExternal ?? true;
  const inCycle = cycleMembers(cycles);

  const color = new Map<string, string>();
  for (const m of shown) {
    color.set(m.fqn, inCycle.has(m.fqn) ? CYCLE_COLOR : INTERNAL_COLOR);
  }
  if (showExternal) {
    for (const m of result.modules) {
      for (const target of m.externalImports) {
        if (!color.has(target)) color.set(target, EXTERNAL_COLOR);
      }
    }
  }

  const edges = new Map<string, [string, string]>();
  for (const m of shown) {
    for (const target of [...m.internalImports, ...m.externalImports]) {
      if (color.has(target)) edges.set(m.fqn + "\u0000" + target, [m.fqn, target]);
    }
  }

  const lines = ["digraph imports {", "rankdir=LR;"];
  for (const id of sortStringsBinary(color.keys())) {
    lines.push(`${quote(id)} [shape=box, style=filled, fillcolor="${color.get(id) ?? INTERNAL_COLOR}"];`);
  }
  const sortedEdges = [...edges.values()].sort(
    (a, b) => stringCompareBinary(a[0], b[0]) || stringCompareBinary(a[1], b[1]),
  );
  for (const [from, to] of sortedEdges) {
    lines.push(`${quote(from)} -> ${quote(to)};`);
  }
  lines.push("}");
  return lines.join("\n");
}
