import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { cycleMembers } from "../graph/detectCycles.js";
import type { Cycle } from "../graph/types.js";
import type { ScanResult } from "../structural/types.js";
import { displayedModules } from "./dot.js";

const CYCLE_MARK = "*";

/**
 * One line per displayed module, sorted: `<mark> <fqn>  <count>  <imports>`.
 * Mark is `*` for cycle members. Ends with a status line.
 */
export function formatSummary(result: ScanResult, cycles: readonly Cycle[], hideEmptyPackageEntries = true): string {
  const inCycle = cycleMembers(cycles);
  const rows = displayedModules(result.modules, hideEmptyPackageEntries).sort((a, b) =>
    stringCompareBinary(a.fqn, b.fqn),
  );

  const lines: string[] = [];
  for (const m of rows) {
    const all = [...m.internalImports, ...m.externalImports];
    const mark = inCycle.has(m.fqn) ? CYCLE_MARK : " ";
    lines.push(`${mark} ${m.fqn}  ${all.length}  ${all.length > 0 ? all.join(", ") : "-"}`);
  }
  lines.push(`Scanned ${result.modules.length} modules | Cycles: ${cycles.length}`);
  return lines.join("\n");
}
