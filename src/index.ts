export { pathToFqn, resolveRelative, isPackageEntry, topLevelName } from "./resolve/moduleName.js";
export { parsePythonImports } from "./parse/parsePythonImports.js";
export type { ImportClause, ParsedImports } from "./parse/parsePythonImports.js";
export { surveyTree } from "./structural/surveyTree.js";
export { walkSources } from "./structural/walkSources.js";
export type { SourceWalk, WalkedModule } from "./structural/walkSources.js";
export { classifyImports, isInternalTarget } from "./structural/classifyImports.js";
export type { ClassifiedImports } from "./structural/classifyImports.js";
export type {
  ModuleFqn,
  ModuleRecord,
  ParseOutcome,
  ProjectCatalog,
  ScanResult,
  TreeOptions,
} from "./structural/types.js";
export { scanProject, parseFailures } from "./scan/scanProject.js";
export { buildDependencyGraph } from "./graph/buildGraph.js";
export { findCycles, cycleMembers } from "./graph/detectCycles.js";
export type { Cycle, DependencyGraph } from "./graph/types.js";
export { exportDot, displayedModules } from "./formatters/dot.js";
export type { DotOptions } from "./formatters/dot.js";
export { formatSummary } from "./formatters/summary.js";
export { buildSnapshot, serializeSnapshot, fingerprintSnapshot, canonicalJson } from "./determinism/Snapshot.js";
export type { Snapshot, SnapshotModule } from "./determinism/Snapshot.js";
export { loadProjectConfig, validateConfig, defaultConfig } from "./config/projectConfig.js";
export type { ProjectConfig } from "./config/projectConfig.js";
export { runCli, parseArgs } from "./cli/run.js";
