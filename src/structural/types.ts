export type ModuleFqn = string;

/** Outcome of reading and parsing one source file. */
export type ParseOutcome =
  | { kind: "parsed" }
  | { kind: "failed"; reason: string };

export interface ModuleRecord {
  fqn: ModuleFqn;
  /** Absolute path of the source file */
  path: string;
  /** Import targets in order of occurrence; duplicates kept */
  rawImports: string[];
  internalImports: string[];
  externalImports: string[];
  parse: ParseOutcome;
}

export interface ProjectCatalog {
  /** Dotted paths of directories holding a package marker; "" is the root */
  localPackages: ReadonlySet<string>;
  allLocalModules: ReadonlySet<ModuleFqn>;
}

export interface TreeOptions {
  packageMarker: string;
  venvMarker: string;
  /** Directory names skipped by every walk */
  exclude: readonly string[];
}

export interface ScanResult {
  root: string;
  catalog: ProjectCatalog;
  /** Walk order: files of a directory before its subdirectories, names in binary order */
  modules: readonly ModuleRecord[];
  /** Directories skipped because they hold the virtual-environment marker */
  prunedEnvironments: string[];
  unreadableDirectories: string[];
}
