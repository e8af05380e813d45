/**
 * pyimportgraph CLI. Scans a project, reports cycles, optionally writes the JSON
 * snapshot and the DOT description. Never throws; returns the exit code.
 *
 * Exit codes: 0 ok, 1 cycles found with --fail-on-cycles, 2 usage or config error.
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { loadProjectConfig, type ProjectConfig } from "../config/projectConfig.js";
import { buildSnapshot, fingerprintSnapshot, serializeSnapshot } from "../determinism/Snapshot.js";
import { exportDot } from "../formatters/dot.js";
import { formatSummary } from "../formatters/summary.js";
import { buildDependencyGraph } from "../graph/buildGraph.js";
import { findCycles } from "../graph/detectCycles.js";
import { parseFailures, scanProject } from "../scan/scanProject.js";

const PREFIX = "pyimportgraph:";

export const USAGE = [
  "usage: pyimportgraph [--root <dir>] [--out <file.json>] [--dot <file.dot>]",
  "                     [--config <file>] [--no-external] [--summary] [--fail-on-cycles]",
].join("\n");

const VALUE_FLAGS = new Set(["--root", "--out", "--dot", "--config"]);
const BOOLEAN_FLAGS = new Set(["--no-external", "--summary", "--fail-on-cycles", "--help"]);

export interface CliArgs {
  root: string;
  out: string | null;
  dot: string | null;
  config: string | null;
  noExternal: boolean;
  summary: boolean;
  failOnCycles: boolean;
  help: boolean;
}

/** Throws on unknown flags or a value flag without a value. */
export function parseArgs(args: string[]): CliArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${arg} needs a value`);
      }
      values.set(arg, value);
      i++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags.add(arg);
    } else {
      throw new Error(`unknown argument ${arg}`);
    }
  }

  return {
    root: values.get("--root") ?? ".",
    out: values.get("--out") ?? null,
    dot: values.get("--dot") ?? null,
    config: values.get("--config") ?? null,
    noExternal: flags.has("--no-external"),
    summary: flags.has("--summary"),
    failOnCycles: flags.has("--fail-on-cycles"),
    help: flags.has("--help"),
  };
}

function writeOutput(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf8");
}

export function runCli(argv: string[], cwd: string = process.cwd()): number {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    console.error(`${PREFIX} ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const root = resolve(cwd, args.root);
  let config: ProjectConfig;
  try {
    config = loadProjectConfig(root, args.config ? resolve(cwd, args.config) : undefined);
  } catch (err) {
    console.error(`${PREFIX} ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }
  if (args.noExternal) config.showExternal = false;

  const result = scanProject(root, config);
  const cycles = findCycles(buildDependencyGraph(result.modules));
  const snapshot = buildSnapshot(result, cycles);

  for (const dir of result.prunedEnvironments) {
    console.error(`${PREFIX} ignoring virtual environment ${dir}`);
  }
  for (const dir of result.unreadableDirectories) {
    console.error(`${PREFIX} could not read directory ${dir}`);
  }
  for (const failure of parseFailures(result)) {
    console.error(`${PREFIX} could not parse ${failure.fqn}: ${failure.reason}`);
  }

  try {
    if (args.out) writeOutput(resolve(cwd, args.out), serializeSnapshot(snapshot));
    if (args.dot) {
      const dot = exportDot(result, cycles, {
        hideEmptyPackageEntries: config.hideEmptyPackageEntries,
        showExternal: config.showExternal,
      });
      writeOutput(resolve(cwd, args.dot), dot + "\n");
    }
  } catch (err) {
    console.error(`${PREFIX} ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }

  console.log("pyimportgraph");
  console.log("modules:", result.modules.length);
  console.log("cycles:", cycles.length);
  console.log("fingerprint:", fingerprintSnapshot(snapshot));
  cycles.forEach((cycle, i) => {
    console.log(`  cycle ${i + 1}: ${cycle.join(" <-> ")}`);
  });
  if (args.summary) {
    console.log(formatSummary(result, cycles, config.hideEmptyPackageEntries));
  }

  return args.failOnCycles && cycles.length > 0 ? 1 : 0;
}
