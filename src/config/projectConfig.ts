/**
 * .pyimportgraph.yml loader. Frozen key set; every value validated by hand.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "yaml";

export const CONFIG_FILE = ".pyimportgraph.yml";
export const SOURCE_EXTENSION = ".py";
export const DEFAULT_PACKAGE_MARKER = "__init__.py";
export const DEFAULT_VENV_MARKER = "pyvenv.cfg";

const ALLOWED_KEYS = new Set([
  "packageMarker",
  "venvMarker",
  "exclude",
  "hideEmptyPackageEntries",
  "showExternal",
]);

export interface ProjectConfig {
  packageMarker: string;
  venvMarker: string;
  exclude: string[];
  hideEmptyPackageEntries: boolean;
  showExternal: boolean;
}

export function defaultConfig(): ProjectConfig {
  return {
    packageMarker: DEFAULT_PACKAGE_MARKER,
    venvMarker: DEFAULT_VENV_MARKER,
    exclude: [],
    hideEmptyPackageEntries: true,
    showExternal: true,
  };
}

function fileName(value: unknown, key: string): string {
  if (typeof value !== "string" || value.trim() === "" || /[\\/]/.test(value)) {
    throw new Error(`${CONFIG_FILE}: ${key} must be a plain file name`);
  }
  return value;
}

function flag(value: unknown, key: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${CONFIG_FILE}: ${key} must be true or false`);
  }
  return value;
}

/** Validate an already-parsed document. Unknown keys or bad values → throw. */
export function validateConfig(raw: unknown): ProjectConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`${CONFIG_FILE}: root must be an object`);
  }

  const obj = raw as Record<string, unknown>;
  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new Error(`${CONFIG_FILE}: unknown key "${key}"`);
    }
  }

  if (obj.packageMarker !== undefined) config.packageMarker = fileName(obj.packageMarker, "packageMarker");
  if (obj.venvMarker !== undefined) config.venvMarker = fileName(obj.venvMarker, "venvMarker");

  if (obj.exclude !== undefined) {
    if (!Array.isArray(obj.exclude)) {
      throw new Error(`${CONFIG_FILE}: exclude must be an array of directory names`);
    }
    config.exclude = obj.exclude.map((v: unknown, i: number) => fileName(v, `exclude[${i}]`));
  }

  if (obj.hideEmptyPackageEntries !== undefined) {
    config.hideEmptyPackageEntries = flag(obj.hideEmptyPackageEntries, "hideEmptyPackageEntries");
  }
  if (obj.showExternal !== undefined) config.showExternal = flag(obj.showExternal, "showExternal");

  return config;
}

/**
 * Load the config from an explicit path, or from the project root.
 * Missing file → defaults. Invalid YAML or values → throw (caller exits 2).
 */
export function loadProjectConfig(projectRoot: string, explicitPath?: string): ProjectConfig {
  const path = explicitPath ?? join(projectRoot, CONFIG_FILE);
  if (!existsSync(path)) {
    if (explicitPath) throw new Error(`${CONFIG_FILE}: ${explicitPath} not found`);
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${CONFIG_FILE}: invalid YAML — ${msg}`);
  }
  return validateConfig(raw);
}
