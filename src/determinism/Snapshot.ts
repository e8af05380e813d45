/**
 * Serialized scan snapshot: `modules` keyed by module name plus the `cycles` list.
 * Same tree on disk → byte-identical serialization.
 */

import { createHash } from "crypto";
import type { Cycle } from "../graph/types.js";
import type { ScanResult } from "../structural/types.js";
import { stringCompareBinary } from "./CanonicalOrder.js";

export interface SnapshotModule {
  path: string;
  raw_imports: string[];
  internal_imports: string[];
  external_imports: string[];
}

export interface Snapshot {
  modules: Record<string, SnapshotModule>;
  cycles: Cycle[];
}

export function buildSnapshot(result: ScanResult, cycles: readonly Cycle[]): Snapshot {
  const modules: Record<string, SnapshotModule> = {};
  for (const m of result.modules) {
    modules[m.fqn] = {
      path: m.path,
      raw_imports: [...m.rawImports],
      internal_imports: [...m.internalImports],
      external_imports: [...m.externalImports],
    };
  }
  return { modules, cycles: cycles.map((c) => [...c]) };
}

/** Pretty JSON in module walk order, newline-terminated. */
export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(snapshot, null, 2) + "\n";
}

/** Key-sorted compact JSON. Array order is preserved. */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return "[" + value.map((v) => canonicalJson(v)).join(",") + "]";
  if (typeof value === "object") {
    const entries = Object.entries(value).sort((a, b) => stringCompareBinary(a[0], b[0]));
    return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + canonicalJson(v)).join(",") + "}";
  }
  return "null";
}

/** First 16 hex chars of SHA-256 over the canonical form; independent of key order. */
export function fingerprintSnapshot(snapshot: Snapshot): string {
  return createHash("sha256").update(canonicalJson(snapshot), "utf8").digest("hex").slice(0, 16);
}
