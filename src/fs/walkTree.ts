import { readdirSync, statSync, type Dirent } from "fs";
import { join, resolve } from "path";
import { stringCompareBinary } from "../determinism/CanonicalOrder.js";

export interface DirectoryListing {
  absDir: string;
  /** Path components relative to the walk root ([] for the root itself) */
  relParts: string[];
  /** File names, binary order */
  files: string[];
  /** Subdirectory names, binary order */
  dirs: string[];
}

export interface WalkOptions {
  /** Subdirectory names never entered */
  exclude?: readonly string[];
}

export interface WalkSummary {
  unreadable: string[];
}

/** true: descend into listing.dirs; false: prune this subtree. */
export type DirectoryVisitor = (listing: DirectoryListing) => boolean;

function isFileEntry(absDir: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return statSync(join(absDir, entry.name)).isFile();
  } catch {
    return false;
  }
}

function listDirectory(absDir: string, relParts: string[], exclude: ReadonlySet<string>): DirectoryListing {
  const entries = readdirSync(absDir, { withFileTypes: true });
  const files: string[] = [];
  const dirs: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (!exclude.has(entry.name)) dirs.push(entry.name);
    } else if (isFileEntry(absDir, entry)) {
      files.push(entry.name);
    }
  }
  files.sort(stringCompareBinary);
  dirs.sort(stringCompareBinary);
  return { absDir, relParts, files, dirs };
}

/**
 * Top-down pre-order walk. Symbolic links to directories are not followed.
 * Directories that cannot be listed are skipped and reported.
 */
export function walkTree(root: string, visit: DirectoryVisitor, options: WalkOptions = {}): WalkSummary {
  const exclude = new Set(options.exclude ?? []);
  const unreadable: string[] = [];
  const pending: { absDir: string; relParts: string[] }[] = [{ absDir: resolve(root), relParts: [] }];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;

    let listing: DirectoryListing;
    try {
      listing = listDirectory(next.absDir, next.relParts, exclude);
    } catch {
      unreadable.push(next.absDir);
      continue;
    }

    if (!visit(listing)) continue;

    for (let i = listing.dirs.length - 1; i >= 0; i--) {
      const name = listing.dirs[i];
      pending.push({ absDir: join(listing.absDir, name), relParts: [...listing.relParts, name] });
    }
  }

  return { unreadable };
}
