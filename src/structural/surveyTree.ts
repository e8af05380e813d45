import { join } from "path";
import { walkTree } from "../fs/walkTree.js";
import { SOURCE_EXTENSION } from "../config/projectConfig.js";
import { pathToFqn } from "../resolve/moduleName.js";
import type { ModuleFqn, ProjectCatalog, TreeOptions } from "./types.js";

/**
 * Ground truth for classification: every package directory and every source module
 * in the full tree. Environment directories are not pruned here and no file is read.
 */
export function surveyTree(root: string, options: Pick<TreeOptions, "packageMarker" | "exclude">): ProjectCatalog {
  const localPackages = new Set<string>();
  const allLocalModules = new Set<ModuleFqn>();

  walkTree(
    root,
    (listing) => {
      if (listing.files.includes(options.packageMarker)) {
        localPackages.add(listing.relParts.join("."));
      }
      for (const file of listing.files) {
        if (file.endsWith(SOURCE_EXTENSION)) {
          allLocalModules.add(pathToFqn(root, join(listing.absDir, file)));
        }
      }
      return true;
    },
    { exclude: options.exclude },
  );

  return { localPackages, allLocalModules };
}
