import type { ModuleFqn } from "../structural/types.js";

/** Internal-only adjacency: module → modules/packages it imports from the project. */
export type DependencyGraph = ReadonlyMap<ModuleFqn, ReadonlySet<ModuleFqn>>;

/** Two or more mutually reachable modules, members in binary order. */
export type Cycle = ModuleFqn[];
