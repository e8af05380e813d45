import { sortStringsBinary, stringCompareBinary } from "../determinism/CanonicalOrder.js";
import type { Cycle, DependencyGraph } from "./types.js";

const UNVISITED = -1;

interface VisitState {
  index: number;
  lowlink: number;
  onStack: boolean;
}

interface Frame {
  node: number;
  nextEdge: number;
}

/** Dense ids: graph keys first (in key order), then targets that are not keys. */
function internGraph(graph: DependencyGraph): { names: string[]; successors: number[][] } {
  const ids = new Map<string, number>();
  const names: string[] = [];
  const intern = (name: string): number => {
    let id = ids.get(name);
    if (id === undefined) {
      id = names.length;
      ids.set(name, id);
      names.push(name);
    }
    return id;
  };

  for (const from of graph.keys()) intern(from);

  const successors: number[][] = [];
  for (const [from, targets] of graph) {
    const out: number[] = [];
    for (const to of targets) out.push(intern(to));
    successors[intern(from)] = out;
  }
  for (let id = 0; id < names.length; id++) {
    if (!successors[id]) successors[id] = [];
  }
  return { names, successors };
}

/**
 * Strongly connected components with more than one node (Tarjan, iterative).
 * Each such component holds at least one import cycle. A module importing itself
 * is not reported.
 * Canonical output: members sorted, components sorted by first member.
 */
export function findCycles(graph: DependencyGraph): Cycle[] {
  const { names, successors } = internGraph(graph);
  const state: VisitState[] = names.map(() => ({ index: UNVISITED, lowlink: UNVISITED, onStack: false }));
  const stack: number[] = [];
  const components: Cycle[] = [];
  let counter = 0;

  const discover = (v: number): void => {
    state[v].index = counter;
    state[v].lowlink = counter;
    counter++;
    stack.push(v);
    state[v].onStack = true;
  };

  for (let start = 0; start < names.length; start++) {
    if (state[start].index !== UNVISITED) continue;

    discover(start);
    const work: Frame[] = [{ node: start, nextEdge: 0 }];

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const v = frame.node;
      const out = successors[v];

      if (frame.nextEdge < out.length) {
        const w = out[frame.nextEdge++];
        if (state[w].index === UNVISITED) {
          discover(w);
          work.push({ node: w, nextEdge: 0 });
        } else if (state[w].onStack) {
          state[v].lowlink = Math.min(state[v].lowlink, state[w].index);
        }
        continue;
      }

      work.pop();
      if (state[v].lowlink === state[v].index) {
        const members: string[] = [];
        for (;;) {
          const w = stack.pop();
          if (w === undefined) break;
          state[w].onStack = false;
          members.push(names[w]);
          if (w === v) break;
        }
        if (members.length > 1) components.push(sortStringsBinary(members));
      }

      const parent = work[work.length - 1];
      if (parent) {
        state[parent.node].lowlink = Math.min(state[parent.node].lowlink, state[v].lowlink);
      }
    }
  }

  return components.sort((a, b) => stringCompareBinary(a[0], b[0]));
}

/** Every module that sits in some cycle. */
export function cycleMembers(cycles: readonly Cycle[]): Set<string> {
  const members = new Set<string>();
  for (const cycle of cycles) {
    for (const m of cycle) members.add(m);
  }
  return members;
}
