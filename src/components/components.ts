import type { Connectivity, Edge, Strategy } from "./types.js";
import { DisjointSet } from "./disjoint-set.js";
import { UnbalancedForest } from "./forest.js";
import { RepresentativeArray } from "./representatives.js";
import { checkNodeCount } from "./errors.js";

export interface ComponentsOptions {
  strategy?: Strategy;
  /** Only used by the balanced strategy. */
  pathCompression?: boolean;
}

/**
 * Compute connected components for `n` nodes by folding every edge through
 * `union`, in order. All endpoints must lie in `0 <= ... < n`.
 *
 * Compare `find(a) === find(b)` on the result to test whether two nodes are
 * connected.
 */
export function components(
  n: number,
  edges: readonly Edge[],
  options?: { strategy?: "balanced"; pathCompression?: boolean }
): DisjointSet;
export function components(
  n: number,
  edges: readonly Edge[],
  options: ComponentsOptions
): Connectivity;
export function components(
  n: number,
  edges: readonly Edge[],
  options: ComponentsOptions = {}
): Connectivity {
  checkNodeCount(n);
  const structure = createStructure(n, options);
  // union checks both endpoints before it writes anything.
  for (const [v, w] of edges) {
    structure.union(v, w);
  }
  return structure;
}

/** Components as sorted member lists, ordered by smallest member. */
export function componentGroups(n: number, edges: readonly Edge[]): number[][] {
  return components(n, edges).groups();
}

function createStructure(n: number, options: ComponentsOptions): Connectivity {
  switch (options.strategy ?? "balanced") {
    case "balanced":
      return new DisjointSet(n, { pathCompression: options.pathCompression });
    case "forest":
      return new UnbalancedForest(n);
    case "representatives":
      return new RepresentativeArray(n);
    default:
      throw new Error(`Unknown strategy: ${String(options.strategy)}`);
  }
}
