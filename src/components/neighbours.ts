import type { Edge } from "./types.js";
import { checkIndex, checkNodeCount } from "./errors.js";

/**
 * Collect the set of direct neighbours for each node. Edges are undirected,
 * so each one is recorded at both endpoints.
 */
export function buildNeighbours(
  n: number,
  edges: readonly Edge[]
): Set<number>[] {
  checkNodeCount(n);
  const neighbours = Array.from({ length: n }, () => new Set<number>());
  for (const [v, w] of edges) {
    checkIndex(v, n);
    checkIndex(w, n);
    neighbours[v].add(w);
    neighbours[w].add(v);
  }
  return neighbours;
}

/**
 * All nodes reachable from `start`, found by worklist expansion. Independent
 * of DisjointSet; the result matches `start`'s component in its partition.
 */
export function reachable(
  start: number,
  neighbours: readonly ReadonlySet<number>[]
): Set<number> {
  checkIndex(start, neighbours.length);
  const seen = new Set<number>([start]);
  const frontier = [start];
  let current = frontier.pop();
  while (current !== undefined) {
    for (const next of neighbours[current]) {
      if (seen.has(next)) continue;
      seen.add(next);
      frontier.push(next);
    }
    current = frontier.pop();
  }
  return seen;
}
