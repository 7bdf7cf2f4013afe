/** Edges are undirected: `[v, w]` and `[w, v]` describe the same link. */
export type Edge = readonly [number, number];

/**
 * The operations every connectivity structure shares. `find` may rewrite
 * internal storage (path compression) but never changes the partition.
 */
export interface Connectivity {
  readonly size: number;
  find(v: number): number;
  /** Returns false when `v` and `w` were already in the same component. */
  union(v: number, w: number): boolean;
  connected(v: number, w: number): boolean;
  /** Copy of the raw backing storage. */
  toArray(): number[];
}

export type Strategy = "balanced" | "forest" | "representatives";

/** A graph as read from a YAML document. */
export interface GraphDocument {
  nodes: number;
  edges: Edge[];
}
