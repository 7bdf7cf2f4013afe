import type { Connectivity } from "./types.js";
import { checkIndex, checkNodeCount } from "./errors.js";

const ROOT = -1;

/**
 * Parent-pointer forest without balancing: `union(v, w)` always hangs
 * `v`'s root under `w`'s, so a chain of unions can build a path of length
 * n - 1 and `find` degrades to O(n).
 */
export class UnbalancedForest implements Connectivity {
  readonly size: number;
  private readonly parents: number[];

  constructor(n: number) {
    checkNodeCount(n);
    this.size = n;
    this.parents = new Array<number>(n).fill(ROOT);
  }

  isRoot(v: number): boolean {
    checkIndex(v, this.size);
    return this.parents[v] === ROOT;
  }

  find(v: number): number {
    checkIndex(v, this.size);
    let node = v;
    while (this.parents[node] !== ROOT) {
      node = this.parents[node];
    }
    return node;
  }

  union(v: number, w: number): boolean {
    checkIndex(v, this.size);
    const rootV = this.find(v);
    const rootW = this.find(w);
    if (rootV === rootW) return false;
    this.parents[rootV] = rootW;
    return true;
  }

  connected(v: number, w: number): boolean {
    return this.find(v) === this.find(w);
  }

  toArray(): number[] {
    return [...this.parents];
  }
}
