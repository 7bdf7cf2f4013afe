import type { Connectivity } from "./types.js";
import { checkIndex, checkNodeCount } from "./errors.js";

// A cell holds either a parent index (>= 0) or, at a root, the negated size
// of that root's tree. Sizes are always >= 1, so the two never overlap.

export function isSize(cell: number): boolean {
  return cell < 0;
}

export function isNode(cell: number): boolean {
  return cell >= 0;
}

export function sizeOf(cell: number): number {
  if (!isSize(cell)) {
    throw new Error(`Cell ${cell} is a parent index, not a tree size`);
  }
  return -cell;
}

export function toSize(count: number): number {
  return -count;
}

export interface DisjointSetOptions {
  /** Rewrite visited nodes to point at the root during `find`. Default true. */
  pathCompression?: boolean;
}

/**
 * Union-find over the nodes `0..n-1`, balanced by tree size.
 *
 * `find` is a query with a side effect: unless path compression is turned
 * off it rewrites the parent links it walks. The partition it reports never
 * changes, but root identity may, so a root returned by `find` is only good
 * until the next `union`.
 *
 * Not safe for concurrent mutation; guard the whole structure with one lock
 * if it has to be shared.
 */
export class DisjointSet implements Connectivity {
  readonly size: number;
  private readonly cells: number[];
  private readonly pathCompression: boolean;
  private count: number;

  constructor(n: number, options: DisjointSetOptions = {}) {
    checkNodeCount(n);
    this.size = n;
    this.cells = new Array<number>(n).fill(toSize(1));
    this.pathCompression = options.pathCompression ?? true;
    this.count = n;
  }

  /** Number of components in the current partition. */
  get componentCount(): number {
    return this.count;
  }

  find(v: number): number {
    checkIndex(v, this.size);
    let root = v;
    while (isNode(this.cells[root])) {
      root = this.cells[root];
    }

    if (this.pathCompression) {
      let node = v;
      while (node !== root) {
        const next = this.cells[node];
        this.cells[node] = root;
        node = next;
      }
    }
    return root;
  }

  /**
   * Merge the components of `v` and `w`. The smaller tree goes under the
   * larger one; on a tie, `w`'s root goes under `v`'s.
   */
  union(v: number, w: number): boolean {
    // Check both before find(v) compresses anything.
    checkIndex(v, this.size);
    checkIndex(w, this.size);

    let rootV = this.find(v);
    let rootW = this.find(w);
    if (rootV === rootW) return false;

    const sizeV = sizeOf(this.cells[rootV]);
    const sizeW = sizeOf(this.cells[rootW]);
    if (sizeV < sizeW) {
      [rootV, rootW] = [rootW, rootV];
    }
    this.cells[rootV] = toSize(sizeV + sizeW);
    this.cells[rootW] = rootV;
    this.count--;
    return true;
  }

  connected(v: number, w: number): boolean {
    checkIndex(w, this.size);
    return this.find(v) === this.find(w);
  }

  componentSize(v: number): number {
    return sizeOf(this.cells[this.find(v)]);
  }

  /** Parent links between `v` and its root. Does not compress. */
  depth(v: number): number {
    checkIndex(v, this.size);
    let steps = 0;
    let node = v;
    while (isNode(this.cells[node])) {
      node = this.cells[node];
      steps++;
    }
    return steps;
  }

  roots(): number[] {
    const result: number[] = [];
    for (let i = 0; i < this.size; i++) {
      if (isSize(this.cells[i])) result.push(i);
    }
    return result;
  }

  /** Components as sorted member lists, ordered by smallest member. */
  groups(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (let i = 0; i < this.size; i++) {
      const root = this.find(i);
      const group = byRoot.get(root);
      if (group) {
        group.push(i);
      } else {
        byRoot.set(root, [i]);
      }
    }
    return [...byRoot.values()];
  }

  toArray(): number[] {
    return [...this.cells];
  }
}
